import { parseArgs } from "node:util";
import { ok, err } from "neverthrow";
import type { GitRef, Handoff, ModeKind } from "@handoff-relay/shared";
import { SHORT_ID_LENGTH } from "@handoff-relay/shared";
import { parseModeKind } from "../domain/enums.js";
import {
  branchRef,
  commitRef,
  createHandoff,
  handoffShortId,
  pullRequestRef,
  withGitRef,
  withTag,
  withWarmUp,
} from "../domain/handoff.js";
import { createMode } from "../domain/mode.js";
import { addMustKnow, addPriorityFile, createWarmUp, setSuggestedStart } from "../domain/warm-up.js";
import { compileHandoffPrompt, formatHandoffDetails } from "../prompt/prompt-builder.js";
import type { IHandoffStore } from "../store/index.js";
import type { CommandContext, CommandResult } from "./shared.js";
import {
  UsageError,
  parseCommandArgs,
  positionalArg,
  requireIdentity,
  splitList,
  textArg,
} from "./shared.js";

const RULE = "═".repeat(63);

/**
 * Attach the current commit, shortened, when no reference was given.
 */
export async function withCurrentCommit(store: IHandoffStore, h: Handoff): Promise<Handoff> {
  if (h.git_ref !== null) return h;
  const commit = await store.currentCommit();
  return commit !== null ? withGitRef(h, commitRef(commit.slice(0, SHORT_ID_LENGTH))) : h;
}

// ─── handoff ────────────────────────────────────────────

/** One-shot send without going through the WIP slot. */
export async function handoffCommand(ctx: CommandContext, args: string[]): Promise<CommandResult> {
  const { values, positionals } = parseCommandArgs(() =>
    parseArgs({
      args,
      allowPositionals: true,
      options: {
        mode: { type: "string", short: "m" },
        file: { type: "string", short: "f", multiple: true },
        know: { type: "string", short: "k", multiple: true },
        "suggest-start": { type: "string" },
        commit: { type: "string" },
        branch: { type: "string" },
        pr: { type: "string" },
        tags: { type: "string" },
      },
    }),
  );
  const summary = textArg(positionals, "summary");
  if (values.mode === undefined) throw new UsageError("missing --mode <deploy|debug|plan>");
  const kind = parseModeKind(values.mode);
  if (kind.isErr()) return err(kind.error);

  const store = await ctx.open();
  const creator = await requireIdentity(store);
  if (creator.isErr()) return err(creator.error);

  let warmUp = createWarmUp(summary);
  (values.file ?? []).forEach((file, i) => {
    warmUp = addPriorityFile(warmUp, { path: file, reason: "Priority file", rank: i + 1 });
  });
  for (const item of values.know ?? []) warmUp = addMustKnow(warmUp, item);
  if (values["suggest-start"] !== undefined) {
    warmUp = setSuggestedStart(warmUp, values["suggest-start"]);
  }

  let handoff = withWarmUp(
    createHandoff(createMode(kind.value, summary), summary, creator.value),
    warmUp,
  );

  const ref = explicitRef(values);
  handoff = ref !== null ? withGitRef(handoff, ref) : await withCurrentCommit(store, handoff);
  for (const tag of splitList(values.tags)) handoff = withTag(handoff, tag);

  const sent = await store.sendHandoff(handoff);
  if (sent.isErr()) return err(sent.error);

  ctx.io.out(`Handoff created: ${handoff.id}`);
  ctx.io.out(`  Mode: ${handoff.mode.kind}`);
  ctx.io.out(`  Summary: ${handoff.summary}`);
  ctx.io.out(`  Written to: ${sent.value}`);
  return ok(undefined);
}

function explicitRef(values: { commit?: string; branch?: string; pr?: string }): GitRef | null {
  if (values.commit !== undefined) return commitRef(values.commit);
  if (values.branch !== undefined) return branchRef(values.branch);
  if (values.pr !== undefined) return pullRequestRef(values.pr);
  return null;
}

// ─── receive ────────────────────────────────────────────

export async function receiveCommand(ctx: CommandContext, args: string[]): Promise<CommandResult> {
  const { values } = parseCommandArgs(() =>
    parseArgs({
      args,
      options: {
        prompt: { type: "boolean", short: "p" },
        mode: { type: "string", short: "m" },
        full: { type: "boolean", short: "f" },
        archive: { type: "boolean" },
      },
    }),
  );

  let modeFilter: ModeKind | null = null;
  if (values.mode !== undefined) {
    const kind = parseModeKind(values.mode);
    if (kind.isErr()) return err(kind.error);
    modeFilter = kind.value;
  }

  const store = await ctx.open();
  const received = await store.receiveHandoffs();
  if (received.isErr()) return err(received.error);

  const { io } = ctx;
  const handoffs = received.value.filter((h) => modeFilter === null || h.mode.kind === modeFilter);
  if (handoffs.length === 0) {
    io.out(
      modeFilter === null
        ? "No pending handoffs in inbox."
        : `No pending ${modeFilter} handoffs in inbox.`,
    );
    return ok(undefined);
  }

  io.out(`Found ${handoffs.length} handoff(s):`);
  io.out("");

  for (const h of handoffs) {
    if (values.prompt) {
      io.out(RULE);
      io.out(compileHandoffPrompt(h));
      io.out(RULE);
      io.out("");
    } else {
      for (const line of formatHandoffDetails(h, values.full ?? false)) io.out(line);
      io.out("");
    }

    if (values.archive) {
      const archived = await store.archiveHandoff(handoffShortId(h));
      if (archived.isErr()) return err(archived.error);
      io.out("  (archived)");
    }
  }

  if (!values.prompt) {
    io.out("Use --prompt to see the full compiled handoff prompt.");
  }
  return ok(undefined);
}

// ─── archive ────────────────────────────────────────────

export async function archiveCommand(ctx: CommandContext, args: string[]): Promise<CommandResult> {
  const { positionals } = parseCommandArgs(() =>
    parseArgs({ args, options: {}, allowPositionals: true }),
  );
  const shortId = positionalArg(positionals, 0, "short-id");

  const store = await ctx.open();
  const archived = await store.archiveHandoff(shortId);
  if (archived.isErr()) return err(archived.error);
  ctx.io.out(`Archived: ${archived.value}`);
  return ok(undefined);
}
