import { parseArgs } from "node:util";
import { ok, err, Result } from "neverthrow";
import type { Handoff, ModeKind } from "@handoff-relay/shared";
import { MODE_LABELS } from "@handoff-relay/shared";
import { parseObservationCategory } from "../domain/enums.js";
import type { HandoffError } from "../domain/errors.js";
import { modeMismatch } from "../domain/errors.js";
import { createHandoff, withSession, withTag, withWarmUp } from "../domain/handoff.js";
import { createMode } from "../domain/mode.js";
import {
  createSessionState,
  endSession,
  recordCommand,
  recordDeadEnd,
  recordFileCreated,
  recordFileModified,
  recordFileRead,
  recordGotcha,
  recordObservation,
  recordSessionDecision,
} from "../domain/session.js";
import {
  addMustKnow,
  addPriorityFile,
  setEstimatedTokens,
  setSuggestedStart,
  setTldr,
} from "../domain/warm-up.js";
import { compileHandoffPrompt } from "../prompt/prompt-builder.js";
import { withCurrentCommit } from "./inbox.js";
import type { CommandContext, CommandHandler, CommandResult } from "./shared.js";
import {
  UsageError,
  mutateWip,
  numberArg,
  parseCommandArgs,
  positionalArg,
  requireIdentity,
  requireWip,
  textArg,
} from "./shared.js";

// ─── Dispatch ───────────────────────────────────────────

export type ActionHandler = (ctx: CommandContext, args: string[]) => Promise<CommandResult>;

/** Route `relay <group> <action> ...` to the named action. */
export function actionGroup(group: string, actions: Map<string, ActionHandler>): CommandHandler {
  return async (ctx, args) => {
    const [action, ...rest] = args;
    if (action === undefined) {
      throw new UsageError(`missing action for '${group}' (${[...actions.keys()].join(", ")})`);
    }
    const handler = actions.get(action);
    if (handler === undefined) {
      throw new UsageError(`unknown action '${group} ${action}'`);
    }
    return handler(ctx, rest);
  };
}

/** Apply one change to the WIP and print `message` on success. */
export async function applyToWip(
  ctx: CommandContext,
  change: (h: Handoff) => Result<Handoff, HandoffError>,
  message: string | ((h: Handoff) => string),
): Promise<CommandResult> {
  const store = await ctx.open();
  const updated = await mutateWip(store, change);
  if (updated.isErr()) return err(updated.error);
  ctx.io.out(typeof message === "string" ? message : message(updated.value));
  return ok(undefined);
}

// ─── Lifecycle ──────────────────────────────────────────

const ACTION_HINTS: Record<ModeKind, string> = {
  deploy: "'relay deploy ship', 'relay deploy verify'",
  debug: "'relay debug symptom', 'relay debug tried'",
  plan: "'relay plan require', 'relay plan decided'",
};

/**
 * Stage a new WIP of `kind`. An existing WIP is replaced.
 */
export async function startWip(
  ctx: CommandContext,
  kind: ModeKind,
  subject: string,
): Promise<CommandResult> {
  const store = await ctx.open();
  const creator = await requireIdentity(store);
  if (creator.isErr()) return err(creator.error);

  const existing = await store.loadWip();
  if (existing.isErr()) {
    ctx.logger.warn({ reason: existing.error.message }, "Replacing unreadable work in progress");
  } else if (existing.value !== null) {
    ctx.logger.warn({ id: existing.value.id }, "Replacing existing work in progress");
  }

  const handoff = withSession(
    createHandoff(createMode(kind, subject), subject, creator.value),
    createSessionState(),
  );
  const saved = await store.saveWip(handoff);
  if (saved.isErr()) return err(saved.error);

  ctx.io.out(`Started ${kind} handoff: ${subject}`);
  ctx.io.out(`Use ${ACTION_HINTS[kind]}, etc. to add details.`);
  ctx.io.out(`Use 'relay ${kind} done' to finalize.`);
  return ok(undefined);
}

/**
 * Close the session, send the WIP to pending and empty the slot.
 */
export async function finishWip(ctx: CommandContext, kind: ModeKind): Promise<CommandResult> {
  const store = await ctx.open();
  const wip = await requireWip(store);
  if (wip.isErr()) return err(wip.error);
  if (wip.value.mode.kind !== kind) return err(modeMismatch(kind, wip.value.mode.kind));

  const closed = withSession(wip.value, endSession(wip.value.session));
  const handoff = await withCurrentCommit(store, closed);

  const sent = await store.sendHandoff(handoff);
  if (sent.isErr()) return err(sent.error);
  const cleared = await store.clearWip();
  if (cleared.isErr()) return err(cleared.error);

  ctx.io.out(`${MODE_LABELS[kind]} handoff finalized: ${sent.value}`);
  return ok(undefined);
}

// ─── relay wip ──────────────────────────────────────────
// Warm-up, tags and session activity; valid for any mode.

function textAction(
  name: string,
  build: (text: string) => {
    change: (h: Handoff) => Handoff;
    message: string;
  },
): ActionHandler {
  return async (ctx, args) => {
    const { positionals } = parseCommandArgs(() =>
      parseArgs({ args, options: {}, allowPositionals: true }),
    );
    const { change, message } = build(textArg(positionals, name));
    return applyToWip(ctx, (h) => ok(change(h)), message);
  };
}

const wipActions = new Map<string, ActionHandler>([
  [
    "show",
    async (ctx, args) => {
      parseCommandArgs(() => parseArgs({ args, options: {} }));
      const store = await ctx.open();
      const wip = await requireWip(store);
      if (wip.isErr()) return err(wip.error);
      ctx.io.out(compileHandoffPrompt(wip.value));
      return ok(undefined);
    },
  ],
  [
    "discard",
    async (ctx, args) => {
      parseCommandArgs(() => parseArgs({ args, options: {} }));
      const store = await ctx.open();
      const wip = await requireWip(store);
      if (wip.isErr()) return err(wip.error);
      const cleared = await store.clearWip();
      if (cleared.isErr()) return err(cleared.error);
      ctx.io.out("Discarded work in progress.");
      return ok(undefined);
    },
  ],
  [
    "tldr",
    textAction("tldr", (text) => ({
      change: (h) => withWarmUp(h, setTldr(h.warm_up, text)),
      message: "Set TL;DR.",
    })),
  ],
  [
    "know",
    textAction("item", (text) => ({
      change: (h) => withWarmUp(h, addMustKnow(h.warm_up, text)),
      message: `Added must-know: ${text}`,
    })),
  ],
  [
    "start",
    textAction("action", (text) => ({
      change: (h) => withWarmUp(h, setSuggestedStart(h.warm_up, text)),
      message: "Set suggested first action.",
    })),
  ],
  [
    "tag",
    textAction("tag", (text) => ({
      change: (h) => withTag(h, text),
      message: `Added tag: ${text}`,
    })),
  ],
  [
    "created",
    textAction("path", (text) => ({
      change: (h) => withSession(h, recordFileCreated(h.session, text)),
      message: `Recorded new file: ${text}`,
    })),
  ],
  [
    "gotcha",
    textAction("note", (text) => ({
      change: (h) => withSession(h, recordGotcha(h.session, text)),
      message: `Recorded gotcha: ${text}`,
    })),
  ],
  [
    "tokens",
    async (ctx, args) => {
      const { positionals } = parseCommandArgs(() =>
        parseArgs({ args, options: {}, allowPositionals: true }),
      );
      const tokens = numberArg(positionalArg(positionals, 0, "tokens"), "<tokens>");
      return applyToWip(
        ctx,
        (h) => ok(withWarmUp(h, setEstimatedTokens(h.warm_up, tokens))),
        (h) => `Set estimated tokens: ${h.warm_up.estimated_tokens ?? 0}`,
      );
    },
  ],
  [
    "file",
    async (ctx, args) => {
      const { values, positionals } = parseCommandArgs(() =>
        parseArgs({
          args,
          allowPositionals: true,
          options: {
            reason: { type: "string", short: "r" },
            rank: { type: "string" },
            focus: { type: "string" },
          },
        }),
      );
      const filePath = positionalArg(positionals, 0, "path");
      const rank = values.rank !== undefined ? numberArg(values.rank, "--rank") : null;
      return applyToWip(
        ctx,
        (h) =>
          ok(
            withWarmUp(
              h,
              addPriorityFile(h.warm_up, {
                path: filePath,
                reason: values.reason ?? "Priority file",
                rank: rank ?? h.warm_up.priority_files.length + 1,
                focus: values.focus ?? null,
              }),
            ),
          ),
        `Added priority file: ${filePath}`,
      );
    },
  ],
  [
    "read",
    async (ctx, args) => {
      const { values, positionals } = parseCommandArgs(() =>
        parseArgs({
          args,
          allowPositionals: true,
          options: {
            purpose: { type: "string" },
            takeaway: { type: "string", multiple: true },
          },
        }),
      );
      const filePath = positionalArg(positionals, 0, "path");
      return applyToWip(
        ctx,
        (h) =>
          ok(
            withSession(
              h,
              recordFileRead(h.session, filePath, {
                purpose: values.purpose ?? null,
                takeaways: values.takeaway ?? [],
              }),
            ),
          ),
        `Recorded read: ${filePath}`,
      );
    },
  ],
  [
    "modified",
    async (ctx, args) => {
      const { values, positionals } = parseCommandArgs(() =>
        parseArgs({
          args,
          allowPositionals: true,
          options: {
            summary: { type: "string", short: "s" },
            lines: { type: "string" },
          },
        }),
      );
      const filePath = positionalArg(positionals, 0, "path");
      const lines = values.lines !== undefined ? numberArg(values.lines, "--lines") : null;
      return applyToWip(
        ctx,
        (h) =>
          ok(
            withSession(
              h,
              recordFileModified(h.session, filePath, {
                change_summary: values.summary ?? null,
                lines_changed: lines !== null ? Math.max(0, Math.round(lines)) : null,
              }),
            ),
          ),
        `Recorded modification: ${filePath}`,
      );
    },
  ],
  [
    "ran",
    async (ctx, args) => {
      const { values, positionals } = parseCommandArgs(() =>
        parseArgs({
          args,
          allowPositionals: true,
          options: {
            failed: { type: "boolean" },
            purpose: { type: "string" },
            output: { type: "string" },
          },
        }),
      );
      const command = textArg(positionals, "command");
      return applyToWip(
        ctx,
        (h) =>
          ok(
            withSession(
              h,
              recordCommand(h.session, command, values.failed !== true, {
                purpose: values.purpose ?? null,
                notable_output: values.output ?? null,
              }),
            ),
          ),
        `Recorded command: ${command}`,
      );
    },
  ],
  [
    "note",
    async (ctx, args) => {
      const { values, positionals } = parseCommandArgs(() =>
        parseArgs({
          args,
          allowPositionals: true,
          options: {
            category: { type: "string", short: "c" },
            importance: { type: "string", short: "i" },
          },
        }),
      );
      const note = textArg(positionals, "note");
      const importance =
        values.importance !== undefined ? numberArg(values.importance, "--importance") : 3;
      return applyToWip(
        ctx,
        (h) =>
          ok(
            withSession(
              h,
              recordObservation(
                h.session,
                note,
                parseObservationCategory(values.category ?? "general"),
                importance,
              ),
            ),
          ),
        `Recorded observation: ${note}`,
      );
    },
  ],
  [
    "decided",
    async (ctx, args) => {
      const { values, positionals } = parseCommandArgs(() =>
        parseArgs({
          args,
          allowPositionals: true,
          options: {
            why: { type: "string", short: "w" },
            alt: { type: "string", multiple: true },
          },
        }),
      );
      const decision = textArg(positionals, "decision");
      return applyToWip(
        ctx,
        (h) =>
          ok(
            withSession(
              h,
              recordSessionDecision(h.session, decision, values.why ?? "", values.alt ?? []),
            ),
          ),
        `Recorded decision: ${decision}`,
      );
    },
  ],
  [
    "dead-end",
    async (ctx, args) => {
      const { values, positionals } = parseCommandArgs(() =>
        parseArgs({
          args,
          allowPositionals: true,
          options: { revisit: { type: "boolean" } },
        }),
      );
      const approach = positionalArg(positionals, 0, "approach");
      const reason = textArg(positionals.slice(1), "reason");
      return applyToWip(
        ctx,
        (h) =>
          ok(withSession(h, recordDeadEnd(h.session, approach, reason, values.revisit === true))),
        `Recorded dead end: ${approach}`,
      );
    },
  ],
]);

export const wipCommand: CommandHandler = actionGroup("wip", wipActions);
