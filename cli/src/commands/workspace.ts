import { parseArgs } from "node:util";
import * as path from "node:path";
import { ok, err } from "neverthrow";
import { z } from "zod";
import { CURRENT_AGENT_KEY, SHORT_ID_LENGTH } from "@handoff-relay/shared";
import { summarizeSession } from "../domain/session.js";
import { formatHandoffLine } from "../prompt/prompt-builder.js";
import type { CommandContext, CommandResult } from "./shared.js";
import { parseCommandArgs } from "./shared.js";

// ─── init ───────────────────────────────────────────────

export async function initCommand(ctx: CommandContext, args: string[]): Promise<CommandResult> {
  const { positionals } = parseCommandArgs(() =>
    parseArgs({ args, options: {}, allowPositionals: true }),
  );
  const root = positionals[0] !== undefined ? path.resolve(ctx.root, positionals[0]) : ctx.root;
  const store = await ctx.open(root);

  const initialized = await store.initialize();
  if (initialized.isErr()) return err(initialized.error);

  const { sync } = ctx.config;
  ctx.io.out(`Initialized relay at ${store.layout.root}`);
  ctx.io.out(`  ${sync.pending_dir}/  - handoffs waiting to be picked up`);
  ctx.io.out(`  ${sync.archive_dir}/  - processed handoffs`);
  ctx.io.out(`  ${sync.state_dir}/  - local state (gitignored)`);
  ctx.io.out("");
  ctx.io.out("Next: Set your identity with 'relay whoami --set <your-name>'");
  return ok(undefined);
}

// ─── whoami ─────────────────────────────────────────────

export async function whoamiCommand(ctx: CommandContext, args: string[]): Promise<CommandResult> {
  const { values } = parseCommandArgs(() =>
    parseArgs({ args, options: { set: { type: "string" } } }),
  );
  const store = await ctx.open();

  if (values.set !== undefined) {
    const written = await store.writeState(CURRENT_AGENT_KEY, values.set);
    if (written.isErr()) return err(written.error);
    ctx.io.out(`Set identity to: ${values.set}`);
    return ok(undefined);
  }

  const identity = await store.readState(CURRENT_AGENT_KEY, z.string());
  if (identity.isErr()) return err(identity.error);
  ctx.io.out(
    identity.value !== null
      ? `Current identity: ${identity.value}`
      : "No identity set. Use 'relay whoami --set <your-name>'",
  );
  return ok(undefined);
}

// ─── status ─────────────────────────────────────────────

export async function statusCommand(ctx: CommandContext, args: string[]): Promise<CommandResult> {
  parseCommandArgs(() => parseArgs({ args, options: {} }));
  const store = await ctx.open();
  const { io } = ctx;

  const identity = await store.readState(CURRENT_AGENT_KEY, z.string());
  if (identity.isErr()) return err(identity.error);
  io.out(`Identity: ${identity.value ?? "(not set)"}`);

  const branch = await store.currentBranch();
  if (branch !== null) {
    const commit = await store.currentCommit();
    io.out(`Branch: ${branch}${commit !== null ? ` (${commit.slice(0, SHORT_ID_LENGTH)})` : ""}`);
  }

  const handoffs = await store.receiveHandoffs();
  if (handoffs.isErr()) return err(handoffs.error);
  io.out("");
  if (handoffs.value.length > 0) {
    io.out(`Pending handoffs: ${handoffs.value.length}`);
    for (const h of handoffs.value) {
      io.out(`  ${formatHandoffLine(h)}`);
    }
  } else {
    io.out("No pending handoffs.");
  }

  const wip = await store.loadWip();
  if (wip.isErr()) return err(wip.error);
  if (wip.value !== null) {
    io.out("");
    io.out(`Work in progress: [${wip.value.mode.kind}] ${wip.value.summary}`);
    io.out(`  ${summarizeSession(wip.value.session)}`);
  }
  return ok(undefined);
}

// ─── sync ───────────────────────────────────────────────

export async function syncCommand(ctx: CommandContext, args: string[]): Promise<CommandResult> {
  const { values } = parseCommandArgs(() =>
    parseArgs({ args, options: { "pull-only": { type: "boolean" } } }),
  );
  const store = await ctx.open();

  ctx.io.out("Pulling latest...");
  const pulled = await store.pull();
  if (pulled.isErr()) return err(pulled.error);

  if (values["pull-only"] !== true) {
    ctx.io.out("Committing local changes...");
    const committed = await store.commitChanges("relay sync");
    if (committed.isErr()) return err(committed.error);
    if (committed.value !== null) {
      ctx.io.out(`Committed ${committed.value.slice(0, SHORT_ID_LENGTH)}`);
    }
  }

  ctx.io.out("Done.");
  return ok(undefined);
}
