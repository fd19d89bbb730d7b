import { ok, err, Result } from "neverthrow";
import { z } from "zod";
import type { Logger } from "pino";
import type { Handoff } from "@handoff-relay/shared";
import { CURRENT_AGENT_KEY } from "@handoff-relay/shared";
import type { AppConfig } from "../config/index.js";
import { HandoffError, errorMessage, identityNotRegistered, noActiveHandoff } from "../domain/errors.js";
import type { IHandoffStore, StoreError } from "../store/index.js";

// ─── Types ──────────────────────────────────────────────

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

/** Bad arguments. Thrown by handlers and caught once in `runCli`. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export type CommandError = StoreError | HandoffError;

export type CommandResult = Result<void, CommandError>;

export interface CommandContext {
  io: CliIo;
  logger: Logger;
  config: AppConfig;
  /** Sync root from `--dir`, or the working directory. */
  root: string;
  open(root?: string): Promise<IHandoffStore>;
}

export type CommandHandler = (ctx: CommandContext, args: string[]) => Promise<CommandResult>;

// ─── Argument Helpers ───────────────────────────────────

/** Run a `parseArgs` call, turning its errors into usage errors. */
export function parseCommandArgs<T>(parse: () => T): T {
  try {
    return parse();
  } catch (e) {
    throw new UsageError(errorMessage(e));
  }
}

/** All positionals joined into one free-text argument. */
export function textArg(positionals: string[], name: string): string {
  const text = positionals.join(" ").trim();
  if (text.length === 0) throw new UsageError(`missing <${name}>`);
  return text;
}

export function positionalArg(positionals: string[], index: number, name: string): string {
  const value = positionals[index];
  if (value === undefined || value.length === 0) throw new UsageError(`missing <${name}>`);
  return value;
}

export function numberArg(value: string, name: string): number {
  const n = Number(value);
  if (value.trim().length === 0 || !Number.isFinite(n)) {
    throw new UsageError(`${name} must be a number, got '${value}'`);
  }
  return n;
}

export function splitList(value: string | undefined): string[] {
  if (value === undefined) return [];
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

// ─── Store Helpers ──────────────────────────────────────

export async function requireIdentity(
  store: IHandoffStore,
): Promise<Result<string, CommandError>> {
  const identity = await store.readState(CURRENT_AGENT_KEY, z.string());
  if (identity.isErr()) return err(identity.error);
  if (identity.value === null) return err(identityNotRegistered());
  return ok(identity.value);
}

export async function requireWip(store: IHandoffStore): Promise<Result<Handoff, CommandError>> {
  const wip = await store.loadWip();
  if (wip.isErr()) return err(wip.error);
  if (wip.value === null) return err(noActiveHandoff());
  return ok(wip.value);
}

/** Load the WIP, apply one change and save it back. */
export async function mutateWip(
  store: IHandoffStore,
  change: (h: Handoff) => Result<Handoff, HandoffError>,
): Promise<Result<Handoff, CommandError>> {
  const wip = await requireWip(store);
  if (wip.isErr()) return wip;

  const updated = change(wip.value);
  if (updated.isErr()) return err(updated.error);

  const saved = await store.saveWip(updated.value);
  if (saved.isErr()) return err(saved.error);
  return ok(updated.value);
}
