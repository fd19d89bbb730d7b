import type { Result } from "neverthrow";
import type { z } from "zod";
import type { Handoff } from "@handoff-relay/shared";

// ─── Error Types ────────────────────────────────────────

export class StoreError extends Error {
  constructor(
    message: string,
    public readonly code: StoreErrorCode,
  ) {
    super(message);
    this.name = "StoreError";
  }
}

export type StoreErrorCode =
  | "NOT_FOUND"
  | "IO_ERROR"
  | "PARSE_ERROR"
  | "VALIDATION_ERROR"
  | "GIT_ERROR";

// ─── Layout ─────────────────────────────────────────────

/** Resolved directories of one sync root. Built once from config. */
export interface SyncLayout {
  root: string;
  pendingDir: string;
  archiveDir: string;
  /** Local-only; ignored by git. */
  stateDir: string;
  autoCommit: boolean;
}

// ─── Store Interface ────────────────────────────────────

export interface IHandoffStore {
  readonly layout: SyncLayout;

  // Lifecycle
  initialize(): Promise<Result<void, StoreError>>;

  // Pending / archive
  sendHandoff(handoff: Handoff): Promise<Result<string, StoreError>>;
  receiveHandoffs(): Promise<Result<Handoff[], StoreError>>;
  hasPendingHandoffs(): Promise<Result<boolean, StoreError>>;
  archiveHandoff(shortId: string): Promise<Result<string, StoreError>>;
  listArchivedHandoffs(): Promise<Result<Handoff[], StoreError>>;

  // WIP slot
  saveWip(handoff: Handoff): Promise<Result<void, StoreError>>;
  loadWip(): Promise<Result<Handoff | null, StoreError>>;
  clearWip(): Promise<Result<void, StoreError>>;

  // Key/value state
  readState<T>(key: string, schema: z.ZodType<T>): Promise<Result<T | null, StoreError>>;
  writeState<T>(key: string, value: T): Promise<Result<void, StoreError>>;

  // Version control
  commitChanges(message: string): Promise<Result<string | null, StoreError>>;
  pull(): Promise<Result<void, StoreError>>;
  currentCommit(): Promise<string | null>;
  currentBranch(): Promise<string | null>;
}
