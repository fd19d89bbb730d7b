import type { ModeKind } from "@handoff-relay/shared";

// ─── Domain Conditions ──────────────────────────────────

export type HandoffErrorCode =
  | "NO_ACTIVE_HANDOFF"
  | "IDENTITY_NOT_REGISTERED"
  | "INVALID_MODE"
  | "MODE_MISMATCH";

export class HandoffError extends Error {
  constructor(
    message: string,
    public readonly code: HandoffErrorCode,
  ) {
    super(message);
    this.name = "HandoffError";
  }
}

export function noActiveHandoff(): HandoffError {
  return new HandoffError(
    "No active handoff in progress. Start one with 'relay deploy new', 'relay debug new', or 'relay plan new'",
    "NO_ACTIVE_HANDOFF",
  );
}

export function identityNotRegistered(): HandoffError {
  return new HandoffError(
    "Identity not registered. Set one with 'relay whoami --set <name>'",
    "IDENTITY_NOT_REGISTERED",
  );
}

export function invalidMode(token: string): HandoffError {
  return new HandoffError(
    `Invalid mode: ${token}. Use deploy, debug, or plan.`,
    "INVALID_MODE",
  );
}

export function modeMismatch(expected: ModeKind, actual: ModeKind): HandoffError {
  return new HandoffError(
    `Active handoff is a ${actual} handoff, not ${expected}`,
    "MODE_MISMATCH",
  );
}

// ─── Serialization ──────────────────────────────────────

export class SerializationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SerializationError";
  }
}

/** Message text of a caught value, unmodified. */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
