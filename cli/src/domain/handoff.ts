import { randomUUID } from "node:crypto";
import { ok, err, Result } from "neverthrow";
import type {
  DebugContext,
  DeployContext,
  GitRef,
  Handoff,
  HandoffMode,
  ModeKind,
  PlanContext,
  SessionState,
  WarmUpSequence,
} from "@handoff-relay/shared";
import {
  HANDOFF_FILE_EXTENSION,
  HandoffSchema,
  SHORT_ID_LENGTH,
} from "@handoff-relay/shared";
import { HandoffError, SerializationError, errorMessage, modeMismatch } from "./errors.js";
import { emptySessionState } from "./session.js";
import { createWarmUp } from "./warm-up.js";

// ─── Construction ───────────────────────────────────────

export function createHandoff(
  mode: HandoffMode,
  summary: string,
  createdBy: string,
  now: Date = new Date(),
): Handoff {
  return {
    id: randomUUID(),
    mode,
    created_by: createdBy,
    created_at: now.toISOString(),
    summary,
    session: emptySessionState(),
    warm_up: createWarmUp(),
    git_ref: null,
    tags: [],
  };
}

// ─── Enrichment ─────────────────────────────────────────

export function withSession(h: Handoff, session: SessionState): Handoff {
  return { ...h, session };
}

export function withWarmUp(h: Handoff, warmUp: WarmUpSequence): Handoff {
  return { ...h, warm_up: warmUp };
}

export function withGitRef(h: Handoff, gitRef: GitRef): Handoff {
  return { ...h, git_ref: gitRef };
}

/** Tags keep insertion order; duplicates are kept. */
export function withTag(h: Handoff, tag: string): Handoff {
  return { ...h, tags: [...h.tags, tag] };
}

export function commitRef(hash: string, remote: string | null = null): GitRef {
  return { ref_type: "commit", value: hash, remote };
}

export function branchRef(name: string, remote: string | null = null): GitRef {
  return { ref_type: "branch", value: name, remote };
}

export function pullRequestRef(pr: string, remote: string | null = null): GitRef {
  return { ref_type: "pull_request", value: pr, remote };
}

export function tagRef(tag: string, remote: string | null = null): GitRef {
  return { ref_type: "tag", value: tag, remote };
}

// ─── Mode-guarded Updates ───────────────────────────────

function mismatch(h: Handoff, expected: ModeKind): Result<Handoff, HandoffError> {
  return err(modeMismatch(expected, h.mode.kind));
}

export function updateDeployContext(
  h: Handoff,
  fn: (ctx: DeployContext) => DeployContext,
): Result<Handoff, HandoffError> {
  if (h.mode.kind !== "deploy") return mismatch(h, "deploy");
  return ok({ ...h, mode: { kind: "deploy", context: fn(h.mode.context) } });
}

export function updateDebugContext(
  h: Handoff,
  fn: (ctx: DebugContext) => DebugContext,
): Result<Handoff, HandoffError> {
  if (h.mode.kind !== "debug") return mismatch(h, "debug");
  return ok({ ...h, mode: { kind: "debug", context: fn(h.mode.context) } });
}

export function updatePlanContext(
  h: Handoff,
  fn: (ctx: PlanContext) => PlanContext,
): Result<Handoff, HandoffError> {
  if (h.mode.kind !== "plan") return mismatch(h, "plan");
  return ok({ ...h, mode: { kind: "plan", context: fn(h.mode.context) } });
}

// ─── Naming ─────────────────────────────────────────────

export function handoffShortId(h: Handoff): string {
  return h.id.slice(0, SHORT_ID_LENGTH);
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** `YYYYMMDD_HHMMSS_<shortId>.json`, from the UTC creation time. */
export function handoffFileName(h: Handoff): string {
  const d = new Date(h.created_at);
  const date = `${d.getUTCFullYear()}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}`;
  const time = `${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}${pad(d.getUTCSeconds())}`;
  return `${date}_${time}_${handoffShortId(h)}${HANDOFF_FILE_EXTENSION}`;
}

// ─── Serialization ──────────────────────────────────────

/** Validated before encoding, so whatever is written parses back. */
export function serializeHandoff(h: Handoff): Result<string, SerializationError> {
  const checked = HandoffSchema.safeParse(h);
  if (!checked.success) {
    return err(new SerializationError(checked.error.message));
  }
  return ok(JSON.stringify(h, null, 2));
}

export function parseHandoff(json: string): Result<Handoff, SerializationError> {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (e) {
    return err(new SerializationError(errorMessage(e)));
  }
  const parsed = HandoffSchema.safeParse(raw);
  if (!parsed.success) {
    return err(new SerializationError(parsed.error.message));
  }
  return ok(parsed.data);
}
