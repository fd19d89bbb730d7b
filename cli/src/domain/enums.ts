import { ok, err, Result } from "neverthrow";
import type {
  AttemptOutcome,
  Confidence,
  EvidenceKind,
  Likelihood,
  ModeKind,
  ObservationCategory,
  PlanPhase,
  Priority,
} from "@handoff-relay/shared";
import {
  ATTEMPT_OUTCOMES,
  CONFIDENCES,
  ENUM_DEFAULTS,
  EVIDENCE_KINDS,
  EVIDENCE_KIND_ALIASES,
  LIKELIHOODS,
  MODE_ALIASES,
  OBSERVATION_CATEGORIES,
  OUTCOME_ALIASES,
  PLAN_PHASES,
  PRIORITIES,
  PRIORITY_ALIASES,
} from "@handoff-relay/shared";
import { HandoffError, invalidMode } from "./errors.js";

// ─── Token Normalisation ────────────────────────────────

function normalize(token: string): string {
  return token.trim().toLowerCase().replace(/[\s_]+/g, "-");
}

/** Own keys only; `constructor` and friends are not aliases. */
function alias<T>(aliases: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(aliases, key) ? aliases[key] : undefined;
}

function lookup<T extends string>(
  token: string,
  values: readonly T[],
  aliases: Readonly<Record<string, T>>,
  fallback: T,
): T {
  const key = normalize(token);
  const canonical = values.find((v) => v.replace(/_/g, "-") === key);
  return canonical ?? alias(aliases, key) ?? fallback;
}

// ─── Lenient Parsers ────────────────────────────────────
// Free-text tokens never fail; unknown input maps to the documented default.

export function parseConfidence(token: string): Confidence {
  return lookup(token, CONFIDENCES, {}, ENUM_DEFAULTS.confidence);
}

export function parseLikelihood(token: string): Likelihood {
  return lookup(token, LIKELIHOODS, {}, ENUM_DEFAULTS.likelihood);
}

export function parseAttemptOutcome(token: string): AttemptOutcome {
  return lookup(token, ATTEMPT_OUTCOMES, OUTCOME_ALIASES, ENUM_DEFAULTS.outcome);
}

export function parseEvidenceKind(token: string): EvidenceKind {
  return lookup(token, EVIDENCE_KINDS, EVIDENCE_KIND_ALIASES, ENUM_DEFAULTS.evidenceKind);
}

export function parsePriority(token: string): Priority {
  return lookup(token, PRIORITIES, PRIORITY_ALIASES, ENUM_DEFAULTS.priority);
}

export function parseObservationCategory(token: string): ObservationCategory {
  return lookup(token, OBSERVATION_CATEGORIES, {}, ENUM_DEFAULTS.category);
}

export function parsePlanPhase(token: string): PlanPhase {
  return lookup(token, PLAN_PHASES, {}, ENUM_DEFAULTS.phase);
}

// ─── Mode Tokens ────────────────────────────────────────

/** Unlike the parsers above, an unknown mode is an error. */
export function parseModeKind(token: string): Result<ModeKind, HandoffError> {
  const kind = alias(MODE_ALIASES, normalize(token));
  if (kind === undefined) {
    return err(invalidMode(token));
  }
  return ok(kind);
}
