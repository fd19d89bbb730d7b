import type {
  AttemptOutcome,
  Confidence,
  EvidenceKind,
  GitRefType,
  Likelihood,
  ModeKind,
  ObservationCategory,
  PlanPhase,
  Priority,
} from "./types.js";

// ─── Closed Value Sets ──────────────────────────────────

export const CONFIDENCES: readonly Confidence[] = ["high", "medium", "low"] as const;

export const LIKELIHOODS: readonly Likelihood[] = [
  "high",
  "medium",
  "low",
  "eliminated",
] as const;

export const ATTEMPT_OUTCOMES: readonly AttemptOutcome[] = [
  "fixed",
  "helped",
  "no_effect",
  "made_worse",
  "inconclusive",
] as const;

export const EVIDENCE_KINDS: readonly EvidenceKind[] = [
  "observation",
  "log_entry",
  "error_message",
  "stack_trace",
  "metric",
  "user_report",
  "screenshot",
] as const;

export const PRIORITIES: readonly Priority[] = ["must", "should", "could", "wont"] as const;

export const PLAN_PHASES: readonly PlanPhase[] = [
  "discovery",
  "requirements",
  "design",
  "review",
  "ready",
] as const;

export const OBSERVATION_CATEGORIES: readonly ObservationCategory[] = [
  "general",
  "pattern",
  "gotcha",
  "insight",
  "question",
  "risk",
] as const;

// ─── Lenient Parsing Defaults ───────────────────────────

/** Fallbacks used when a boundary token is not recognised. */
export const ENUM_DEFAULTS = {
  confidence: "medium",
  likelihood: "medium",
  outcome: "no_effect",
  evidenceKind: "observation",
  priority: "should",
  category: "general",
  phase: "discovery",
} as const satisfies {
  confidence: Confidence;
  likelihood: Likelihood;
  outcome: AttemptOutcome;
  evidenceKind: EvidenceKind;
  priority: Priority;
  category: ObservationCategory;
  phase: PlanPhase;
};

/**
 * Extra spellings accepted at the boundary, keyed by normalised token
 * (lower-case, spaces and underscores turned into hyphens).
 * Canonical values are matched separately.
 */
export const OUTCOME_ALIASES: Readonly<Record<string, AttemptOutcome>> = {
  "no-effect": "no_effect",
  nothing: "no_effect",
  none: "no_effect",
  "made-worse": "made_worse",
  worse: "made_worse",
  fix: "fixed",
  help: "helped",
};

export const EVIDENCE_KIND_ALIASES: Readonly<Record<string, EvidenceKind>> = {
  log: "log_entry",
  "log-entry": "log_entry",
  error: "error_message",
  "error-message": "error_message",
  stack: "stack_trace",
  stacktrace: "stack_trace",
  "stack-trace": "stack_trace",
  trace: "stack_trace",
  "user-report": "user_report",
  report: "user_report",
};

export const PRIORITY_ALIASES: Readonly<Record<string, Priority>> = {
  "won't": "wont",
  "will-not": "wont",
};

export const MODE_ALIASES: Readonly<Record<string, ModeKind>> = {
  deploy: "deploy",
  deployment: "deploy",
  ship: "deploy",
  debug: "debug",
  troubleshoot: "debug",
  fix: "debug",
  plan: "plan",
  planning: "plan",
  design: "plan",
};

// ─── Display Labels ─────────────────────────────────────

export const MODE_LABELS: Record<ModeKind, string> = {
  deploy: "Deploy",
  debug: "Debug",
  plan: "Plan",
};

export const CONFIDENCE_LABELS: Record<Confidence, string> = {
  high: "High",
  medium: "Medium",
  low: "Low",
};

export const LIKELIHOOD_LABELS: Record<Likelihood, string> = {
  high: "High",
  medium: "Medium",
  low: "Low",
  eliminated: "Eliminated",
};

export const ATTEMPT_OUTCOME_LABELS: Record<AttemptOutcome, string> = {
  fixed: "Fixed",
  helped: "Helped",
  no_effect: "No effect",
  made_worse: "Made worse",
  inconclusive: "Inconclusive",
};

export const EVIDENCE_KIND_LABELS: Record<EvidenceKind, string> = {
  observation: "Observation",
  log_entry: "Log entry",
  error_message: "Error message",
  stack_trace: "Stack trace",
  metric: "Metric",
  user_report: "User report",
  screenshot: "Screenshot",
};

export const PRIORITY_LABELS: Record<Priority, string> = {
  must: "Must",
  should: "Should",
  could: "Could",
  wont: "Won't",
};

export const PLAN_PHASE_LABELS: Record<PlanPhase, string> = {
  discovery: "Discovery",
  requirements: "Requirements",
  design: "Design",
  review: "Review",
  ready: "Ready",
};

export const GIT_REF_LABELS: Record<GitRefType, string> = {
  commit: "Commit",
  branch: "Branch",
  pull_request: "Pull request",
  tag: "Tag",
};

// ─── Store Layout ───────────────────────────────────────

export const HANDOFF_FILE_EXTENSION = ".json";

export const WIP_STATE_FILE = "wip.json";

/** State key holding the identity of whoever works in this checkout. */
export const CURRENT_AGENT_KEY = "current_agent";

export const SHORT_ID_LENGTH = 8;
