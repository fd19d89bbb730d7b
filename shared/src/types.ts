/**
 * Persisted data model for handoffs.
 * Field names are snake_case because they are written to disk as-is.
 */

// ─── Enumerations ───────────────────────────────────────

export type Confidence = "high" | "medium" | "low";

export type Likelihood = "high" | "medium" | "low" | "eliminated";

export type AttemptOutcome =
  | "fixed"
  | "helped"
  | "no_effect"
  | "made_worse"
  | "inconclusive";

export type EvidenceKind =
  | "observation"
  | "log_entry"
  | "error_message"
  | "stack_trace"
  | "metric"
  | "user_report"
  | "screenshot";

export type Priority = "must" | "should" | "could" | "wont";

export type PlanPhase =
  | "discovery"
  | "requirements"
  | "design"
  | "review"
  | "ready";

export type ObservationCategory =
  | "general"
  | "pattern"
  | "gotcha"
  | "insight"
  | "question"
  | "risk";

export type GitRefType = "commit" | "branch" | "pull_request" | "tag";

// ─── Deploy Context ─────────────────────────────────────

export interface ShipItem {
  item: string;
  description: string;
  confidence: Confidence;
}

export interface EnvConcern {
  environment: string;
  concern: string;
  mitigation: string | null;
}

export interface DeployDependency {
  name: string;
  reason: string;
  in_place: boolean;
}

export interface BreakingChange {
  what: string;
  affects: string;
  migration: string | null;
}

export interface ChecklistItem {
  item: string;
  done: boolean;
}

export interface DeployContext {
  what_to_ship: ShipItem[];
  verification_steps: string[];
  rollback_plan: string | null;
  env_concerns: EnvConcern[];
  dependencies: DeployDependency[];
  breaking_changes: BreakingChange[];
  checklist: ChecklistItem[];
  monitoring_notes: string | null;
}

// ─── Debug Context ──────────────────────────────────────

export interface Hypothesis {
  theory: string;
  support: string[];
  against: string[];
  likelihood: Likelihood;
}

export interface Attempt {
  what: string;
  result: string;
  outcome: AttemptOutcome;
}

export interface Evidence {
  kind: EvidenceKind;
  content: string;
  source: string | null;
  timestamp: string | null;
}

export interface SuspectedFile {
  path: string;
  reason: string;
  lines: string | null;
  confidence: Likelihood;
}

export interface DebugContext {
  problem_statement: string;
  symptoms: string[];
  hypotheses: Hypothesis[];
  attempted: Attempt[];
  evidence: Evidence[];
  suspected_files: SuspectedFile[];
  reproduction_steps: string | null;
  working_theory: string | null;
  next_to_try: string | null;
}

// ─── Plan Context ───────────────────────────────────────

export interface Requirement {
  description: string;
  priority: Priority;
  source: string | null;
  confirmed: boolean;
}

export interface PlanDecision {
  decision: string;
  rationale: string;
  context: string | null;
  reversible: boolean;
}

export interface RejectedOption {
  option: string;
  reason: string;
  reconsiderable: boolean;
}

export interface OpenQuestion {
  question: string;
  importance: string;
  ask_who: string | null;
  blocking: boolean;
}

export interface Constraint {
  constraint: string;
  reason: string | null;
  negotiable: boolean;
}

export interface PlanContext {
  goal: string;
  requirements: Requirement[];
  decisions: PlanDecision[];
  rejected_options: RejectedOption[];
  open_questions: OpenQuestion[];
  next_steps: string[];
  constraints: Constraint[];
  stakeholders: string[];
  phase: PlanPhase;
  progress_pct: number | null;
}

// ─── Mode ───────────────────────────────────────────────

export type HandoffMode =
  | { kind: "deploy"; context: DeployContext }
  | { kind: "debug"; context: DebugContext }
  | { kind: "plan"; context: PlanContext };

export type ModeKind = HandoffMode["kind"];

// ─── Session State ──────────────────────────────────────

export interface FileRead {
  path: string;
  purpose: string | null;
  takeaways: string[];
  read_order: number;
}

export interface FileModified {
  path: string;
  change_summary: string | null;
  lines_changed: number | null;
}

export interface CommandRun {
  command: string;
  purpose: string | null;
  success: boolean;
  notable_output: string | null;
}

export interface Observation {
  note: string;
  category: ObservationCategory;
  importance: number;
}

export interface SessionDecision {
  decision: string;
  why: string;
  alternatives: string[];
}

export interface DeadEnd {
  approach: string;
  reason: string;
  revisit: boolean;
}

export interface SessionState {
  started_at: string | null;
  ended_at: string | null;
  files_read: FileRead[];
  files_modified: FileModified[];
  files_created: string[];
  commands_run: CommandRun[];
  observations: Observation[];
  decisions: SessionDecision[];
  dead_ends: DeadEnd[];
}

// ─── Warm-up ────────────────────────────────────────────

export interface PriorityFile {
  path: string;
  reason: string;
  focus: string | null;
  /** 1 is highest. Not checked for uniqueness or gaps. */
  rank: number;
}

export interface WarmUpSequence {
  priority_files: PriorityFile[];
  tldr: string;
  must_know: string[];
  suggested_start: string | null;
  estimated_tokens: number | null;
}

// ─── Handoff ────────────────────────────────────────────

export interface GitRef {
  ref_type: GitRefType;
  value: string;
  remote: string | null;
}

export interface Handoff {
  id: string;
  mode: HandoffMode;
  created_by: string;
  created_at: string;
  summary: string;
  session: SessionState;
  warm_up: WarmUpSequence;
  git_ref: GitRef | null;
  tags: string[];
}
