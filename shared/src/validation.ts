import { z } from "zod";
import type {
  AttemptOutcome,
  Confidence,
  DebugContext,
  DeployContext,
  EvidenceKind,
  GitRef,
  GitRefType,
  Handoff,
  HandoffMode,
  Likelihood,
  ObservationCategory,
  PlanContext,
  PlanPhase,
  Priority,
  SessionState,
  WarmUpSequence,
} from "./types.js";

// ─── Enumeration Schemas ────────────────────────────────

export const ConfidenceSchema: z.ZodType<Confidence> = z.enum(["high", "medium", "low"]);

export const LikelihoodSchema: z.ZodType<Likelihood> = z.enum([
  "high",
  "medium",
  "low",
  "eliminated",
]);

export const AttemptOutcomeSchema: z.ZodType<AttemptOutcome> = z.enum([
  "fixed",
  "helped",
  "no_effect",
  "made_worse",
  "inconclusive",
]);

export const EvidenceKindSchema: z.ZodType<EvidenceKind> = z.enum([
  "observation",
  "log_entry",
  "error_message",
  "stack_trace",
  "metric",
  "user_report",
  "screenshot",
]);

export const PrioritySchema: z.ZodType<Priority> = z.enum(["must", "should", "could", "wont"]);

export const PlanPhaseSchema: z.ZodType<PlanPhase> = z.enum([
  "discovery",
  "requirements",
  "design",
  "review",
  "ready",
]);

export const ObservationCategorySchema: z.ZodType<ObservationCategory> = z.enum([
  "general",
  "pattern",
  "gotcha",
  "insight",
  "question",
  "risk",
]);

export const GitRefTypeSchema: z.ZodType<GitRefType> = z.enum([
  "commit",
  "branch",
  "pull_request",
  "tag",
]);

// ─── Context Schemas ────────────────────────────────────

export const DeployContextSchema: z.ZodType<DeployContext> = z.object({
  what_to_ship: z.array(
    z.object({
      item: z.string(),
      description: z.string(),
      confidence: ConfidenceSchema,
    }),
  ),
  verification_steps: z.array(z.string()),
  rollback_plan: z.string().nullable(),
  env_concerns: z.array(
    z.object({
      environment: z.string(),
      concern: z.string(),
      mitigation: z.string().nullable(),
    }),
  ),
  dependencies: z.array(
    z.object({
      name: z.string(),
      reason: z.string(),
      in_place: z.boolean(),
    }),
  ),
  breaking_changes: z.array(
    z.object({
      what: z.string(),
      affects: z.string(),
      migration: z.string().nullable(),
    }),
  ),
  checklist: z.array(z.object({ item: z.string(), done: z.boolean() })),
  monitoring_notes: z.string().nullable(),
});

export const DebugContextSchema: z.ZodType<DebugContext> = z.object({
  problem_statement: z.string(),
  symptoms: z.array(z.string()),
  hypotheses: z.array(
    z.object({
      theory: z.string(),
      support: z.array(z.string()),
      against: z.array(z.string()),
      likelihood: LikelihoodSchema,
    }),
  ),
  attempted: z.array(
    z.object({
      what: z.string(),
      result: z.string(),
      outcome: AttemptOutcomeSchema,
    }),
  ),
  evidence: z.array(
    z.object({
      kind: EvidenceKindSchema,
      content: z.string(),
      source: z.string().nullable(),
      timestamp: z.string().nullable(),
    }),
  ),
  suspected_files: z.array(
    z.object({
      path: z.string(),
      reason: z.string(),
      lines: z.string().nullable(),
      confidence: LikelihoodSchema,
    }),
  ),
  reproduction_steps: z.string().nullable(),
  working_theory: z.string().nullable(),
  next_to_try: z.string().nullable(),
});

export const PlanContextSchema: z.ZodType<PlanContext> = z.object({
  goal: z.string(),
  requirements: z.array(
    z.object({
      description: z.string(),
      priority: PrioritySchema,
      source: z.string().nullable(),
      confirmed: z.boolean(),
    }),
  ),
  decisions: z.array(
    z.object({
      decision: z.string(),
      rationale: z.string(),
      context: z.string().nullable(),
      reversible: z.boolean(),
    }),
  ),
  rejected_options: z.array(
    z.object({
      option: z.string(),
      reason: z.string(),
      reconsiderable: z.boolean(),
    }),
  ),
  open_questions: z.array(
    z.object({
      question: z.string(),
      importance: z.string(),
      ask_who: z.string().nullable(),
      blocking: z.boolean(),
    }),
  ),
  next_steps: z.array(z.string()),
  constraints: z.array(
    z.object({
      constraint: z.string(),
      reason: z.string().nullable(),
      negotiable: z.boolean(),
    }),
  ),
  stakeholders: z.array(z.string()),
  phase: PlanPhaseSchema,
  progress_pct: z.number().int().min(0).max(100).nullable(),
});

export const HandoffModeSchema: z.ZodType<HandoffMode> = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("deploy"), context: DeployContextSchema }),
  z.object({ kind: z.literal("debug"), context: DebugContextSchema }),
  z.object({ kind: z.literal("plan"), context: PlanContextSchema }),
]);

// ─── Session & Warm-up Schemas ──────────────────────────

export const SessionStateSchema: z.ZodType<SessionState> = z.object({
  started_at: z.string().datetime().nullable(),
  ended_at: z.string().datetime().nullable(),
  files_read: z.array(
    z.object({
      path: z.string(),
      purpose: z.string().nullable(),
      takeaways: z.array(z.string()),
      read_order: z.number().int().min(1),
    }),
  ),
  files_modified: z.array(
    z.object({
      path: z.string(),
      change_summary: z.string().nullable(),
      lines_changed: z.number().int().min(0).nullable(),
    }),
  ),
  files_created: z.array(z.string()),
  commands_run: z.array(
    z.object({
      command: z.string(),
      purpose: z.string().nullable(),
      success: z.boolean(),
      notable_output: z.string().nullable(),
    }),
  ),
  observations: z.array(
    z.object({
      note: z.string(),
      category: ObservationCategorySchema,
      importance: z.number().int().min(1).max(5),
    }),
  ),
  decisions: z.array(
    z.object({
      decision: z.string(),
      why: z.string(),
      alternatives: z.array(z.string()),
    }),
  ),
  dead_ends: z.array(
    z.object({
      approach: z.string(),
      reason: z.string(),
      revisit: z.boolean(),
    }),
  ),
});

export const WarmUpSequenceSchema: z.ZodType<WarmUpSequence> = z.object({
  priority_files: z.array(
    z.object({
      path: z.string(),
      reason: z.string(),
      focus: z.string().nullable(),
      rank: z.number().int(),
    }),
  ),
  tldr: z.string(),
  must_know: z.array(z.string()),
  suggested_start: z.string().nullable(),
  estimated_tokens: z.number().int().min(0).nullable(),
});

// ─── Handoff Schema ─────────────────────────────────────

export const GitRefSchema: z.ZodType<GitRef> = z.object({
  ref_type: GitRefTypeSchema,
  value: z.string(),
  remote: z.string().nullable(),
});

export const HandoffSchema: z.ZodType<Handoff> = z.object({
  id: z.string().uuid(),
  mode: HandoffModeSchema,
  created_by: z.string(),
  created_at: z.string().datetime(),
  summary: z.string(),
  session: SessionStateSchema,
  warm_up: WarmUpSequenceSchema,
  git_ref: GitRefSchema.nullable(),
  tags: z.array(z.string()),
});
