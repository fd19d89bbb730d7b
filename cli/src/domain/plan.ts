import type { PlanContext, PlanPhase, Priority } from "@handoff-relay/shared";
import { PLAN_PHASE_LABELS, PRIORITY_LABELS } from "@handoff-relay/shared";
import { block, bullets, numbered, section } from "../prompt/markdown.js";

// ─── Inputs ─────────────────────────────────────────────

export interface RequirementInput {
  description: string;
  priority?: Priority;
  source?: string | null;
  confirmed?: boolean;
}

export interface DecisionInput {
  decision: string;
  rationale: string;
  context?: string | null;
  reversible?: boolean;
}

export interface RejectedOptionInput {
  option: string;
  reason: string;
  reconsiderable?: boolean;
}

export interface OpenQuestionInput {
  question: string;
  importance: string;
  ask_who?: string | null;
  blocking?: boolean;
}

export interface ConstraintInput {
  constraint: string;
  reason?: string | null;
  negotiable?: boolean;
}

// ─── Factory ────────────────────────────────────────────

export function createPlanContext(goal: string): PlanContext {
  return {
    goal,
    requirements: [],
    decisions: [],
    rejected_options: [],
    open_questions: [],
    next_steps: [],
    constraints: [],
    stakeholders: [],
    phase: "discovery",
    progress_pct: null,
  };
}

// ─── Mutators ───────────────────────────────────────────

export function addRequirement(ctx: PlanContext, input: RequirementInput): PlanContext {
  return {
    ...ctx,
    requirements: [
      ...ctx.requirements,
      {
        description: input.description,
        priority: input.priority ?? "should",
        source: input.source ?? null,
        confirmed: input.confirmed ?? false,
      },
    ],
  };
}

export function recordPlanDecision(ctx: PlanContext, input: DecisionInput): PlanContext {
  return {
    ...ctx,
    decisions: [
      ...ctx.decisions,
      {
        decision: input.decision,
        rationale: input.rationale,
        context: input.context ?? null,
        reversible: input.reversible ?? true,
      },
    ],
  };
}

export function rejectOption(ctx: PlanContext, input: RejectedOptionInput): PlanContext {
  return {
    ...ctx,
    rejected_options: [
      ...ctx.rejected_options,
      {
        option: input.option,
        reason: input.reason,
        reconsiderable: input.reconsiderable ?? true,
      },
    ],
  };
}

export function addOpenQuestion(ctx: PlanContext, input: OpenQuestionInput): PlanContext {
  return {
    ...ctx,
    open_questions: [
      ...ctx.open_questions,
      {
        question: input.question,
        importance: input.importance,
        ask_who: input.ask_who ?? null,
        blocking: input.blocking ?? false,
      },
    ],
  };
}

export function addNextStep(ctx: PlanContext, step: string): PlanContext {
  return { ...ctx, next_steps: [...ctx.next_steps, step] };
}

export function addConstraint(ctx: PlanContext, input: ConstraintInput): PlanContext {
  return {
    ...ctx,
    constraints: [
      ...ctx.constraints,
      {
        constraint: input.constraint,
        reason: input.reason ?? null,
        negotiable: input.negotiable ?? false,
      },
    ],
  };
}

export function addStakeholder(ctx: PlanContext, stakeholder: string): PlanContext {
  return { ...ctx, stakeholders: [...ctx.stakeholders, stakeholder] };
}

export function setPlanPhase(ctx: PlanContext, phase: PlanPhase): PlanContext {
  return { ...ctx, phase };
}

/** Rounds to a whole percentage and clamps into [0, 100]. */
export function setProgress(ctx: PlanContext, pct: number): PlanContext {
  const clamped = Math.min(100, Math.max(0, Math.round(pct)));
  return { ...ctx, progress_pct: Number.isNaN(clamped) ? 0 : clamped };
}

// ─── Compile ────────────────────────────────────────────

export function compilePlanContext(ctx: PlanContext): string {
  const progress = ctx.progress_pct !== null ? ` (${ctx.progress_pct}% complete)` : "";

  return [
    block("## Planning Context"),
    block("### Goal") + block(ctx.goal),
    block(`**Phase**: ${PLAN_PHASE_LABELS[ctx.phase]}${progress}`),
    section(
      "### Requirements",
      ctx.requirements.map((r) => {
        const confirmed = r.confirmed ? " ✓" : "";
        const source = r.source !== null ? ` (source: ${r.source})` : "";
        return `- **${PRIORITY_LABELS[r.priority]}**${confirmed}: ${r.description}${source}`;
      }),
    ),
    section(
      "### Decisions Made",
      ctx.decisions.flatMap((d) => [
        `- **${d.decision}**`,
        ...(d.rationale.length > 0 ? [`  Rationale: ${d.rationale}`] : []),
        ...(d.context !== null ? [`  Context: ${d.context}`] : []),
      ]),
    ),
    section(
      "### Options Rejected",
      ctx.rejected_options.map((r) => {
        const reconsider = r.reconsiderable ? " (could reconsider)" : "";
        return `- ~~${r.option}~~${reconsider}: ${r.reason}`;
      }),
    ),
    section(
      "### Open Questions",
      ctx.open_questions.flatMap((q) => [
        `- ${q.question}${q.blocking ? " **[BLOCKING]**" : ""}`,
        `  Why it matters: ${q.importance}`,
        ...(q.ask_who !== null ? [`  Ask: ${q.ask_who}`] : []),
      ]),
    ),
    section(
      "### Constraints",
      ctx.constraints.flatMap((c) => [
        `- ${c.constraint}${c.negotiable ? " (negotiable)" : ""}`,
        ...(c.reason !== null ? [`  Reason: ${c.reason}`] : []),
      ]),
    ),
    section("### Suggested Next Steps", numbered(ctx.next_steps)),
    section("### Stakeholders", bullets(ctx.stakeholders)),
  ].join("");
}
