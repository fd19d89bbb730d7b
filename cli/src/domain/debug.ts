import type {
  AttemptOutcome,
  DebugContext,
  EvidenceKind,
  Likelihood,
} from "@handoff-relay/shared";
import {
  ATTEMPT_OUTCOME_LABELS,
  EVIDENCE_KIND_LABELS,
  LIKELIHOOD_LABELS,
} from "@handoff-relay/shared";
import { block, bullets, section } from "../prompt/markdown.js";

// ─── Inputs ─────────────────────────────────────────────

export interface HypothesisInput {
  theory: string;
  likelihood?: Likelihood;
  support?: string[];
  against?: string[];
}

export interface EvidenceInput {
  kind?: EvidenceKind;
  content: string;
  source?: string | null;
  timestamp?: string | null;
}

export interface SuspectedFileInput {
  path: string;
  reason: string;
  lines?: string | null;
  confidence?: Likelihood;
}

// ─── Factory ────────────────────────────────────────────

/** The problem statement is fixed here; there is no setter for it. */
export function createDebugContext(problem: string): DebugContext {
  return {
    problem_statement: problem,
    symptoms: [],
    hypotheses: [],
    attempted: [],
    evidence: [],
    suspected_files: [],
    reproduction_steps: null,
    working_theory: null,
    next_to_try: null,
  };
}

// ─── Mutators ───────────────────────────────────────────

export function addSymptom(ctx: DebugContext, symptom: string): DebugContext {
  return { ...ctx, symptoms: [...ctx.symptoms, symptom] };
}

export function addHypothesis(ctx: DebugContext, input: HypothesisInput): DebugContext {
  return {
    ...ctx,
    hypotheses: [
      ...ctx.hypotheses,
      {
        theory: input.theory,
        support: input.support ?? [],
        against: input.against ?? [],
        likelihood: input.likelihood ?? "medium",
      },
    ],
  };
}

export function recordAttempt(
  ctx: DebugContext,
  what: string,
  result: string,
  outcome: AttemptOutcome = "no_effect",
): DebugContext {
  return { ...ctx, attempted: [...ctx.attempted, { what, result, outcome }] };
}

export function addEvidence(ctx: DebugContext, input: EvidenceInput): DebugContext {
  return {
    ...ctx,
    evidence: [
      ...ctx.evidence,
      {
        kind: input.kind ?? "observation",
        content: input.content,
        source: input.source ?? null,
        timestamp: input.timestamp ?? null,
      },
    ],
  };
}

export function addSuspectedFile(
  ctx: DebugContext,
  input: SuspectedFileInput,
): DebugContext {
  return {
    ...ctx,
    suspected_files: [
      ...ctx.suspected_files,
      {
        path: input.path,
        reason: input.reason,
        lines: input.lines ?? null,
        confidence: input.confidence ?? "medium",
      },
    ],
  };
}

export function setReproductionSteps(ctx: DebugContext, steps: string): DebugContext {
  return { ...ctx, reproduction_steps: steps };
}

export function setWorkingTheory(ctx: DebugContext, theory: string): DebugContext {
  return { ...ctx, working_theory: theory };
}

export function setNextToTry(ctx: DebugContext, next: string): DebugContext {
  return { ...ctx, next_to_try: next };
}

// ─── Compile ────────────────────────────────────────────

function optionalBlock(heading: string, text: string | null): string {
  return text !== null ? block(heading) + block(text) : "";
}

/**
 * Sub-sections always appear in this order: Problem, Symptoms, How to
 * Reproduce, Current Working Theory, Hypotheses, Already Tried, Evidence,
 * Suspected Files, Suggested Next Step.
 */
export function compileDebugContext(ctx: DebugContext): string {
  const evidence =
    ctx.evidence.length > 0
      ? block("### Evidence") +
        ctx.evidence
          .map((e) => {
            const from = e.source !== null ? ` (from ${e.source})` : "";
            return block(
              `**${EVIDENCE_KIND_LABELS[e.kind]}**${from}:`,
              "```",
              e.content,
              "```",
            );
          })
          .join("")
      : "";

  return [
    block("## Troubleshooting Context"),
    block("### Problem") + block(ctx.problem_statement),
    section("### Symptoms", bullets(ctx.symptoms)),
    optionalBlock("### How to Reproduce", ctx.reproduction_steps),
    optionalBlock("### Current Working Theory", ctx.working_theory),
    section(
      "### Hypotheses",
      ctx.hypotheses.flatMap((h) => [
        `- **${LIKELIHOOD_LABELS[h.likelihood]}**: ${h.theory}`,
        ...h.support.map((s) => `  - Supports: ${s}`),
        ...h.against.map((a) => `  - Against: ${a}`),
      ]),
    ),
    section(
      "### Already Tried",
      ctx.attempted.map(
        (a) => `- **${a.what}** → ${a.result} (${ATTEMPT_OUTCOME_LABELS[a.outcome]})`,
      ),
    ),
    evidence,
    section(
      "### Suspected Files",
      ctx.suspected_files.flatMap((sf) => [
        `- \`${sf.path}\` (${LIKELIHOOD_LABELS[sf.confidence]}): ${sf.reason}`,
        ...(sf.lines !== null ? [`  Lines: ${sf.lines}`] : []),
      ]),
    ),
    optionalBlock("### Suggested Next Step", ctx.next_to_try),
  ].join("");
}
