import { parseArgs } from "node:util";
import { PLAN_PHASE_LABELS } from "@handoff-relay/shared";
import {
  addEvidence,
  addHypothesis,
  addSuspectedFile,
  addSymptom,
  recordAttempt,
  setNextToTry,
  setReproductionSteps,
  setWorkingTheory,
} from "../domain/debug.js";
import {
  addBreakingChange,
  addChecklistItem,
  addDependency,
  addEnvConcern,
  addShipItem,
  addVerificationStep,
  setMonitoringNotes,
  setRollbackPlan,
} from "../domain/deploy.js";
import {
  parseAttemptOutcome,
  parseConfidence,
  parseEvidenceKind,
  parseLikelihood,
  parsePlanPhase,
  parsePriority,
} from "../domain/enums.js";
import { updateDebugContext, updateDeployContext, updatePlanContext } from "../domain/handoff.js";
import {
  addConstraint,
  addNextStep,
  addOpenQuestion,
  addRequirement,
  addStakeholder,
  recordPlanDecision,
  rejectOption,
  setPlanPhase,
  setProgress,
} from "../domain/plan.js";
import type { CommandHandler } from "./shared.js";
import { numberArg, parseCommandArgs, positionalArg, textArg } from "./shared.js";
import type { ActionHandler } from "./wip.js";
import { actionGroup, applyToWip, finishWip, startWip } from "./wip.js";

function positionalsOf(args: string[]): string[] {
  return parseCommandArgs(() => parseArgs({ args, options: {}, allowPositionals: true }))
    .positionals;
}

function noArgs(args: string[]): void {
  parseCommandArgs(() => parseArgs({ args, options: {} }));
}

// ─── relay deploy ───────────────────────────────────────

const deployActions = new Map<string, ActionHandler>([
  ["new", (ctx, args) => startWip(ctx, "deploy", textArg(positionalsOf(args), "summary"))],
  [
    "ship",
    (ctx, args) => {
      const { values, positionals } = parseCommandArgs(() =>
        parseArgs({
          args,
          allowPositionals: true,
          options: {
            description: { type: "string", short: "d" },
            confidence: { type: "string", short: "c" },
          },
        }),
      );
      const item = textArg(positionals, "item");
      const confidence = parseConfidence(values.confidence ?? "medium");
      return applyToWip(
        ctx,
        (h) =>
          updateDeployContext(h, (c) =>
            addShipItem(c, item, values.description ?? item, confidence),
          ),
        `Added to ship: ${item}`,
      );
    },
  ],
  [
    "verify",
    (ctx, args) => {
      const step = textArg(positionalsOf(args), "step");
      return applyToWip(
        ctx,
        (h) => updateDeployContext(h, (c) => addVerificationStep(c, step)),
        `Added verification step: ${step}`,
      );
    },
  ],
  [
    "rollback",
    (ctx, args) => {
      const plan = textArg(positionalsOf(args), "plan");
      return applyToWip(
        ctx,
        (h) => updateDeployContext(h, (c) => setRollbackPlan(c, plan)),
        "Set rollback plan.",
      );
    },
  ],
  [
    "env-concern",
    (ctx, args) => {
      const { values, positionals } = parseCommandArgs(() =>
        parseArgs({
          args,
          allowPositionals: true,
          options: { mitigation: { type: "string" } },
        }),
      );
      const env = positionalArg(positionals, 0, "env");
      const concern = textArg(positionals.slice(1), "concern");
      return applyToWip(
        ctx,
        (h) =>
          updateDeployContext(h, (c) => addEnvConcern(c, env, concern, values.mitigation ?? null)),
        `Added ${env} concern: ${concern}`,
      );
    },
  ],
  [
    "depends",
    (ctx, args) => {
      const { values, positionals } = parseCommandArgs(() =>
        parseArgs({
          args,
          allowPositionals: true,
          options: { "in-place": { type: "boolean" } },
        }),
      );
      const name = positionalArg(positionals, 0, "name");
      const reason = textArg(positionals.slice(1), "reason");
      return applyToWip(
        ctx,
        (h) =>
          updateDeployContext(h, (c) =>
            addDependency(c, { name, reason, in_place: values["in-place"] === true }),
          ),
        `Added dependency: ${name}`,
      );
    },
  ],
  [
    "breaking",
    (ctx, args) => {
      const { values, positionals } = parseCommandArgs(() =>
        parseArgs({
          args,
          allowPositionals: true,
          options: { migration: { type: "string" } },
        }),
      );
      const what = positionalArg(positionals, 0, "what");
      const affects = textArg(positionals.slice(1), "affects");
      return applyToWip(
        ctx,
        (h) =>
          updateDeployContext(h, (c) =>
            addBreakingChange(c, what, affects, values.migration ?? null),
          ),
        `Added breaking change: ${what} affects ${affects}`,
      );
    },
  ],
  [
    "check",
    (ctx, args) => {
      const { values, positionals } = parseCommandArgs(() =>
        parseArgs({
          args,
          allowPositionals: true,
          options: { done: { type: "boolean" } },
        }),
      );
      const item = textArg(positionals, "item");
      return applyToWip(
        ctx,
        (h) => updateDeployContext(h, (c) => addChecklistItem(c, item, values.done === true)),
        `Added checklist item: ${item}`,
      );
    },
  ],
  [
    "monitor",
    (ctx, args) => {
      const notes = textArg(positionalsOf(args), "notes");
      return applyToWip(
        ctx,
        (h) => updateDeployContext(h, (c) => setMonitoringNotes(c, notes)),
        "Set monitoring notes.",
      );
    },
  ],
  [
    "done",
    (ctx, args) => {
      noArgs(args);
      return finishWip(ctx, "deploy");
    },
  ],
]);

// ─── relay debug ────────────────────────────────────────

const debugActions = new Map<string, ActionHandler>([
  ["new", (ctx, args) => startWip(ctx, "debug", textArg(positionalsOf(args), "problem"))],
  [
    "symptom",
    (ctx, args) => {
      const symptom = textArg(positionalsOf(args), "symptom");
      return applyToWip(
        ctx,
        (h) => updateDebugContext(h, (c) => addSymptom(c, symptom)),
        `Added symptom: ${symptom}`,
      );
    },
  ],
  [
    "hypothesis",
    (ctx, args) => {
      const { values, positionals } = parseCommandArgs(() =>
        parseArgs({
          args,
          allowPositionals: true,
          options: {
            likelihood: { type: "string", short: "l" },
            support: { type: "string", multiple: true },
            against: { type: "string", multiple: true },
          },
        }),
      );
      const theory = textArg(positionals, "theory");
      const likelihood = parseLikelihood(values.likelihood ?? "medium");
      return applyToWip(
        ctx,
        (h) =>
          updateDebugContext(h, (c) =>
            addHypothesis(c, {
              theory,
              likelihood,
              support: values.support ?? [],
              against: values.against ?? [],
            }),
          ),
        `Added hypothesis: ${theory}`,
      );
    },
  ],
  [
    "tried",
    (ctx, args) => {
      const { values, positionals } = parseCommandArgs(() =>
        parseArgs({
          args,
          allowPositionals: true,
          options: {
            result: { type: "string", short: "r" },
            outcome: { type: "string", short: "o" },
          },
        }),
      );
      const what = textArg(positionals, "what");
      const outcome = parseAttemptOutcome(values.outcome ?? "nothing");
      return applyToWip(
        ctx,
        (h) =>
          updateDebugContext(h, (c) =>
            recordAttempt(c, what, values.result ?? "No result captured", outcome),
          ),
        `Recorded attempt: ${what}`,
      );
    },
  ],
  [
    "evidence",
    (ctx, args) => {
      const { values, positionals } = parseCommandArgs(() =>
        parseArgs({
          args,
          allowPositionals: true,
          options: {
            kind: { type: "string", short: "k" },
            source: { type: "string", short: "s" },
          },
        }),
      );
      const content = textArg(positionals, "content");
      const kind = parseEvidenceKind(values.kind ?? "observation");
      return applyToWip(
        ctx,
        (h) =>
          updateDebugContext(h, (c) =>
            addEvidence(c, {
              kind,
              content,
              source: values.source ?? null,
              timestamp: new Date().toISOString(),
            }),
          ),
        "Added evidence.",
      );
    },
  ],
  [
    "suspect",
    (ctx, args) => {
      const { values, positionals } = parseCommandArgs(() =>
        parseArgs({
          args,
          allowPositionals: true,
          options: {
            lines: { type: "string" },
            confidence: { type: "string", short: "c" },
          },
        }),
      );
      const filePath = positionalArg(positionals, 0, "path");
      const reason = textArg(positionals.slice(1), "reason");
      const confidence = parseLikelihood(values.confidence ?? "medium");
      return applyToWip(
        ctx,
        (h) =>
          updateDebugContext(h, (c) =>
            addSuspectedFile(c, {
              path: filePath,
              reason,
              lines: values.lines ?? null,
              confidence,
            }),
          ),
        `Added suspect file: ${filePath}`,
      );
    },
  ],
  [
    "repro",
    (ctx, args) => {
      const steps = textArg(positionalsOf(args), "steps");
      return applyToWip(
        ctx,
        (h) => updateDebugContext(h, (c) => setReproductionSteps(c, steps)),
        "Set reproduction steps.",
      );
    },
  ],
  [
    "theory",
    (ctx, args) => {
      const theory = textArg(positionalsOf(args), "theory");
      return applyToWip(
        ctx,
        (h) => updateDebugContext(h, (c) => setWorkingTheory(c, theory)),
        "Set working theory.",
      );
    },
  ],
  [
    "try-next",
    (ctx, args) => {
      const next = textArg(positionalsOf(args), "next");
      return applyToWip(
        ctx,
        (h) => updateDebugContext(h, (c) => setNextToTry(c, next)),
        `Set next step: ${next}`,
      );
    },
  ],
  [
    "done",
    (ctx, args) => {
      noArgs(args);
      return finishWip(ctx, "debug");
    },
  ],
]);

// ─── relay plan ─────────────────────────────────────────

const planActions = new Map<string, ActionHandler>([
  ["new", (ctx, args) => startWip(ctx, "plan", textArg(positionalsOf(args), "goal"))],
  [
    "require",
    (ctx, args) => {
      const { values, positionals } = parseCommandArgs(() =>
        parseArgs({
          args,
          allowPositionals: true,
          options: {
            priority: { type: "string", short: "p" },
            source: { type: "string" },
            confirmed: { type: "boolean" },
          },
        }),
      );
      const description = textArg(positionals, "requirement");
      const priority = parsePriority(values.priority ?? "should");
      return applyToWip(
        ctx,
        (h) =>
          updatePlanContext(h, (c) =>
            addRequirement(c, {
              description,
              priority,
              source: values.source ?? null,
              confirmed: values.confirmed === true,
            }),
          ),
        `Added requirement: ${description}`,
      );
    },
  ],
  [
    "decided",
    (ctx, args) => {
      const { values, positionals } = parseCommandArgs(() =>
        parseArgs({
          args,
          allowPositionals: true,
          options: {
            why: { type: "string", short: "w" },
            context: { type: "string" },
            irreversible: { type: "boolean" },
          },
        }),
      );
      const decision = textArg(positionals, "decision");
      return applyToWip(
        ctx,
        (h) =>
          updatePlanContext(h, (c) =>
            recordPlanDecision(c, {
              decision,
              rationale: values.why ?? "",
              context: values.context ?? null,
              reversible: values.irreversible !== true,
            }),
          ),
        `Recorded decision: ${decision}`,
      );
    },
  ],
  [
    "rejected",
    (ctx, args) => {
      const { values, positionals } = parseCommandArgs(() =>
        parseArgs({
          args,
          allowPositionals: true,
          options: { final: { type: "boolean" } },
        }),
      );
      const option = positionalArg(positionals, 0, "option");
      const reason = textArg(positionals.slice(1), "reason");
      return applyToWip(
        ctx,
        (h) =>
          updatePlanContext(h, (c) =>
            rejectOption(c, { option, reason, reconsiderable: values.final !== true }),
          ),
        `Recorded rejected option: ${option}`,
      );
    },
  ],
  [
    "question",
    (ctx, args) => {
      const { values, positionals } = parseCommandArgs(() =>
        parseArgs({
          args,
          allowPositionals: true,
          options: {
            importance: { type: "string", short: "i" },
            ask: { type: "string" },
            blocking: { type: "boolean" },
          },
        }),
      );
      const question = textArg(positionals, "question");
      const blocking = values.blocking === true;
      return applyToWip(
        ctx,
        (h) =>
          updatePlanContext(h, (c) =>
            addOpenQuestion(c, {
              question,
              importance: values.importance ?? "medium",
              ask_who: values.ask ?? null,
              blocking,
            }),
          ),
        `Added question${blocking ? " (blocking)" : ""}: ${question}`,
      );
    },
  ],
  [
    "constraint",
    (ctx, args) => {
      const { values, positionals } = parseCommandArgs(() =>
        parseArgs({
          args,
          allowPositionals: true,
          options: {
            reason: { type: "string" },
            negotiable: { type: "boolean" },
          },
        }),
      );
      const constraint = textArg(positionals, "constraint");
      return applyToWip(
        ctx,
        (h) =>
          updatePlanContext(h, (c) =>
            addConstraint(c, {
              constraint,
              reason: values.reason ?? null,
              negotiable: values.negotiable === true,
            }),
          ),
        `Added constraint: ${constraint}`,
      );
    },
  ],
  [
    "stakeholder",
    (ctx, args) => {
      const name = textArg(positionalsOf(args), "name");
      return applyToWip(
        ctx,
        (h) => updatePlanContext(h, (c) => addStakeholder(c, name)),
        `Added stakeholder: ${name}`,
      );
    },
  ],
  [
    "next-step",
    (ctx, args) => {
      const step = textArg(positionalsOf(args), "step");
      return applyToWip(
        ctx,
        (h) => updatePlanContext(h, (c) => addNextStep(c, step)),
        `Added next step: ${step}`,
      );
    },
  ],
  [
    "phase",
    (ctx, args) => {
      const phase = parsePlanPhase(positionalArg(positionalsOf(args), 0, "phase"));
      return applyToWip(
        ctx,
        (h) => updatePlanContext(h, (c) => setPlanPhase(c, phase)),
        `Set phase: ${PLAN_PHASE_LABELS[phase]}`,
      );
    },
  ],
  [
    "progress",
    (ctx, args) => {
      const pct = numberArg(positionalArg(positionalsOf(args), 0, "percent"), "<percent>");
      return applyToWip(
        ctx,
        (h) => updatePlanContext(h, (c) => setProgress(c, pct)),
        (h) => `Set progress: ${h.mode.kind === "plan" ? h.mode.context.progress_pct : pct}%`,
      );
    },
  ],
  [
    "done",
    (ctx, args) => {
      noArgs(args);
      return finishWip(ctx, "plan");
    },
  ],
]);

export const deployCommand: CommandHandler = actionGroup("deploy", deployActions);
export const debugCommand: CommandHandler = actionGroup("debug", debugActions);
export const planCommand: CommandHandler = actionGroup("plan", planActions);
