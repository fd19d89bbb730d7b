import type {
  Confidence,
  DeployContext,
  DeployDependency,
} from "@handoff-relay/shared";
import { CONFIDENCE_LABELS } from "@handoff-relay/shared";
import { block, bullets, numbered, section } from "../prompt/markdown.js";

// ─── Factory ────────────────────────────────────────────

export function createDeployContext(): DeployContext {
  return {
    what_to_ship: [],
    verification_steps: [],
    rollback_plan: null,
    env_concerns: [],
    dependencies: [],
    breaking_changes: [],
    checklist: [],
    monitoring_notes: null,
  };
}

// ─── Mutators ───────────────────────────────────────────

export function addShipItem(
  ctx: DeployContext,
  item: string,
  description: string,
  confidence: Confidence = "medium",
): DeployContext {
  return {
    ...ctx,
    what_to_ship: [...ctx.what_to_ship, { item, description, confidence }],
  };
}

export function addVerificationStep(ctx: DeployContext, step: string): DeployContext {
  return { ...ctx, verification_steps: [...ctx.verification_steps, step] };
}

export function setRollbackPlan(ctx: DeployContext, plan: string): DeployContext {
  return { ...ctx, rollback_plan: plan };
}

export function addEnvConcern(
  ctx: DeployContext,
  environment: string,
  concern: string,
  mitigation: string | null = null,
): DeployContext {
  return {
    ...ctx,
    env_concerns: [...ctx.env_concerns, { environment, concern, mitigation }],
  };
}

export function addDependency(
  ctx: DeployContext,
  dependency: DeployDependency,
): DeployContext {
  return { ...ctx, dependencies: [...ctx.dependencies, dependency] };
}

export function addBreakingChange(
  ctx: DeployContext,
  what: string,
  affects: string,
  migration: string | null = null,
): DeployContext {
  return {
    ...ctx,
    breaking_changes: [...ctx.breaking_changes, { what, affects, migration }],
  };
}

export function addChecklistItem(
  ctx: DeployContext,
  item: string,
  done = false,
): DeployContext {
  return { ...ctx, checklist: [...ctx.checklist, { item, done }] };
}

export function setMonitoringNotes(ctx: DeployContext, notes: string): DeployContext {
  return { ...ctx, monitoring_notes: notes };
}

// ─── Compile ────────────────────────────────────────────

export function compileDeployContext(ctx: DeployContext): string {
  return [
    block("## Deployment Context"),
    section(
      "### Ready to Ship",
      ctx.what_to_ship.map(
        (s) => `- **${s.item}** (${CONFIDENCE_LABELS[s.confidence]}): ${s.description}`,
      ),
    ),
    section("### Verification Steps", numbered(ctx.verification_steps)),
    ctx.rollback_plan !== null ? block("### Rollback Plan") + block(ctx.rollback_plan) : "",
    section(
      "### Breaking Changes",
      ctx.breaking_changes.flatMap((bc) => [
        `- **${bc.what}** affects ${bc.affects}`,
        ...(bc.migration !== null ? [`  Migration: ${bc.migration}`] : []),
      ]),
    ),
    section(
      "### Environment Concerns",
      ctx.env_concerns.flatMap((ec) => [
        `- **${ec.environment}**: ${ec.concern}`,
        ...(ec.mitigation !== null ? [`  Mitigation: ${ec.mitigation}`] : []),
      ]),
    ),
    section(
      "### Checklist",
      ctx.checklist.map((c) => `- [${c.done ? "x" : " "}] ${c.item}`),
    ),
    section(
      "### Dependencies",
      bullets(
        ctx.dependencies.map(
          (d) => `**${d.name}** (${d.in_place ? "in place" : "missing"}): ${d.reason}`,
        ),
      ),
    ),
    ctx.monitoring_notes !== null
      ? block("### Post-Deploy Monitoring") + block(ctx.monitoring_notes)
      : "",
  ].join("");
}
