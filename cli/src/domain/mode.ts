import type { HandoffMode, ModeKind } from "@handoff-relay/shared";
import { compileDebugContext, createDebugContext } from "./debug.js";
import { compileDeployContext, createDeployContext } from "./deploy.js";
import { compilePlanContext, createPlanContext } from "./plan.js";

/**
 * Build an empty mode payload. `subject` is the debug problem statement or
 * the plan goal; deploy has no required field and ignores it.
 */
export function createMode(kind: ModeKind, subject: string): HandoffMode {
  switch (kind) {
    case "deploy":
      return { kind, context: createDeployContext() };
    case "debug":
      return { kind, context: createDebugContext(subject) };
    case "plan":
      return { kind, context: createPlanContext(subject) };
  }
}

export function compileModeSection(mode: HandoffMode): string {
  switch (mode.kind) {
    case "deploy":
      return compileDeployContext(mode.context);
    case "debug":
      return compileDebugContext(mode.context);
    case "plan":
      return compilePlanContext(mode.context);
  }
}
