import { describe, it, expect } from "vitest";
import {
  addConstraint,
  addNextStep,
  addOpenQuestion,
  addRequirement,
  addStakeholder,
  compilePlanContext,
  createPlanContext,
  recordPlanDecision,
  rejectOption,
  setPlanPhase,
  setProgress,
} from "../../../src/domain/plan.js";

describe("PlanContext", () => {
  it("should start in discovery with no progress", () => {
    const ctx = createPlanContext("Split the billing module");
    expect(ctx.goal).toBe("Split the billing module");
    expect(ctx.phase).toBe("discovery");
    expect(ctx.progress_pct).toBeNull();
  });

  it("should apply input defaults", () => {
    let ctx = createPlanContext("g");
    ctx = addRequirement(ctx, { description: "Keep invoices stable" });
    ctx = recordPlanDecision(ctx, { decision: "Use events", rationale: "Decoupling" });
    ctx = rejectOption(ctx, { option: "Shared DB", reason: "Coupling" });
    ctx = addOpenQuestion(ctx, { question: "Who owns refunds?", importance: "high" });
    ctx = addConstraint(ctx, { constraint: "No downtime" });

    expect(ctx.requirements[0]).toEqual({
      description: "Keep invoices stable",
      priority: "should",
      source: null,
      confirmed: false,
    });
    expect(ctx.decisions[0].reversible).toBe(true);
    expect(ctx.rejected_options[0].reconsiderable).toBe(true);
    expect(ctx.open_questions[0]).toEqual({
      question: "Who owns refunds?",
      importance: "high",
      ask_who: null,
      blocking: false,
    });
    expect(ctx.constraints[0]).toEqual({ constraint: "No downtime", reason: null, negotiable: false });
  });

  describe("setProgress", () => {
    it("should round to a whole percentage", () => {
      expect(setProgress(createPlanContext("g"), 42.6).progress_pct).toBe(43);
    });

    it("should clamp into 0..100", () => {
      expect(setProgress(createPlanContext("g"), 150).progress_pct).toBe(100);
      expect(setProgress(createPlanContext("g"), -5).progress_pct).toBe(0);
    });

    it("should treat NaN as zero", () => {
      expect(setProgress(createPlanContext("g"), Number.NaN).progress_pct).toBe(0);
    });
  });

  describe("compilePlanContext", () => {
    it("should render goal and phase for a fresh context", () => {
      expect(compilePlanContext(createPlanContext("Split billing"))).toBe(
        "## Planning Context\n\n### Goal\n\nSplit billing\n\n**Phase**: Discovery\n\n",
      );
    });

    it("should render every section in a fixed order", () => {
      let ctx = createPlanContext("Split billing");
      ctx = addStakeholder(ctx, "Finance team");
      ctx = addNextStep(ctx, "Draft the event schema");
      ctx = addNextStep(ctx, "Review with finance");
      ctx = addConstraint(ctx, { constraint: "Ship by Q3", reason: "Contract", negotiable: true });
      ctx = addOpenQuestion(ctx, {
        question: "Who owns refunds?",
        importance: "Decides the service boundary",
        ask_who: "Product",
        blocking: true,
      });
      ctx = rejectOption(ctx, { option: "Shared DB", reason: "Tight coupling" });
      ctx = recordPlanDecision(ctx, {
        decision: "Use an outbox",
        rationale: "At-least-once delivery",
        context: "Postgres already in use",
      });
      ctx = addRequirement(ctx, {
        description: "Invoices stay immutable",
        priority: "must",
        source: "Audit",
        confirmed: true,
      });
      ctx = setPlanPhase(ctx, "design");
      ctx = setProgress(ctx, 40);

      expect(compilePlanContext(ctx)).toBe(
        [
          "## Planning Context",
          "",
          "### Goal",
          "",
          "Split billing",
          "",
          "**Phase**: Design (40% complete)",
          "",
          "### Requirements",
          "",
          "- **Must** ✓: Invoices stay immutable (source: Audit)",
          "",
          "### Decisions Made",
          "",
          "- **Use an outbox**",
          "  Rationale: At-least-once delivery",
          "  Context: Postgres already in use",
          "",
          "### Options Rejected",
          "",
          "- ~~Shared DB~~ (could reconsider): Tight coupling",
          "",
          "### Open Questions",
          "",
          "- Who owns refunds? **[BLOCKING]**",
          "  Why it matters: Decides the service boundary",
          "  Ask: Product",
          "",
          "### Constraints",
          "",
          "- Ship by Q3 (negotiable)",
          "  Reason: Contract",
          "",
          "### Suggested Next Steps",
          "",
          "1. Draft the event schema",
          "2. Review with finance",
          "",
          "### Stakeholders",
          "",
          "- Finance team",
          "",
          "",
        ].join("\n"),
      );
    });

    it("should skip an empty rationale", () => {
      const ctx = recordPlanDecision(createPlanContext("g"), { decision: "Go", rationale: "" });
      expect(compilePlanContext(ctx)).toBe(
        "## Planning Context\n\n### Goal\n\ng\n\n**Phase**: Discovery\n\n" +
          "### Decisions Made\n\n- **Go**\n\n",
      );
    });
  });
});
