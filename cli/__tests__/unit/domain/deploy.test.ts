import { describe, it, expect } from "vitest";
import {
  addBreakingChange,
  addChecklistItem,
  addDependency,
  addEnvConcern,
  addShipItem,
  addVerificationStep,
  compileDeployContext,
  createDeployContext,
  setMonitoringNotes,
  setRollbackPlan,
} from "../../../src/domain/deploy.js";

describe("DeployContext", () => {
  it("should start empty", () => {
    const ctx = createDeployContext();
    expect(ctx.what_to_ship).toEqual([]);
    expect(ctx.rollback_plan).toBeNull();
    expect(ctx.monitoring_notes).toBeNull();
  });

  it("should default ship confidence to medium", () => {
    const ctx = addShipItem(createDeployContext(), "auth-service", "Token refresh fix");
    expect(ctx.what_to_ship).toEqual([
      { item: "auth-service", description: "Token refresh fix", confidence: "medium" },
    ]);
  });

  it("should not mutate the input context", () => {
    const base = createDeployContext();
    const next = addVerificationStep(base, "Hit /health");
    expect(base.verification_steps).toEqual([]);
    expect(next.verification_steps).toEqual(["Hit /health"]);
  });

  it("should replace the rollback plan on a second set", () => {
    let ctx = setRollbackPlan(createDeployContext(), "Revert the tag");
    ctx = setRollbackPlan(ctx, "Redeploy v1.2.2");
    expect(ctx.rollback_plan).toBe("Redeploy v1.2.2");
  });

  describe("compileDeployContext", () => {
    it("should emit only the heading for an empty context", () => {
      expect(compileDeployContext(createDeployContext())).toBe("## Deployment Context\n\n");
    });

    it("should render ship items and numbered verification steps", () => {
      let ctx = addShipItem(createDeployContext(), "api", "New rate limiter", "high");
      ctx = addVerificationStep(ctx, "Run smoke tests");
      ctx = addVerificationStep(ctx, "Check error rate");

      expect(compileDeployContext(ctx)).toBe(
        "## Deployment Context\n\n" +
          "### Ready to Ship\n\n" +
          "- **api** (High): New rate limiter\n\n" +
          "### Verification Steps\n\n" +
          "1. Run smoke tests\n2. Check error rate\n\n",
      );
    });

    it("should render every section in a fixed order", () => {
      let ctx = createDeployContext();
      ctx = setMonitoringNotes(ctx, "Watch p99 latency");
      ctx = addDependency(ctx, { name: "redis", reason: "Rate limiter state", in_place: false });
      ctx = addChecklistItem(ctx, "Migrations applied", true);
      ctx = addChecklistItem(ctx, "Feature flag created");
      ctx = addEnvConcern(ctx, "staging", "Shared database", "Use a separate schema");
      ctx = addBreakingChange(ctx, "GET /v1/users", "mobile client", "Use /v2/users");
      ctx = setRollbackPlan(ctx, "Revert the release tag");

      expect(compileDeployContext(ctx)).toBe(
        [
          "## Deployment Context",
          "",
          "### Rollback Plan",
          "",
          "Revert the release tag",
          "",
          "### Breaking Changes",
          "",
          "- **GET /v1/users** affects mobile client",
          "  Migration: Use /v2/users",
          "",
          "### Environment Concerns",
          "",
          "- **staging**: Shared database",
          "  Mitigation: Use a separate schema",
          "",
          "### Checklist",
          "",
          "- [x] Migrations applied",
          "- [ ] Feature flag created",
          "",
          "### Dependencies",
          "",
          "- **redis** (missing): Rate limiter state",
          "",
          "### Post-Deploy Monitoring",
          "",
          "Watch p99 latency",
          "",
          "",
        ].join("\n"),
      );
    });

    it("should omit the mitigation line when none was given", () => {
      const ctx = addEnvConcern(createDeployContext(), "prod", "Cold cache");
      expect(compileDeployContext(ctx)).toBe(
        "## Deployment Context\n\n### Environment Concerns\n\n- **prod**: Cold cache\n\n",
      );
    });
  });
});
