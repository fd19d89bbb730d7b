import { describe, it, expect } from "vitest";
import type { Handoff } from "@handoff-relay/shared";
import {
  branchRef,
  commitRef,
  createHandoff,
  handoffFileName,
  handoffShortId,
  parseHandoff,
  pullRequestRef,
  serializeHandoff,
  tagRef,
  updateDebugContext,
  updateDeployContext,
  updatePlanContext,
  withGitRef,
  withSession,
  withTag,
  withWarmUp,
} from "../../../src/domain/handoff.js";
import { addSymptom } from "../../../src/domain/debug.js";
import { createMode } from "../../../src/domain/mode.js";
import { createSessionState, recordGotcha } from "../../../src/domain/session.js";
import { addMustKnow, addPriorityFile, createWarmUp } from "../../../src/domain/warm-up.js";

const CREATED = new Date("2026-05-04T07:08:09.000Z");

function debugHandoff() {
  return createHandoff(createMode("debug", "Login fails"), "Login fails", "alice", CREATED);
}

describe("Handoff", () => {
  it("should create a handoff with an empty session and warm-up", () => {
    const h = debugHandoff();
    expect(h.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(h.created_by).toBe("alice");
    expect(h.created_at).toBe("2026-05-04T07:08:09.000Z");
    expect(h.summary).toBe("Login fails");
    expect(h.session.started_at).toBeNull();
    expect(h.warm_up).toEqual(createWarmUp());
    expect(h.git_ref).toBeNull();
    expect(h.tags).toEqual([]);
  });

  it("should give each handoff a distinct id", () => {
    expect(debugHandoff().id).not.toBe(debugHandoff().id);
  });

  it("should use the mode subject as problem statement or goal", () => {
    const debug = createMode("debug", "Queue stalls");
    const plan = createMode("plan", "Split billing");
    expect(debug.kind === "debug" && debug.context.problem_statement).toBe("Queue stalls");
    expect(plan.kind === "plan" && plan.context.goal).toBe("Split billing");
    expect(createMode("deploy", "ignored").kind).toBe("deploy");
  });

  it("should keep tag order and duplicates", () => {
    const h = withTag(withTag(withTag(debugHandoff(), "auth"), "urgent"), "auth");
    expect(h.tags).toEqual(["auth", "urgent", "auth"]);
  });

  it("should build git references of each type", () => {
    expect(commitRef("abc1234")).toEqual({ ref_type: "commit", value: "abc1234", remote: null });
    expect(branchRef("fix/login", "origin")).toEqual({
      ref_type: "branch",
      value: "fix/login",
      remote: "origin",
    });
    expect(pullRequestRef("#42").ref_type).toBe("pull_request");
    expect(tagRef("v1.4.0").ref_type).toBe("tag");
  });

  describe("mode-guarded updates", () => {
    it("should update the matching context", () => {
      const result = updateDebugContext(debugHandoff(), (c) => addSymptom(c, "401s"));
      expect(result.isOk()).toBe(true);
      if (result.isOk() && result.value.mode.kind === "debug") {
        expect(result.value.mode.context.symptoms).toEqual(["401s"]);
      }
    });

    it("should reject an update for another mode", () => {
      const deploy = updateDeployContext(debugHandoff(), (c) => c);
      const plan = updatePlanContext(debugHandoff(), (c) => c);
      expect(deploy.isErr()).toBe(true);
      if (deploy.isErr()) {
        expect(deploy.error.code).toBe("MODE_MISMATCH");
        expect(deploy.error.message).toBe("Active handoff is a debug handoff, not deploy");
      }
      expect(plan.isErr()).toBe(true);
    });
  });

  describe("naming", () => {
    it("should use the first 8 characters of the id as short id", () => {
      const h = { ...debugHandoff(), id: "1a2b3c4d-0000-4000-8000-000000000000" };
      expect(handoffShortId(h)).toBe("1a2b3c4d");
    });

    it("should name files after the UTC creation time and short id", () => {
      const h = { ...debugHandoff(), id: "1a2b3c4d-0000-4000-8000-000000000000" };
      expect(handoffFileName(h)).toBe("20260504_070809_1a2b3c4d.json");
    });
  });

  describe("serialization", () => {
    it("should round-trip a populated handoff", () => {
      let h = debugHandoff();
      h = withSession(h, recordGotcha(createSessionState(CREATED), "Cache is per-node"));
      h = withWarmUp(
        h,
        addMustKnow(
          addPriorityFile(createWarmUp("Token expiry bug"), {
            path: "src/auth.ts",
            reason: "Expiry math",
            rank: 1,
          }),
          "Only node-2 fails",
        ),
      );
      h = withGitRef(h, branchRef("fix/login"));

      const parsed = parseHandoff(serializeHandoff(h)._unsafeUnwrap());
      expect(parsed.isOk()).toBe(true);
      if (parsed.isOk()) {
        expect(parsed.value).toEqual(h);
      }
    });

    it("should write two-space indented JSON", () => {
      expect(serializeHandoff(debugHandoff())._unsafeUnwrap()).toContain(
        '\n  "created_by": "alice",\n',
      );
    });

    it("should refuse to encode a handoff that would not parse back", () => {
      const h = debugHandoff();
      const broken: Handoff = {
        ...h,
        warm_up: {
          ...h.warm_up,
          priority_files: [{ path: "src/auth.ts", reason: "Expiry math", rank: 1.5, focus: null }],
        },
      };
      const result = serializeHandoff(broken);
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.name).toBe("SerializationError");
        expect(result.error.message).toContain("warm_up");
      }
    });

    it("should reject text that is not JSON", () => {
      const result = parseHandoff("{not json");
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.name).toBe("SerializationError");
      }
    });

    it("should reject documents that miss required fields", () => {
      const { summary: _omitted, ...rest } = debugHandoff();
      expect(parseHandoff(JSON.stringify(rest)).isErr()).toBe(true);
    });

    it("should reject an unknown mode kind", () => {
      const doc = { ...debugHandoff(), mode: { kind: "review", context: {} } };
      expect(parseHandoff(JSON.stringify(doc)).isErr()).toBe(true);
    });
  });
});
