import { describe, it, expect } from "vitest";
import {
  addMustKnow,
  addPriorityFile,
  createWarmUp,
  setEstimatedTokens,
  setSuggestedStart,
} from "../../../src/domain/warm-up.js";

describe("WarmUpSequence", () => {
  it("should start empty apart from the TL;DR", () => {
    expect(createWarmUp("Token expiry bug")).toEqual({
      priority_files: [],
      tldr: "Token expiry bug",
      must_know: [],
      suggested_start: null,
      estimated_tokens: null,
    });
  });

  it("should keep ranks as given, duplicates included", () => {
    let w = addPriorityFile(createWarmUp(), { path: "b.ts", reason: "second", rank: 2 });
    w = addPriorityFile(w, { path: "a.ts", reason: "first", rank: 2, focus: "refresh()" });
    expect(w.priority_files).toEqual([
      { path: "b.ts", reason: "second", rank: 2, focus: null },
      { path: "a.ts", reason: "first", rank: 2, focus: "refresh()" },
    ]);
  });

  it("should round fractional ranks", () => {
    const w = addPriorityFile(createWarmUp(), { path: "a.ts", reason: "first", rank: 1.5 });
    expect(w.priority_files[0]?.rank).toBe(2);
  });

  it("should round and floor the token estimate", () => {
    expect(setEstimatedTokens(createWarmUp(), 1200.4).estimated_tokens).toBe(1200);
    expect(setEstimatedTokens(createWarmUp(), -5).estimated_tokens).toBe(0);
  });

  it("should append must-know items and set the first action", () => {
    const w = setSuggestedStart(addMustKnow(createWarmUp(), "Only node-2 fails"), "Read auth.ts");
    expect(w.must_know).toEqual(["Only node-2 fails"]);
    expect(w.suggested_start).toBe("Read auth.ts");
  });
});
