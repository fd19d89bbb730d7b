import { describe, it, expect } from "vitest";
import {
  parseAttemptOutcome,
  parseConfidence,
  parseEvidenceKind,
  parseLikelihood,
  parseModeKind,
  parseObservationCategory,
  parsePlanPhase,
  parsePriority,
} from "../../../src/domain/enums.js";

describe("lenient parsers", () => {
  it("should match canonical values case-insensitively", () => {
    expect(parseConfidence("HIGH")).toBe("high");
    expect(parseLikelihood(" Eliminated ")).toBe("eliminated");
    expect(parsePlanPhase("Review")).toBe("review");
    expect(parseObservationCategory("risk")).toBe("risk");
  });

  it("should accept hyphen and space spellings of snake_case values", () => {
    expect(parseAttemptOutcome("made-worse")).toBe("made_worse");
    expect(parseAttemptOutcome("no effect")).toBe("no_effect");
    expect(parseEvidenceKind("stack_trace")).toBe("stack_trace");
    expect(parseEvidenceKind("error message")).toBe("error_message");
  });

  it("should accept aliases", () => {
    expect(parseAttemptOutcome("nothing")).toBe("no_effect");
    expect(parseAttemptOutcome("worse")).toBe("made_worse");
    expect(parseEvidenceKind("log")).toBe("log_entry");
    expect(parseEvidenceKind("trace")).toBe("stack_trace");
    expect(parsePriority("won't")).toBe("wont");
  });

  it("should fall back to defaults for unknown tokens", () => {
    expect(parseConfidence("certain")).toBe("medium");
    expect(parseLikelihood("")).toBe("medium");
    expect(parseAttemptOutcome("???")).toBe("no_effect");
    expect(parseEvidenceKind("hunch")).toBe("observation");
    expect(parsePriority("urgent")).toBe("should");
    expect(parseObservationCategory("misc")).toBe("general");
    expect(parsePlanPhase("shipping")).toBe("discovery");
  });

  it("should not resolve Object.prototype members as aliases", () => {
    expect(parseConfidence("constructor")).toBe("medium");
    expect(parseAttemptOutcome("constructor")).toBe("no_effect");
    expect(parseEvidenceKind("hasOwnProperty")).toBe("observation");
    expect(parsePriority("toString")).toBe("should");
    expect(parseLikelihood("__proto__")).toBe("medium");
  });
});

describe("parseModeKind", () => {
  it("should accept mode names and aliases", () => {
    expect(parseModeKind("Debug")._unsafeUnwrap()).toBe("debug");
    expect(parseModeKind("troubleshoot")._unsafeUnwrap()).toBe("debug");
    expect(parseModeKind("ship")._unsafeUnwrap()).toBe("deploy");
    expect(parseModeKind("planning")._unsafeUnwrap()).toBe("plan");
  });

  it("should reject unknown modes", () => {
    const result = parseModeKind("review");
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.code).toBe("INVALID_MODE");
      expect(result.error.message).toBe("Invalid mode: review. Use deploy, debug, or plan.");
    }
  });

  it("should reject Object.prototype member names", () => {
    for (const token of ["constructor", "hasOwnProperty", "__proto__"]) {
      const result = parseModeKind(token);
      expect(result.isErr() && result.error.code).toBe("INVALID_MODE");
    }
  });
});
