import { describe, it, expect } from "vitest";
import {
  createSessionState,
  emptySessionState,
  endSession,
  filesByReadOrder,
  importantObservations,
  recordCommand,
  recordDeadEnd,
  recordFileCreated,
  recordFileModified,
  recordFileRead,
  recordGotcha,
  recordObservation,
  recordSessionDecision,
  summarizeSession,
} from "../../../src/domain/session.js";

describe("SessionState", () => {
  it("should stamp the start time", () => {
    const s = createSessionState(new Date("2026-03-01T09:00:00.000Z"));
    expect(s.started_at).toBe("2026-03-01T09:00:00.000Z");
    expect(s.ended_at).toBeNull();
  });

  it("should leave both times empty for an empty session", () => {
    const s = emptySessionState();
    expect(s.started_at).toBeNull();
    expect(s.files_read).toEqual([]);
  });

  it("should stamp the end time", () => {
    const s = endSession(emptySessionState(), new Date("2026-03-01T17:30:00.000Z"));
    expect(s.ended_at).toBe("2026-03-01T17:30:00.000Z");
  });

  it("should number reads from 1 in call order", () => {
    let s = emptySessionState();
    s = recordFileRead(s, "src/a.ts", { purpose: "Entry point", takeaways: ["Uses DI"] });
    s = recordFileRead(s, "src/b.ts");
    expect(s.files_read).toEqual([
      { path: "src/a.ts", purpose: "Entry point", takeaways: ["Uses DI"], read_order: 1 },
      { path: "src/b.ts", purpose: null, takeaways: [], read_order: 2 },
    ]);
  });

  it("should return reads sorted by read order", () => {
    const s = {
      ...emptySessionState(),
      files_read: [
        { path: "late.ts", purpose: null, takeaways: [], read_order: 3 },
        { path: "early.ts", purpose: null, takeaways: [], read_order: 1 },
      ],
    };
    expect(filesByReadOrder(s).map((f) => f.path)).toEqual(["early.ts", "late.ts"]);
  });

  it("should record modifications, creations and commands", () => {
    let s = emptySessionState();
    s = recordFileModified(s, "src/a.ts", { change_summary: "Added retry", lines_changed: 12 });
    s = recordFileCreated(s, "src/retry.ts");
    s = recordCommand(s, "npm test", false, { notable_output: "2 failed" });

    expect(s.files_modified).toEqual([
      { path: "src/a.ts", change_summary: "Added retry", lines_changed: 12 },
    ]);
    expect(s.files_created).toEqual(["src/retry.ts"]);
    expect(s.commands_run).toEqual([
      { command: "npm test", purpose: null, success: false, notable_output: "2 failed" },
    ]);
  });

  describe("recordObservation", () => {
    it("should default to general with importance 3", () => {
      const s = recordObservation(emptySessionState(), "Tests are slow");
      expect(s.observations).toEqual([
        { note: "Tests are slow", category: "general", importance: 3 },
      ]);
    });

    it("should clamp importance into 1..5", () => {
      let s = emptySessionState();
      s = recordObservation(s, "high", "risk", 9);
      s = recordObservation(s, "low", "risk", 0);
      s = recordObservation(s, "half", "risk", 2.5);
      expect(s.observations.map((o) => o.importance)).toEqual([5, 1, 3]);
    });

    it("should record gotchas with category gotcha and importance 4", () => {
      const s = recordGotcha(emptySessionState(), "Env file is not reloaded");
      expect(s.observations).toEqual([
        { note: "Env file is not reloaded", category: "gotcha", importance: 4 },
      ]);
    });

    it("should keep only observations of importance 3 or more", () => {
      let s = emptySessionState();
      s = recordObservation(s, "minor", "general", 2);
      s = recordObservation(s, "major", "insight", 3);
      expect(importantObservations(s).map((o) => o.note)).toEqual(["major"]);
    });
  });

  describe("summarizeSession", () => {
    it("should describe an empty session as exploratory", () => {
      expect(summarizeSession(emptySessionState())).toBe("Exploratory session.");
    });

    it("should list the non-empty counts", () => {
      let s = emptySessionState();
      s = recordFileModified(s, "a.ts");
      s = recordFileModified(s, "b.ts");
      s = recordSessionDecision(s, "Use zod", "Already a dependency", ["io-ts"]);
      s = recordDeadEnd(s, "Monkey-patch fetch", "Breaks streaming", true);

      expect(summarizeSession(s)).toBe("Modified 2 files. Made 1 decisions. 1 dead ends noted.");
      expect(s.dead_ends).toEqual([
        { approach: "Monkey-patch fetch", reason: "Breaks streaming", revisit: true },
      ]);
    });
  });
});
