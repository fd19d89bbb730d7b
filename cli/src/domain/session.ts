import type {
  FileRead,
  Observation,
  ObservationCategory,
  SessionState,
} from "@handoff-relay/shared";

// ─── Factory ────────────────────────────────────────────

export function createSessionState(now: Date = new Date()): SessionState {
  return { ...emptySessionState(), started_at: now.toISOString() };
}

/** A session with no start time, used for freshly created handoffs. */
export function emptySessionState(): SessionState {
  return {
    started_at: null,
    ended_at: null,
    files_read: [],
    files_modified: [],
    files_created: [],
    commands_run: [],
    observations: [],
    decisions: [],
    dead_ends: [],
  };
}

// ─── Recorders ──────────────────────────────────────────

export function recordFileRead(
  s: SessionState,
  path: string,
  opts: { purpose?: string | null; takeaways?: string[] } = {},
): SessionState {
  const entry: FileRead = {
    path,
    purpose: opts.purpose ?? null,
    takeaways: opts.takeaways ?? [],
    read_order: s.files_read.length + 1,
  };
  return { ...s, files_read: [...s.files_read, entry] };
}

export function recordFileModified(
  s: SessionState,
  path: string,
  opts: { change_summary?: string | null; lines_changed?: number | null } = {},
): SessionState {
  return {
    ...s,
    files_modified: [
      ...s.files_modified,
      {
        path,
        change_summary: opts.change_summary ?? null,
        lines_changed: opts.lines_changed ?? null,
      },
    ],
  };
}

export function recordFileCreated(s: SessionState, path: string): SessionState {
  return { ...s, files_created: [...s.files_created, path] };
}

export function recordCommand(
  s: SessionState,
  command: string,
  success: boolean,
  opts: { purpose?: string | null; notable_output?: string | null } = {},
): SessionState {
  return {
    ...s,
    commands_run: [
      ...s.commands_run,
      {
        command,
        purpose: opts.purpose ?? null,
        success,
        notable_output: opts.notable_output ?? null,
      },
    ],
  };
}

/** Importance is rounded and clamped into 1..5. */
export function recordObservation(
  s: SessionState,
  note: string,
  category: ObservationCategory = "general",
  importance = 3,
): SessionState {
  const rounded = Math.round(importance);
  const clamped = Number.isNaN(rounded) ? 3 : Math.min(5, Math.max(1, rounded));
  return {
    ...s,
    observations: [...s.observations, { note, category, importance: clamped }],
  };
}

export function recordGotcha(s: SessionState, note: string): SessionState {
  return recordObservation(s, note, "gotcha", 4);
}

export function recordSessionDecision(
  s: SessionState,
  decision: string,
  why: string,
  alternatives: string[] = [],
): SessionState {
  return { ...s, decisions: [...s.decisions, { decision, why, alternatives }] };
}

export function recordDeadEnd(
  s: SessionState,
  approach: string,
  reason: string,
  revisit = false,
): SessionState {
  return { ...s, dead_ends: [...s.dead_ends, { approach, reason, revisit }] };
}

export function endSession(s: SessionState, now: Date = new Date()): SessionState {
  return { ...s, ended_at: now.toISOString() };
}

// ─── Queries ────────────────────────────────────────────

export function filesByReadOrder(s: SessionState): FileRead[] {
  return [...s.files_read].sort((a, b) => a.read_order - b.read_order);
}

export function importantObservations(s: SessionState): Observation[] {
  return s.observations.filter((o) => o.importance >= 3);
}

export function summarizeSession(s: SessionState): string {
  const parts = [
    ...(s.files_modified.length > 0 ? [`Modified ${s.files_modified.length} files.`] : []),
    ...(s.files_created.length > 0 ? [`Created ${s.files_created.length} files.`] : []),
    ...(s.decisions.length > 0 ? [`Made ${s.decisions.length} decisions.`] : []),
    ...(s.dead_ends.length > 0 ? [`${s.dead_ends.length} dead ends noted.`] : []),
  ];
  return parts.length > 0 ? parts.join(" ") : "Exploratory session.";
}
