import type { WarmUpSequence } from "@handoff-relay/shared";

export function createWarmUp(tldr = ""): WarmUpSequence {
  return {
    priority_files: [],
    tldr,
    must_know: [],
    suggested_start: null,
    estimated_tokens: null,
  };
}

export function setTldr(w: WarmUpSequence, tldr: string): WarmUpSequence {
  return { ...w, tldr };
}

/** Ranks are rounded but otherwise taken as given; 1 is highest. */
export function addPriorityFile(
  w: WarmUpSequence,
  file: { path: string; reason: string; rank: number; focus?: string | null },
): WarmUpSequence {
  return {
    ...w,
    priority_files: [
      ...w.priority_files,
      {
        path: file.path,
        reason: file.reason,
        rank: Math.round(file.rank),
        focus: file.focus ?? null,
      },
    ],
  };
}

export function addMustKnow(w: WarmUpSequence, item: string): WarmUpSequence {
  return { ...w, must_know: [...w.must_know, item] };
}

export function setSuggestedStart(w: WarmUpSequence, start: string): WarmUpSequence {
  return { ...w, suggested_start: start };
}

export function setEstimatedTokens(w: WarmUpSequence, tokens: number): WarmUpSequence {
  return { ...w, estimated_tokens: Math.max(0, Math.round(tokens)) };
}
