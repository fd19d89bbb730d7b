import type { Handoff } from "@handoff-relay/shared";
import { GIT_REF_LABELS, MODE_LABELS } from "@handoff-relay/shared";
import { compileModeSection } from "../domain/mode.js";
import { handoffShortId } from "../domain/handoff.js";
import { filesByReadOrder, importantObservations, summarizeSession } from "../domain/session.js";
import { block, bullets, section } from "./markdown.js";

// ─── Helpers ────────────────────────────────────────────

/** `YYYY-MM-DD HH:MM` from an ISO-8601 UTC timestamp. */
export function formatTimestamp(iso: string): string {
  return `${iso.slice(0, 10)} ${iso.slice(11, 16)}`;
}

// ─── Full Briefing ──────────────────────────────────────

/**
 * Compile the briefing a receiving session reads first.
 * Section order is fixed; sections with no content are left out.
 */
export function compileHandoffPrompt(h: Handoff): string {
  const { warm_up: warmUp, session } = h;

  const priorityFiles = warmUp.priority_files
    .map((pf, i) => ({ pf, i }))
    .sort((a, b) => a.pf.rank - b.pf.rank || a.i - b.i)
    .flatMap(({ pf }) => [
      `${pf.rank}. \`${pf.path}\` - ${pf.reason}`,
      ...(pf.focus !== null ? [`   Focus: ${pf.focus}`] : []),
    ]);

  const modified = session.files_modified.map(
    (f) => `- \`${f.path}\`${f.change_summary !== null ? ` - ${f.change_summary}` : ""}`,
  );

  return [
    block(`# Handoff: ${h.summary}`),
    block(
      `**Mode**: ${MODE_LABELS[h.mode.kind]}`,
      `**From**: ${h.created_by}`,
      `**Created**: ${formatTimestamp(h.created_at)} UTC`,
    ),
    warmUp.tldr.length > 0 ? block("## TL;DR") + block(warmUp.tldr) : "",
    compileModeSection(h.mode),
    section("## Must Know", bullets(warmUp.must_know)),
    section("## Start Here (Priority Files)", priorityFiles),
    warmUp.suggested_start !== null
      ? block("## Suggested First Action") + block(warmUp.suggested_start)
      : "",
    modified.length > 0
      ? block("## Previous Session Activity") + block("**Modified**:", ...modified)
      : "",
    h.git_ref !== null
      ? `**Git ${GIT_REF_LABELS[h.git_ref.ref_type]}**: \`${h.git_ref.value}\`\n`
      : "",
  ].join("");
}

// ─── Inbox Listing ──────────────────────────────────────

/** One-line inbox entry: `[DEBUG] 1a2b3c4d - summary`. */
export function formatHandoffLine(h: Handoff): string {
  return `[${h.mode.kind.toUpperCase()}] ${handoffShortId(h)} - ${h.summary}`;
}

export function formatHandoffDetails(h: Handoff, full: boolean): string[] {
  const read = filesByReadOrder(h.session).map((f) => f.path);
  const notes = importantObservations(h.session);
  return [
    formatHandoffLine(h),
    `  From: ${h.created_by}`,
    `  Created: ${formatTimestamp(h.created_at)}`,
    ...(h.git_ref !== null
      ? [`  Git: ${GIT_REF_LABELS[h.git_ref.ref_type]} ${h.git_ref.value}`]
      : []),
    ...(full ? [`  TL;DR: ${h.warm_up.tldr}`] : []),
    ...(full && h.warm_up.must_know.length > 0
      ? ["  Must know:", ...h.warm_up.must_know.map((k) => `    - ${k}`)]
      : []),
    ...(full && h.tags.length > 0 ? [`  Tags: ${h.tags.join(", ")}`] : []),
    ...(full ? [`  Session: ${summarizeSession(h.session)}`] : []),
    ...(full && read.length > 0 ? [`  Read: ${read.join(", ")}`] : []),
    ...(full && notes.length > 0
      ? ["  Notes:", ...notes.map((o) => `    - [${o.category}] ${o.note}`)]
      : []),
  ];
}
