/**
 * Join lines into a markdown block followed by one blank line.
 * Prompt sections are concatenated from these blocks.
 */
export function block(...lines: string[]): string {
  return lines.join("\n") + "\n\n";
}

/** A heading block plus its body, or nothing when the body is empty. */
export function section(heading: string, body: string[]): string {
  if (body.length === 0) return "";
  return block(heading) + block(...body);
}

export function bullets(items: readonly string[]): string[] {
  return items.map((item) => `- ${item}`);
}

export function numbered(items: readonly string[]): string[] {
  return items.map((item, i) => `${i + 1}. ${item}`);
}
