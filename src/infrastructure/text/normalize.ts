export function normalizeNewlines(input: string): string {
  return input.replace(/\r\n?/g, "\n");
}

/**
 * Joins wrapped lines into one paragraph while keeping blank lines as
 * paragraph breaks. `"a\nb\n\nc"` becomes `"a b\n\nc"`.
 */
export function collapseSingleNewlines(input: string): string {
  return input
    .split("\n\n")
    .map((paragraph) => paragraph.replace(/\n/g, " "))
    .join("\n\n");
}

/** Trims spaces and tabs at both ends of every line. */
export function trimLines(input: string): string {
  return input
    .split("\n")
    .map((line) => line.replace(/^[^\S\n]+|[^\S\n]+$/g, ""))
    .join("\n");
}

/** At most one blank line between paragraphs. */
export function capBlankLines(input: string): string {
  return input.replace(/\n{3,}/g, "\n\n");
}
