/**
 * Regex helpers over loosely structured markup.
 *
 * These are not an HTML parser: they match the handful of fixed patterns the
 * office pages use and return `undefined` / `[]` when a pattern is absent.
 */

/** First capture group of the first match, trimmed. */
export function firstMatch(input: string, pattern: RegExp): string | undefined {
  const match = new RegExp(pattern.source, withoutGlobal(pattern.flags)).exec(input);
  const group = match?.[1];
  return group === undefined ? undefined : group.trim();
}

/** First capture group of every match, in document order, untrimmed. */
export function allMatches(input: string, pattern: RegExp): string[] {
  const flags = pattern.flags.includes("g") ? pattern.flags : `${pattern.flags}g`;
  const out: string[] = [];
  for (const match of input.matchAll(new RegExp(pattern.source, flags))) {
    const group = match[1];
    if (group !== undefined) out.push(group);
  }
  return out;
}

export function breaksToNewlines(input: string): string {
  return input.replace(/<br\s*\/?>/gi, "\n");
}

/** Removes every tag, comments included. */
export function stripTags(input: string): string {
  return input.replace(/<[^>]+>/g, "");
}

function withoutGlobal(flags: string): string {
  return flags.replace(/[gy]/g, "");
}
