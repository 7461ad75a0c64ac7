import type { SectionKind } from "../../domain/office/types";

export const PROSE_SECTION_PHRASES = [
  "A Reading",
  "The Prayer Appointed for the Week",
  "The Concluding Prayer of the Church",
  "The Collect",
] as const;

// TODO: normalizeContent collapses line breaks in every section, so this
// classification has no effect on the output yet. Verse sections probably
// meant to keep their lines; decide before wiring it into the reflow.
export function classifySection(title: string): SectionKind {
  const lower = title.toLowerCase();
  return PROSE_SECTION_PHRASES.some((phrase) => lower.includes(phrase.toLowerCase()))
    ? "prose"
    : "liturgical";
}
