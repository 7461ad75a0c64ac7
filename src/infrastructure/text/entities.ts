/**
 * The entities the office pages actually use. Curly quote entities are
 * folded to their straight ASCII forms.
 */
const ENTITIES: Record<string, string> = {
  nbsp: " ",
  quot: '"',
  ldquo: '"',
  rdquo: '"',
  lsquo: "'",
  rsquo: "'",
  apos: "'",
  amp: "&",
  mdash: "—",
  "#x27": "'",
  "#39": "'",
};

const ENTITY_PATTERN = /&(nbsp|quot|ldquo|rdquo|lsquo|rsquo|apos|amp|mdash|#x27|#39);/g;

/** Unknown entities are left untouched. */
export function decodeEntities(input: string): string {
  return input.replace(ENTITY_PATTERN, (whole, name: string) => ENTITIES[name] ?? whole);
}
