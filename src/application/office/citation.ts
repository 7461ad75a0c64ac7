import { allMatches, stripTags } from "../../infrastructure/text/html";
import { decodeEntities } from "../../infrastructure/text/entities";

const CITATION = /<p[^>]*class="[^"]*text-sm[^"]*text-gray-500[^"]*italic[^"]*"[^>]*>([\s\S]*?)<\/p>/g;

export const CITATION_PREFIX = "— ";
export const CITATION_SEPARATOR = " | ";

export function cleanCitationFragment(raw: string): string {
  const stripped = stripTags(raw)
    .replace(/^\s*[—–-]+\s*/, "")
    .replace(/&mdash;/g, "")
    .trim();
  return decodeEntities(stripped).replace(/\s*\n+\s*/g, " ").trim();
}

/**
 * Every muted italic attribution in the chunk, joined into one line with a
 * single leading dash. `undefined` when no fragment has any text.
 */
export function extractCitation(chunk: string): string | undefined {
  const fragments = allMatches(chunk, CITATION)
    .map(cleanCitationFragment)
    .filter((fragment) => fragment.length > 0);
  if (fragments.length === 0) return undefined;
  return CITATION_PREFIX + fragments.join(CITATION_SEPARATOR);
}
