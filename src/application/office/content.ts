import { decodeEntities } from "../../infrastructure/text/entities";
import { breaksToNewlines, stripTags } from "../../infrastructure/text/html";
import {
  capBlankLines,
  collapseSingleNewlines,
  normalizeNewlines,
  trimLines,
} from "../../infrastructure/text/normalize";

/**
 * Turns the raw markup of a section body into reading text:
 * entities decoded, `<br>` turned into newlines, remaining tags dropped,
 * wrapped lines joined into paragraphs, at most one blank line between
 * paragraphs.
 *
 * Every section is reflowed the same way, psalms and hymns included;
 * `classifySection` is not consulted here.
 */
export function normalizeContent(raw: string): string {
  const plain = stripTags(breaksToNewlines(normalizeNewlines(decodeEntities(raw))));
  return capBlankLines(trimLines(collapseSingleNewlines(plain))).trim();
}
