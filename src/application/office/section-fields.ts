import { allMatches, firstMatch } from "../../infrastructure/text/html";
import { decodeEntities } from "../../infrastructure/text/entities";

const SECTION_TITLE = /<h2[^>]*>([^<]+)<\/h2>/;
const SUB_HEADER = /<h3[^>]*>([^<]+)<\/h3>/;
const CONTENT_BLOCK = /<div[^>]*class="[^"]*whitespace-pre-line[^"]*"[^>]*>([\s\S]*?)<\/div>/g;

export type SectionFields = {
  title: string;
  subHeader: string;
  blocks: string[];
};

/** `undefined` when the chunk carries no usable section heading. */
export function extractSectionFields(chunk: string): SectionFields | undefined {
  const title = decodeEntities(firstMatch(chunk, SECTION_TITLE) ?? "").trim();
  if (title.length === 0) return undefined;
  return {
    title,
    subHeader: decodeEntities(firstMatch(chunk, SUB_HEADER) ?? "").trim(),
    blocks: allMatches(chunk, CONTENT_BLOCK),
  };
}

/** The sub-header, when present, becomes a bold lead-in paragraph. */
export function composeRawContent(fields: SectionFields): string {
  const body = fields.blocks.join("\n\n");
  return fields.subHeader.length > 0 ? `**${fields.subHeader}**\n\n${body}` : body;
}
