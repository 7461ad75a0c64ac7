import type { Office, OfficeSection } from "../../domain/office/types";
import { extractCitation } from "./citation";
import { normalizeContent } from "./content";
import { extractHeader } from "./header";
import { isolateMainContent } from "./isolate";
import { composeRawContent, extractSectionFields } from "./section-fields";
import { splitSections } from "./split";

export function extractSection(chunk: string): OfficeSection | undefined {
  const fields = extractSectionFields(chunk);
  if (!fields) return undefined;
  return {
    title: fields.title,
    content: normalizeContent(composeRawContent(fields)),
    citation: extractCitation(chunk),
  };
}

/**
 * Pure and total: any string, including an empty one or a page with none of
 * the expected markers, yields an office.
 */
export function extractOffice(html: string): Office {
  const region = isolateMainContent(html);
  const { title, subtitle } = extractHeader(region);
  const sections: OfficeSection[] = [];
  for (const chunk of splitSections(region)) {
    const section = extractSection(chunk);
    if (section) sections.push(section);
  }
  return { title, subtitle, sections };
}
