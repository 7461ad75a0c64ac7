import matter from "gray-matter";
import type { Office } from "../domain/office/types";

export const OUTPUT_FORMATS = ["text", "markdown", "json"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const NO_DATA_MESSAGE = "No data available";

export function formatOfficeText(office: Office): string {
  const lines = [office.title];
  if (office.subtitle) lines.push(office.subtitle);
  lines.push("");
  if (office.sections.length === 0) lines.push(NO_DATA_MESSAGE);
  for (const section of office.sections) {
    lines.push(section.title.toUpperCase(), section.content);
    if (section.citation) lines.push(`    ${section.citation}`);
    lines.push("");
  }
  return `${lines.join("\n").trimEnd()}\n`;
}

/** Markdown body with title, subtitle and section count in front matter. */
export function formatOfficeMarkdown(office: Office): string {
  const body =
    office.sections.length === 0
      ? `_${NO_DATA_MESSAGE}_`
      : office.sections
          .map((s) =>
            [`## ${s.title}`, "", s.content, ...(s.citation ? ["", `*${s.citation}*`] : [])].join("\n"),
          )
          .join("\n\n");
  return matter.stringify(`${body}\n`, {
    title: office.title,
    subtitle: office.subtitle,
    sections: office.sections.length,
  });
}

export function formatOffice(office: Office, format: OutputFormat): string {
  switch (format) {
    case "text":
      return formatOfficeText(office);
    case "markdown":
      return formatOfficeMarkdown(office);
    case "json":
      return `${JSON.stringify(office, null, 2)}\n`;
  }
}
