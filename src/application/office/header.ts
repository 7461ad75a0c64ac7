import { DEFAULT_OFFICE_TITLE } from "../../domain/office/types";
import { firstMatch } from "../../infrastructure/text/html";
import { decodeEntities } from "../../infrastructure/text/entities";

const TITLE = /<h1[^>]*>([^<]+)<\/h1>/;
const SUBTITLE = /<h1[^>]*>[\s\S]*?<\/h1>\s*<p[^>]*>([^<]+)<\/p>/;

export type OfficeHeader = {
  title: string;
  subtitle: string;
};

export function extractHeader(region: string): OfficeHeader {
  const title = firstMatch(region, TITLE) ?? DEFAULT_OFFICE_TITLE;
  const subtitle = firstMatch(region, SUBTITLE) ?? "";
  return {
    title: decodeEntities(title).trim(),
    subtitle: decodeEntities(subtitle).trim(),
  };
}
