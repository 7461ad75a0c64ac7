/**
 * One named part of an office (a reading, a psalm, a collect).
 * `content` is already reflowed for a reading surface.
 */
export type OfficeSection = {
  readonly title: string;
  readonly content: string;
  readonly citation?: string;
};

export type Office = {
  readonly title: string;
  readonly subtitle: string;
  readonly sections: readonly OfficeSection[];
};

export const DEFAULT_OFFICE_TITLE = "The Divine Hours";

/** `prose` sections read as continuous paragraphs; the rest are psalms, hymns, responses. */
export type SectionKind = "prose" | "liturgical";
