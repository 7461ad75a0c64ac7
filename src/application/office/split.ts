const SECTION_MARKER = 'class="prose max-w-none"';

/**
 * Raw chunks following each section marker, in page order. Whatever precedes
 * the first marker is preamble and is dropped.
 */
export function splitSections(region: string): string[] {
  return region.split(SECTION_MARKER).slice(1);
}
