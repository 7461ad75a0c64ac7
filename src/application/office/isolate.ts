import { firstMatch } from "../../infrastructure/text/html";

/**
 * The centered content wrapper, closed by three layout divs and `</main>`.
 * Navigation and footer markup sit outside it.
 */
const MAIN_CONTAINER =
  /<div[^>]*class="[^"]*max-w-4xl\s+mx-auto[^"]*"[^>]*>([\s\S]*?)<\/div>\s*<\/div>\s*<\/div>\s*<\/div>\s*<\/main>/;

/** Falls back to the whole page when the wrapper is missing. */
export function isolateMainContent(html: string): string {
  return firstMatch(html, MAIN_CONTAINER) ?? html;
}
