import { load } from "cheerio";
import { withPage, type BrowserOptions } from "./browser";
import { isInternalLink, toSearchResult, uniqueByUrl } from "./links";
import type { Logger } from "./logger";
import type { SearchProvider, SearchResult } from "./types";
import { errorMessage } from "./utils";

export const GOOGLE_SEARCH_URL = "https://www.google.com/search";

export function googleSearchUrl(q: string): string {
  return `${GOOGLE_SEARCH_URL}?${new URLSearchParams({ q }).toString()}`;
}

/** Pulls organic results out of a Google results page. */
export function parseGoogleResults(html: string, limit: number): SearchResult[] {
  const $ = load(html);
  const results: SearchResult[] = [];

  $("div.MjjYud").each((_, block) => {
    const href = $(block).find("a[href]").first().attr("href");
    if (!href || isInternalLink(href)) return;

    const title = $(block).find("h3").first().text();
    const result = toSearchResult(href, title, "google-browser");
    if (result) results.push(result);
  });

  return uniqueByUrl(results).slice(0, limit);
}

export class BrowserSearchProvider implements SearchProvider {
  readonly name = "browser";

  constructor(
    private readonly browser: BrowserOptions,
    private readonly limit: number,
    private readonly logger: Logger
  ) {}

  async search(q: string): Promise<SearchResult[]> {
    try {
      const html = await withPage({ ...this.browser, stealth: true }, async (page) => {
        await page.goto(googleSearchUrl(q));
        await page.waitForLoadState("networkidle");
        return page.content();
      });
      return parseGoogleResults(html, this.limit);
    } catch (err) {
      this.logger.error(`Error in Google search: ${errorMessage(err)}`);
      return [];
    }
  }
}
