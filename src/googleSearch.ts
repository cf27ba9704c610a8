import { google, type customsearch_v1 } from "googleapis";
import { toSearchResult, uniqueByUrl } from "./links";
import type { Logger } from "./logger";
import type { SearchProvider, SearchResult } from "./types";
import { errorMessage, sleep, type Sleep } from "./utils";

export type CseListParams = {
  q: string;
  cx: string;
  key: string;
  num: number;
  start: number;
};

export type CseList = (params: CseListParams) => Promise<customsearch_v1.Schema$Result[]>;

export const PER_PAGE = 10; // Google caps at 10

export const listWithGoogleapis: CseList = async (params) => {
  const customsearch = google.customsearch("v1");
  const res = await customsearch.cse.list(params);
  return res.data.items ?? [];
};

export type GoogleSearchOptions = {
  apiKey?: string;
  cx?: string;
  limit: number;
  pageDelayMs: number;
};

/** Google Custom Search JSON API, paged ten results at a time. */
export class GoogleSearchProvider implements SearchProvider {
  readonly name = "google";

  constructor(
    private readonly options: GoogleSearchOptions,
    private readonly logger: Logger,
    private readonly list: CseList = listWithGoogleapis,
    private readonly wait: Sleep = sleep
  ) {}

  async search(q: string): Promise<SearchResult[]> {
    const { apiKey: key, cx, limit, pageDelayMs } = this.options;
    if (!key || !cx) return [];

    const results: SearchResult[] = [];

    try {
      for (let start = 1; start <= limit && results.length < limit; start += PER_PAGE) {
        const items = await this.list({ q, cx, key, num: PER_PAGE, start });

        for (const item of items) {
          const r = toSearchResult(item.link, item.title, "google-cse", item.snippet);
          if (r) results.push(r);
        }

        if (items.length < PER_PAGE) break;

        if (results.length < limit) {
          await this.wait(pageDelayMs);
        }
      }
    } catch (err) {
      this.logger.error(`Google Custom Search failed: ${errorMessage(err)}`);
      return [];
    }

    return uniqueByUrl(results).slice(0, limit);
  }
}
