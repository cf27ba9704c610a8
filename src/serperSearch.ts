import type { AxiosInstance } from "axios";
import { toSearchResult, uniqueByUrl } from "./links";
import type { Logger } from "./logger";
import type { SearchProvider, SearchResult } from "./types";
import { errorMessage } from "./utils";

export const SERPER_ENDPOINT = "https://google.serper.dev/search";

type SerperResponse = {
  organic?: Array<{
    title?: string;
    link?: string;
    snippet?: string;
    position?: number;
  }>;
};

export class SerperSearchProvider implements SearchProvider {
  readonly name = "serper";

  constructor(
    private readonly http: AxiosInstance,
    private readonly apiKey: string | undefined,
    private readonly limit: number,
    private readonly logger: Logger
  ) {}

  async search(q: string): Promise<SearchResult[]> {
    if (!this.apiKey) return [];

    try {
      const { data } = await this.http.post<SerperResponse>(
        SERPER_ENDPOINT,
        { q, num: this.limit },
        { headers: { "X-API-KEY": this.apiKey, "Content-Type": "application/json" } }
      );

      const results = (data?.organic ?? [])
        .map((item) => toSearchResult(item.link, item.title, "serper", item.snippet))
        .filter((r): r is SearchResult => r !== undefined);

      return uniqueByUrl(results).slice(0, this.limit);
    } catch (err) {
      this.logger.error(`Serper search failed: ${errorMessage(err)}`);
      return [];
    }
  }
}
