import type { AxiosInstance } from "axios";
import type { BrowserOptions } from "./browser";
import { BrowserSearchProvider } from "./browserSearch";
import type { Config } from "./config";
import { GoogleSearchProvider } from "./googleSearch";
import type { Logger } from "./logger";
import { SerperSearchProvider } from "./serperSearch";
import type { SearchProvider, SearchResult } from "./types";
import { errorMessage } from "./utils";

/** Asks each provider in turn and returns the first non-empty answer. */
export class FallbackSearchProvider implements SearchProvider {
  readonly name: string;

  constructor(
    private readonly providers: SearchProvider[],
    private readonly logger: Logger
  ) {
    this.name = providers.map((p) => p.name).join(" > ");
  }

  async search(q: string): Promise<SearchResult[]> {
    for (const provider of this.providers) {
      let results: SearchResult[] = [];
      try {
        results = await provider.search(q);
      } catch (err) {
        this.logger.error(`Search provider ${provider.name} failed: ${errorMessage(err)}`);
      }

      if (results.length) {
        this.logger.debug(`Search answered by ${provider.name}`);
        return results;
      }
      this.logger.debug(`No results from ${provider.name}`);
    }
    return [];
  }
}

export function createSearchProvider(
  config: Config,
  http: AxiosInstance,
  browser: BrowserOptions,
  logger: Logger
): SearchProvider {
  const limit = config.searchResultLimit;
  const serper = () => new SerperSearchProvider(http, config.serperApiKey, limit, logger);
  const google = () =>
    new GoogleSearchProvider(
      { apiKey: config.googleApiKey, cx: config.googleCx, limit, pageDelayMs: config.searchPageDelayMs },
      logger
    );
  const viaBrowser = () => new BrowserSearchProvider(browser, limit, logger);

  switch (config.searchProvider) {
    case "serper":
      return serper();
    case "google":
      return google();
    case "browser":
      return viaBrowser();
    case "auto": {
      const chain: SearchProvider[] = [];
      if (config.serperApiKey) chain.push(serper());
      if (config.googleApiKey && config.googleCx) chain.push(google());
      chain.push(viaBrowser());
      return new FallbackSearchProvider(chain, logger);
    }
  }
}
