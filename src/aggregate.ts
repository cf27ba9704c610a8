import { groupBy, mapValues, sumBy } from "lodash";
import { EMPTY_PAGE_ERROR, failedRecord } from "./extract";
import type { Logger } from "./logger";
import type {
  AggregateOutcome,
  AggregateResult,
  ContentExtractor,
  DomainStats,
  RankedFailure,
  RankedRecord,
  RankedSuccess,
  SearchProvider,
  SearchResult,
} from "./types";
import { errorMessage, sleep, type Sleep } from "./utils";

export type AggregatorDeps = {
  search: SearchProvider;
  extractor: ContentExtractor;
  logger: Logger;
  /** Pause between two extractions, in ms. */
  delayMs: number;
  sleep?: Sleep;
  now?: () => Date;
};

export function computeDomainStats(successful: RankedSuccess[]): DomainStats {
  return mapValues(
    groupBy(successful, (r) => r.domain || "unknown"),
    (records) => ({
      count: records.length,
      totalLength: sumBy(records, (r) => r.contentLength),
      pageTitles: records.map((r) => r.title || "Untitled"),
    })
  );
}

/** Demotes a success without text to a failure, keeping its rank and timestamp. */
export function settle(r: RankedRecord): RankedRecord {
  if (r.status === "failed" || r.content.length > 0) return r;
  const { url, extractedAt, searchTitle, domain, searchRank } = r;
  return { status: "failed", url, error: EMPTY_PAGE_ERROR, extractedAt, searchTitle, domain, searchRank };
}

export function summarize(
  query: string,
  searchResults: SearchResult[],
  extracted: RankedRecord[],
  startedAt: string,
  finishedAt: string
): AggregateResult {
  const records = extracted.map(settle);
  const successful = records.filter((r): r is RankedSuccess => r.status === "success");
  const failed = records.filter((r): r is RankedFailure => r.status === "failed");

  const totalContentLength = sumBy(successful, (r) => r.contentLength);
  const avgContentLength = successful.length ? totalContentLength / successful.length : 0;

  return {
    query,
    searchResults,
    records,
    successful,
    failed,
    totalContentLength,
    avgContentLength,
    domainStats: computeDomainStats(successful),
    startedAt,
    finishedAt,
  };
}

/**
 * Runs one search, then extracts every result strictly one after another,
 * pausing `delayMs` between requests. Every search result yields exactly one
 * record, in rank order.
 */
export class Aggregator {
  private readonly sleep: Sleep;
  private readonly now: () => Date;

  constructor(private readonly deps: AggregatorDeps) {
    this.sleep = deps.sleep ?? sleep;
    this.now = deps.now ?? (() => new Date());
  }

  async run(query: string): Promise<AggregateOutcome> {
    const { search, logger } = this.deps;
    const startedAt = this.now().toISOString();

    logger.info(`Searching with ${search.name} for: "${query}"`);
    const results = await search.search(query);
    if (results.length === 0) {
      logger.warn("No links found in search results.");
      return { status: "no-results", query };
    }
    logger.info(`Found ${results.length} links`);

    const records: RankedRecord[] = [];
    for (const [i, result] of results.entries()) {
      if (i > 0 && this.deps.delayMs > 0) {
        await this.sleep(this.deps.delayMs);
      }
      logger.info(`Processing page ${i + 1}/${results.length}: ${result.domain}`);
      records.push(await this.extractOne(result, i + 1));
    }

    return {
      status: "completed",
      result: summarize(query, results, records, startedAt, this.now().toISOString()),
    };
  }

  private async extractOne(result: SearchResult, searchRank: number): Promise<RankedRecord> {
    const annotation = { searchTitle: result.title, domain: result.domain, searchRank };

    try {
      const record = await this.deps.extractor.extract(result.url);
      return { ...record, ...annotation };
    } catch (err) {
      const message = errorMessage(err);
      this.deps.logger.error(`Error processing ${result.url}: ${message}`);
      return { ...failedRecord(result.url, message, this.now()), ...annotation };
    }
  }
}
