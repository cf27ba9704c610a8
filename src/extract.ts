import type { PageSnapshot, PageSource } from "./browser";
import type { Logger } from "./logger";
import { parsePageMeta } from "./parse";
import type { ContentExtractor, ExtractionFailure, ExtractionRecord } from "./types";
import { errorMessage, normalizeText } from "./utils";

export const EMPTY_PAGE_ERROR = "Page returned no text content";

export type ExtractorOptions = {
  maxContentLength: number;
  now?: () => Date;
};

export function failedRecord(url: string, error: string, at: Date = new Date()): ExtractionFailure {
  return { status: "failed", url, error, extractedAt: at.toISOString() };
}

/** A record counts as extracted only when it carries text. */
export function hasContent(r: ExtractionRecord): boolean {
  return r.status === "success" && r.content.length > 0;
}

export function toExtractionRecord(
  url: string,
  snapshot: PageSnapshot,
  maxContentLength: number,
  at: Date = new Date()
): ExtractionRecord {
  const content = normalizeText(snapshot.bodyText);
  if (!content) return failedRecord(url, EMPTY_PAGE_ERROR, at);

  const meta = parsePageMeta(snapshot.html);

  return {
    status: "success",
    url,
    title: meta.title ?? "",
    metaDescription: meta.description ?? "",
    content: content.slice(0, maxContentLength),
    contentLength: content.length,
    extractedAt: at.toISOString(),
  };
}

export class PageContentExtractor implements ContentExtractor {
  private readonly now: () => Date;

  constructor(
    private readonly source: PageSource,
    private readonly options: ExtractorOptions,
    private readonly logger: Logger
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async extract(url: string): Promise<ExtractionRecord> {
    try {
      const snapshot = await this.source.load(url);
      return toExtractionRecord(url, snapshot, this.options.maxContentLength, this.now());
    } catch (err) {
      const message = errorMessage(err);
      this.logger.error(`Content extraction failed for ${url}: ${message}`);
      return failedRecord(url, message, this.now());
    }
  }
}
