import { Aggregator } from "./aggregate";
import { BrowserPageSource, type BrowserOptions } from "./browser";
import type { Config } from "./config";
import { PageContentExtractor } from "./extract";
import { createHttp } from "./http";
import type { Logger } from "./logger";
import { buildReportRows, renderCsv, renderJson, renderNarrative } from "./report";
import { makeFilename, saveText } from "./save";
import { createSearchProvider } from "./search";
import type { DomainStats } from "./types";
import { errorMessage, preview } from "./utils";

export type ReportSettings = {
  outputDir: string;
  previewLength: number;
  topN: number;
  delayMs: number;
  maxContentLength: number;
  searchProvider: string;
};

export type PipelineDeps = {
  aggregator: Aggregator;
  logger: Logger;
  report: ReportSettings;
  now?: () => Date;
};

export type RunFiles = {
  csv: string;
  markdown: string;
  json: string;
};

export type SampleRecord = {
  title: string;
  url: string;
  domain: string;
  contentLength: number;
  preview: string;
};

export type RunSummary =
  | { status: "no-results"; query: string }
  | {
      status: "completed";
      query: string;
      totalLinks: number;
      successfulExtractions: number;
      failedExtractions: number;
      totalContentLength: number;
      avgContentLength: number;
      domainStats: DomainStats;
      samples: SampleRecord[];
      files: RunFiles;
    };

export const SAMPLE_COUNT = 3;
export const SAMPLE_PREVIEW_LENGTH = 200;

export async function runResearch(query: string, deps: PipelineDeps): Promise<RunSummary> {
  const { aggregator, logger, report } = deps;
  const now = deps.now ?? (() => new Date());

  try {
    logger.info(`[1/3] Searching and extracting pages for: "${query}" ...`);
    const outcome = await aggregator.run(query);
    if (outcome.status === "no-results") {
      logger.warn("No results from the search provider, no report written.");
      return outcome;
    }
    const aggregate = outcome.result;
    logger.success(
      `[✓] ${aggregate.successful.length} extracted, ${aggregate.failed.length} failed out of ${aggregate.records.length}.`
    );

    logger.info("[2/3] Rendering reports ...");
    const csv = renderCsv(buildReportRows(aggregate.records, report.previewLength));
    const markdown = renderNarrative(aggregate, {
      topN: report.topN,
      previewLength: report.previewLength,
      delayMs: report.delayMs,
      maxContentLength: report.maxContentLength,
      searchProvider: report.searchProvider,
    });

    logger.info("[3/3] Saving ...");
    const at = now();
    const files: RunFiles = {
      csv: await saveText(report.outputDir, makeFilename(query, "csv", at), csv),
      markdown: await saveText(report.outputDir, makeFilename(query, "md", at), markdown),
      json: await saveText(report.outputDir, makeFilename(query, "json", at), renderJson(aggregate)),
    };
    logger.success("Workflow completed successfully!");

    return {
      status: "completed",
      query,
      totalLinks: aggregate.searchResults.length,
      successfulExtractions: aggregate.successful.length,
      failedExtractions: aggregate.failed.length,
      totalContentLength: aggregate.totalContentLength,
      avgContentLength: aggregate.avgContentLength,
      domainStats: aggregate.domainStats,
      samples: aggregate.successful.slice(0, SAMPLE_COUNT).map((r) => ({
        title: r.title || "Untitled",
        url: r.url,
        domain: r.domain,
        contentLength: r.contentLength,
        preview: preview(r.content, SAMPLE_PREVIEW_LENGTH) ?? "",
      })),
      files,
    };
  } catch (err) {
    logger.error(`Error in workflow: ${errorMessage(err)}`);
    throw err;
  }
}

/** Wires the concrete search, browser and extraction backends from configuration. */
export function createResearchPipeline(config: Config, logger: Logger): PipelineDeps {
  const browser: BrowserOptions = {
    headless: config.headless,
    userAgent: config.userAgent,
    timeoutMs: config.pageTimeoutMs,
  };
  const search = createSearchProvider(config, createHttp(config.userAgent), browser, logger);
  const extractor = new PageContentExtractor(
    new BrowserPageSource(browser),
    { maxContentLength: config.maxContentLength },
    logger
  );

  return {
    aggregator: new Aggregator({ search, extractor, logger, delayMs: config.extractionDelayMs }),
    logger,
    report: {
      outputDir: config.outputDir,
      previewLength: config.previewLength,
      topN: config.reportTopN,
      delayMs: config.extractionDelayMs,
      maxContentLength: config.maxContentLength,
      searchProvider: search.name,
    },
  };
}
