import { describe, expect, it, vi } from "vitest";
import { Aggregator, computeDomainStats, summarize } from "../src/aggregate";
import { EMPTY_PAGE_ERROR } from "../src/extract";
import { buildReportRows, parseReportCsv, renderCsv } from "../src/report";
import type { AggregateResult } from "../src/types";
import { fakeExtractor, fakeLogger, fakeSearch, result, success, T0 } from "./helpers";

const a1 = result("https://a.example.com/1", "A1");
const b2 = result("https://b.example.com/2", "B2");
const a3 = result("https://a.example.com/3", "A3");

function completed(outcome: Awaited<ReturnType<Aggregator["run"]>>): AggregateResult {
  if (outcome.status !== "completed") throw new Error(`expected a completed run, got ${outcome.status}`);
  return outcome.result;
}

function setup(delayMs = 2000) {
  const search = fakeSearch([a1, b2, a3]);
  const extractor = fakeExtractor({
    [a1.url]: success(a1.url, "Hello world", { title: "Page A1" }),
    [b2.url]: new Error("net::ERR_NAME_NOT_RESOLVED"),
    [a3.url]: success(a3.url, "abc", { contentLength: 29 }),
  });
  const sleep = vi.fn(async (_ms: number) => {});
  const logger = fakeLogger();
  const aggregator = new Aggregator({ search, extractor, logger, delayMs, sleep, now: () => new Date(T0) });
  return { aggregator, search, extractor, sleep, logger };
}

describe("Aggregator", () => {
  it("yields one record per search result, ranked 1..N in order", async () => {
    const { aggregator } = setup();
    const agg = completed(await aggregator.run("laptops"));

    expect(agg.records).toHaveLength(agg.searchResults.length);
    expect(agg.records.map((r) => r.searchRank)).toEqual([1, 2, 3]);
    expect(agg.records.map((r) => r.url)).toEqual([a1.url, b2.url, a3.url]);
    expect(agg.records.map((r) => r.searchTitle)).toEqual(["A1", "B2", "A3"]);
  });

  it("substitutes a failed record when the extractor throws", async () => {
    const { aggregator, logger } = setup();
    const agg = completed(await aggregator.run("laptops"));

    expect(agg.records[1]).toEqual({
      status: "failed",
      url: b2.url,
      error: "net::ERR_NAME_NOT_RESOLVED",
      extractedAt: T0,
      searchTitle: "B2",
      domain: "b.example.com",
      searchRank: 2,
    });
    expect(agg.failed).toEqual([agg.records[1]]);
    expect(logger.error).toHaveBeenCalledWith(`Error processing ${b2.url}: net::ERR_NAME_NOT_RESOLVED`);
  });

  it("waits the configured delay between extractions only", async () => {
    const { aggregator, sleep, extractor } = setup(2000);
    await aggregator.run("laptops");

    expect(extractor.extract).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenNthCalledWith(1, 2000);
    expect(sleep).toHaveBeenNthCalledWith(2, 2000);
  });

  it("does not sleep when the delay is zero", async () => {
    const { aggregator, sleep } = setup(0);
    await aggregator.run("laptops");
    expect(sleep).not.toHaveBeenCalled();
  });

  it("computes totals, average and per-domain stats from successes", async () => {
    const { aggregator } = setup();
    const agg = completed(await aggregator.run("laptops"));

    expect(agg.successful.map((r) => r.searchRank)).toEqual([1, 3]);
    expect(agg.totalContentLength).toBe(40);
    expect(agg.avgContentLength).toBe(20);
    expect(agg.domainStats).toEqual({
      "a.example.com": { count: 2, totalLength: 40, pageTitles: ["Page A1", "Untitled"] },
    });

    const counted = Object.values(agg.domainStats).reduce((n, s) => n + s.count, 0);
    expect(counted).toBe(agg.successful.length);
  });

  it("counts a success without text as a failed extraction", async () => {
    const aggregator = new Aggregator({
      search: fakeSearch([a1, b2]),
      extractor: fakeExtractor({
        [a1.url]: success(a1.url, ""),
        [b2.url]: success(b2.url, "Some text", { title: "Page B2" }),
      }),
      logger: fakeLogger(),
      delayMs: 0,
    });
    const agg = completed(await aggregator.run("laptops"));

    expect(agg.successful.map((r) => r.url)).toEqual([b2.url]);
    expect(agg.failed).toEqual([
      {
        status: "failed",
        url: a1.url,
        error: EMPTY_PAGE_ERROR,
        extractedAt: T0,
        searchTitle: "A1",
        domain: "a.example.com",
        searchRank: 1,
      },
    ]);

    const table = parseReportCsv(renderCsv(buildReportRows(agg.records)));
    expect(table.map((r) => r.Status)).toEqual(["Failed", "Success"]);
    expect(table.filter((r) => r.Status === "Success")).toHaveLength(agg.successful.length);
    expect(table.filter((r) => r.Status === "Failed")).toHaveLength(agg.failed.length);
  });

  it("stops early without extracting when the search is empty", async () => {
    const search = fakeSearch([]);
    const extractor = fakeExtractor({});
    const sleep = vi.fn(async (_ms: number) => {});
    const logger = fakeLogger();
    const aggregator = new Aggregator({ search, extractor, logger, delayMs: 2000, sleep });

    expect(await aggregator.run("nothing here")).toEqual({ status: "no-results", query: "nothing here" });
    expect(extractor.extract).not.toHaveBeenCalled();
    expect(sleep).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledWith("No links found in search results.");
  });

  it("propagates a search provider that throws", async () => {
    const aggregator = new Aggregator({
      search: fakeSearch(new Error("browser crashed")),
      extractor: fakeExtractor({}),
      logger: fakeLogger(),
      delayMs: 0,
    });
    await expect(aggregator.run("q")).rejects.toThrow("browser crashed");
  });
});

describe("summarize", () => {
  it("reports a zero average when nothing succeeded", () => {
    const agg = summarize(
      "q",
      [b2],
      [{ status: "failed", url: b2.url, error: "timeout", extractedAt: T0, searchTitle: "B2", domain: "b.example.com", searchRank: 1 }],
      T0,
      T0
    );

    expect(agg.successful).toEqual([]);
    expect(agg.totalContentLength).toBe(0);
    expect(agg.avgContentLength).toBe(0);
    expect(agg.domainStats).toEqual({});
  });
});

describe("computeDomainStats", () => {
  it("groups by domain in order of first appearance", () => {
    const annotate = (url: string, rank: number, content: string, title: string) => ({
      ...success(url, content, { title }),
      searchTitle: title,
      domain: new URL(url).host,
      searchRank: rank,
    });

    const stats = computeDomainStats([
      annotate("https://b.example.com/1", 1, "1234", "B one"),
      annotate("https://a.example.com/2", 2, "12", "A one"),
      annotate("https://b.example.com/3", 3, "123456", "B two"),
    ]);

    expect(Object.keys(stats)).toEqual(["b.example.com", "a.example.com"]);
    expect(stats["b.example.com"]).toEqual({ count: 2, totalLength: 10, pageTitles: ["B one", "B two"] });
    expect(stats["a.example.com"]).toEqual({ count: 1, totalLength: 2, pageTitles: ["A one"] });
  });
});
