import { vi } from "vitest";
import type { Logger } from "../src/logger";
import type {
  ContentExtractor,
  ExtractionRecord,
  ExtractionSuccess,
  SearchProvider,
  SearchResult,
} from "../src/types";

export const T0 = "2026-10-18T10:00:00.000Z";

export function fakeLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    success: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

export function result(url: string, title: string, source: SearchResult["source"] = "serper"): SearchResult {
  return { url, title, domain: new URL(url).host, source };
}

export function success(url: string, content: string, extra: Partial<ExtractionSuccess> = {}): ExtractionSuccess {
  return {
    status: "success",
    url,
    title: "",
    metaDescription: "",
    content,
    contentLength: content.length,
    extractedAt: T0,
    ...extra,
  };
}

export function fakeSearch(results: SearchResult[] | Error, name = "fake") {
  const provider = {
    name,
    search: vi.fn(async () => {
      if (results instanceof Error) throw results;
      return results;
    }),
  };
  return provider satisfies SearchProvider;
}

/** Answers from a url → record table; an Error entry makes `extract` reject. */
export function fakeExtractor(table: Record<string, ExtractionRecord | Error>) {
  const extractor = {
    extract: vi.fn(async (url: string) => {
      const entry = table[url];
      if (entry === undefined) throw new Error(`unexpected url ${url}`);
      if (entry instanceof Error) throw entry;
      return entry;
    }),
  };
  return extractor satisfies ContentExtractor;
}
