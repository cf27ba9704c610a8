import Papa from "papaparse";
import { hasContent } from "./extract";
import type { AggregateResult, RankedRecord } from "./types";
import { preview } from "./utils";

export const NA = "N/A";

export const TABLE_COLUMNS = [
  "Search Rank",
  "Domain",
  "URL",
  "Search Title",
  "Page Title",
  "Meta Description",
  "Content Length",
  "Content Preview",
  "Status",
  "Error",
  "Extracted At",
] as const;

export type TableColumn = (typeof TABLE_COLUMNS)[number];
export type ReportRow = Record<TableColumn, string | number>;
export type RowStatus = "Success" | "Failed";

export function buildReportRow(r: RankedRecord, previewLength = 500): ReportRow {
  const ok = hasContent(r);
  const status: RowStatus = ok ? "Success" : "Failed";

  return {
    "Search Rank": r.searchRank,
    Domain: r.domain || NA,
    URL: r.url || NA,
    "Search Title": r.searchTitle || NA,
    "Page Title": (r.status === "success" && r.title) || NA,
    "Meta Description": (r.status === "success" && r.metaDescription) || NA,
    "Content Length": r.status === "success" ? r.contentLength : 0,
    "Content Preview": (r.status === "success" && preview(r.content, previewLength)) || NA,
    Status: status,
    Error: (r.status === "failed" && r.error) || NA,
    "Extracted At": r.extractedAt || NA,
  };
}

export function buildReportRows(records: RankedRecord[], previewLength = 500): ReportRow[] {
  return records.map((r) => buildReportRow(r, previewLength));
}

export function renderCsv(rows: ReportRow[]): string {
  return Papa.unparse(rows, {
    columns: [...TABLE_COLUMNS],
    quotes: true,
    header: true,
  });
}

export function parseReportCsv(csv: string): Array<Record<string, string>> {
  const parsed = Papa.parse<Record<string, string>>(csv, {
    header: true,
    skipEmptyLines: true,
  });
  if (parsed.errors.length) {
    throw new Error(`Malformed report CSV: ${parsed.errors[0].message}`);
  }
  return parsed.data;
}

export function renderJson(aggregate: AggregateResult): string {
  return JSON.stringify(aggregate, null, 2);
}

export type NarrativeOptions = {
  topN?: number;
  previewLength?: number;
  delayMs?: number;
  searchProvider?: string;
  maxContentLength?: number;
  generatedAt?: Date;
};

export const NARRATIVE_SECTIONS = [
  "Introduction",
  "Methodology",
  "Key Findings",
  "Detailed Analysis",
  "Conclusion",
  "References",
] as const;

const fmt = (n: number) => Math.round(n).toLocaleString("en-US");

const anchor = (heading: string) => heading.toLowerCase().replace(/[^a-z0-9]+/g, "-");

/** Inline text safe to drop into a Markdown line. */
function inline(s: string): string {
  return s.replace(/\s+/g, " ").replace(/([\\`*_[\]])/g, "\\$1").trim();
}

export function renderNarrative(aggregate: AggregateResult, options: NarrativeOptions = {}): string {
  const {
    topN = 5,
    previewLength = 500,
    delayMs,
    searchProvider,
    maxContentLength,
    generatedAt = new Date(aggregate.finishedAt),
  } = options;
  const { query, records, successful, failed, domainStats } = aggregate;
  const domains = Object.entries(domainStats).sort(([, a], [, b]) => b.count - a.count);
  const top = successful.slice(0, topN);

  const out: string[] = [];

  out.push(`# Web Research Report: ${inline(query)}`, "");
  out.push(`- **Generated:** ${generatedAt.toISOString()}`);
  out.push(`- **Pages found:** ${records.length}`);
  out.push(`- **Successful extractions:** ${successful.length}`);
  out.push(`- **Failed extractions:** ${failed.length}`);
  out.push(`- **Total content:** ${fmt(aggregate.totalContentLength)} characters`);
  out.push(`- **Average content length:** ${fmt(aggregate.avgContentLength)} characters`);
  out.push("");

  out.push("## Table of Contents", "");
  NARRATIVE_SECTIONS.forEach((s, i) => out.push(`${i + 1}. [${s}](#${anchor(s)})`));
  out.push("");

  out.push("## Introduction", "");
  out.push(
    `This report compiles the web pages returned for the query "${inline(query)}". ` +
      `${records.length} result pages were visited and ${successful.length} of them yielded readable content.`
  );
  out.push("");

  out.push("## Methodology", "");
  out.push(`- Search provider: ${searchProvider ?? "unspecified"}`);
  out.push(`- Results requested: ${aggregate.searchResults.length}, visited in rank order, one at a time`);
  if (delayMs !== undefined) out.push(`- Delay between page requests: ${delayMs} ms`);
  if (maxContentLength !== undefined) out.push(`- Stored content per page capped at ${fmt(maxContentLength)} characters`);
  out.push(`- Previews limited to ${previewLength} characters; top ${topN} pages analysed in detail`);
  out.push(`- Run window: ${aggregate.startedAt} to ${aggregate.finishedAt}`);
  out.push("");

  out.push("## Key Findings", "");
  if (domains.length === 0) {
    out.push("No page yielded readable content.");
  } else {
    out.push("| Domain | Pages | Total characters | Titles |", "| --- | --- | --- | --- |");
    for (const [domain, stat] of domains) {
      const titles = stat.pageTitles.map((t) => inline(t).replace(/\|/g, "\\|")).join("; ");
      out.push(`| ${domain} | ${stat.count} | ${fmt(stat.totalLength)} | ${titles} |`);
    }
  }
  out.push("");

  out.push("## Detailed Analysis", "");
  if (top.length === 0) {
    out.push("No content available for analysis.", "");
  }
  top.forEach((r, i) => {
    out.push(`### ${i + 1}. ${inline(r.title || r.searchTitle || r.url)}`, "");
    out.push(`- **URL:** ${r.url}`);
    out.push(`- **Domain:** ${r.domain}`);
    out.push(`- **Search rank:** ${r.searchRank}`);
    out.push(`- **Content length:** ${fmt(r.contentLength)} characters`);
    if (r.metaDescription) out.push(`- **Description:** ${inline(r.metaDescription)}`);
    out.push("", `> ${inline(preview(r.content, previewLength) ?? "")}`, "");
  });

  out.push("## Conclusion", "");
  const leader = domains[0];
  out.push(
    `Of ${records.length} pages, ${successful.length} were extracted successfully and ${failed.length} failed.` +
      (leader ? ` The most represented source was ${leader[0]} with ${leader[1].count} page(s).` : "")
  );
  out.push("");

  out.push("## References", "");
  records.forEach((r) => {
    const title = inline((r.status === "success" && r.title) || r.searchTitle || r.url);
    out.push(`${r.searchRank}. [${title}](<${r.url}>)`);
  });
  out.push("");

  return out.join("\n");
}
