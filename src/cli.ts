import type { RunSummary } from "./pipeline";

export function keywordFromArgv(argv: string[]): string | undefined {
  const idx = argv.findIndex((a) => a === "--keyword");
  if (idx < 0 || !argv[idx + 1]) return undefined;
  return argv.slice(idx + 1).join(" ").trim() || undefined;
}

const n = (v: number) => Math.round(v).toLocaleString("en-US");

export function formatSummary(summary: RunSummary): string {
  if (summary.status === "no-results") {
    return `No results for "${summary.query}". No report generated.`;
  }

  const lines = [
    "",
    "=".repeat(60),
    "WORKFLOW SUMMARY",
    "=".repeat(60),
    `Search query:           ${summary.query}`,
    `Total links found:      ${summary.totalLinks}`,
    `Successful extractions: ${summary.successfulExtractions}`,
    `Failed extractions:     ${summary.failedExtractions}`,
    `Total content:          ${n(summary.totalContentLength)} characters`,
    `Average content length: ${n(summary.avgContentLength)} characters`,
    "",
    "Domain statistics:",
    ...Object.entries(summary.domainStats).map(
      ([domain, s]) => `  • ${domain}: ${s.count} pages, ${n(s.totalLength)} chars`
    ),
  ];

  if (summary.samples.length) {
    lines.push("", "Sample extracted content:");
    summary.samples.forEach((s, i) => {
      lines.push(
        "",
        `${i + 1}. ${s.title}`,
        `   URL: ${s.url}`,
        `   Domain: ${s.domain}`,
        `   Content length: ${n(s.contentLength)} characters`,
        `   Preview: ${s.preview}`
      );
    });
  }

  lines.push("", `CSV     : ${summary.files.csv}`, `Markdown: ${summary.files.markdown}`, `JSON    : ${summary.files.json}`, "");
  return lines.join("\n");
}
