import type { SearchResult, SearchSource } from "./types";
import { domainOf } from "./utils";

export const GOOGLE_HOST = "google.com";

/**
 * True for links a results page points back at itself with: relative paths
 * (`/search?…`, `/url?…`), non-HTTP schemes, and the engine's own domain or
 * any of its subdomains.
 */
export function isInternalLink(href: string, engineHost = GOOGLE_HOST): boolean {
  if (href.startsWith("/") || href.startsWith("#")) return true;

  const host = domainOf(href);
  if (!host) return true;

  const hostname = host.replace(/:\d+$/, "").toLowerCase();
  return hostname === engineHost || hostname.endsWith(`.${engineHost}`);
}

export function toSearchResult(
  url: string | undefined | null,
  title: string | undefined | null,
  source: SearchSource,
  snippet?: string | null
): SearchResult | undefined {
  if (!url) return undefined;
  const domain = domainOf(url);
  if (!domain) return undefined;

  return {
    url,
    title: title?.replace(/\s+/g, " ").trim() ?? "",
    domain,
    ...(snippet ? { snippet } : {}),
    source,
  };
}

export function uniqueByUrl(results: SearchResult[]): SearchResult[] {
  const seen = new Set<string>();
  return results.filter((r) => {
    if (seen.has(r.url)) return false;
    seen.add(r.url);
    return true;
  });
}
