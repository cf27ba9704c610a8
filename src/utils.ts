export const ELLIPSIS = "...";

export function preview(s: string | undefined, n = 500): string | undefined {
  if (!s) return s;
  return s.length > n ? s.slice(0, n) + ELLIPSIS : s;
}

export function normalizeText(raw: string): string {
  return raw
    .replace(/\n+/g, "\n")
    .replace(/\s+/g, " ")
    .trim();
}

/** Host portion of a URL (hostname plus port), or undefined when it does not parse. */
export function domainOf(url: string): string | undefined {
  try {
    const { host, protocol } = new URL(url);
    if (protocol !== "http:" && protocol !== "https:") return undefined;
    return host || undefined;
  } catch {
    return undefined;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export async function sleep(ms: number) {
  return new Promise<void>((r) => setTimeout(r, ms));
}

export type Sleep = (ms: number) => Promise<void>;
