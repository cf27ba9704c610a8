import { chromium, type Browser, type Page } from "playwright";
import { chromium as stealthChromium } from "playwright-extra";
import stealth from "puppeteer-extra-plugin-stealth";

stealthChromium.use(stealth());

export type BrowserOptions = {
  headless: boolean;
  userAgent: string;
  timeoutMs: number;
  stealth?: boolean;
};

/** Rendered HTML (title and meta tags included) and the visible body text. */
export type PageSnapshot = {
  html: string;
  bodyText: string;
};

/** Anything that can turn a URL into the rendered page. */
export interface PageSource {
  load(url: string): Promise<PageSnapshot>;
}

/**
 * Launches a fresh browser, hands a page to `fn`, and closes the browser
 * whether `fn` resolves or throws.
 */
export async function withPage<T>(options: BrowserOptions, fn: (page: Page) => Promise<T>): Promise<T> {
  const browser: Browser = options.stealth
    ? await stealthChromium.launch({ headless: options.headless })
    : await chromium.launch({ headless: options.headless });

  try {
    const page = await browser.newPage({ userAgent: options.userAgent });
    page.setDefaultTimeout(options.timeoutMs);
    return await fn(page);
  } finally {
    await browser.close();
  }
}

export async function loadRendered(page: Page, url: string, timeoutMs: number): Promise<PageSnapshot> {
  await page.goto(url, { waitUntil: "networkidle", timeout: timeoutMs });
  const bodyText = await page.innerText("body");
  const html = await page.content();
  return { html, bodyText };
}

export class BrowserPageSource implements PageSource {
  constructor(private readonly options: BrowserOptions) {}

  load(url: string): Promise<PageSnapshot> {
    return withPage(this.options, (page) => loadRendered(page, url, this.options.timeoutMs));
  }
}
