// =============================================================================
// @topicwire/worker: Headless page fetcher
// =============================================================================
// Launches an isolated Chromium per task through puppeteer-core, waits for
// DOM-ready only (not network idle) under a hard navigation timeout, and
// returns the rendered markup. The browser is closed on every path.
// =============================================================================

import puppeteer from "puppeteer-core";

export interface FetchOptions {
  timeoutMs: number;
}

export interface PageFetcher {
  fetchHtml(url: string, options: FetchOptions): Promise<string>;
}

/** Navigation ended in an HTTP error status. */
export class NavigationError extends Error {
  readonly status: number;
  readonly retryable: boolean;

  constructor(url: string, status: number) {
    super(`Navigation to ${url} returned HTTP ${status}`);
    this.name = "NavigationError";
    this.status = status;
    this.retryable = status >= 500 || status === 429;
  }
}

export interface BrowserFetcherOptions {
  executablePath: string;
  args?: string[];
}

const DEFAULT_ARGS = ["--no-sandbox", "--disable-setuid-sandbox", "--disable-dev-shm-usage"];

export function createBrowserPageFetcher(
  options: BrowserFetcherOptions,
): PageFetcher {
  return {
    async fetchHtml(url, { timeoutMs }) {
      const browser = await puppeteer.launch({
        executablePath: options.executablePath,
        headless: true,
        args: options.args ?? DEFAULT_ARGS,
      });

      try {
        const page = await browser.newPage();
        const response = await page.goto(url, {
          waitUntil: "domcontentloaded",
          timeout: timeoutMs,
        });
        if (response && response.status() >= 400) {
          throw new NavigationError(url, response.status());
        }

        return await page.content();
      } finally {
        await browser.close();
      }
    },
  };
}
