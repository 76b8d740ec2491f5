import { parse as parseContentType } from "content-type";
import iconv from "iconv-lite";
import { chromium, type Browser } from "playwright";
import { FetchError, errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import type { FetchMode, RenderHints } from "./types.js";

const log = createLogger({ component: "fetcher" });

const DEFAULT_SETTLE_MS = 2000;

export interface FetcherOptions {
  timeoutMs: number;
  userAgent: string;
  retries?: number;
}

export interface PageFetcher {
  fetch(url: string, mode: FetchMode, hints?: RenderHints): Promise<string>;
}

function charsetOf(contentType: string | null): string {
  if (!contentType) return "utf-8";
  try {
    const charset = parseContentType(contentType).parameters.charset?.toLowerCase();
    // Sites that omit or mislabel the charset serve UTF-8 in practice.
    if (!charset || charset === "iso-8859-1") return "utf-8";
    return charset;
  } catch (error) {
    log.debug({ contentType, err: errorMessage(error) }, "Unparseable content-type, assuming utf-8");
    return "utf-8";
  }
}

export async function decodeBody(res: Response): Promise<string> {
  const buffer = Buffer.from(await res.arrayBuffer());
  const charset = charsetOf(res.headers.get("content-type"));
  if (charset === "utf-8" || charset === "utf8" || !iconv.encodingExists(charset)) {
    return buffer.toString("utf-8");
  }
  return iconv.decode(buffer, charset);
}

export async function fetchStatic(url: string, options: FetcherOptions): Promise<string> {
  let res: Response;
  try {
    res = await fetch(url, {
      headers: {
        "User-Agent": options.userAgent,
        Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
        "Accept-Language": "es-ES,es;q=0.9,en;q=0.8",
      },
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (error) {
    throw new FetchError(`Request to ${url} failed: ${errorMessage(error)}`, url, undefined, { cause: error });
  }

  if (!res.ok) {
    throw new FetchError(`Request to ${url} failed (${res.status} ${res.statusText})`, url, res.status);
  }

  return decodeBody(res);
}

export async function fetchDynamic(url: string, options: FetcherOptions, hints: RenderHints = {}): Promise<string> {
  let browser: Browser | null = null;

  try {
    browser = await chromium.launch({ headless: true });
    const context = await browser.newContext({ userAgent: options.userAgent, locale: "es-ES" });
    const page = await context.newPage();
    page.setDefaultTimeout(options.timeoutMs);

    log.debug({ url }, "Rendering page");
    await page.goto(url, { waitUntil: "networkidle" });

    for (const selector of hints.clickSelectors ?? []) {
      const target = page.locator(selector).first();
      if ((await target.count()) === 0) continue;
      await target.click();
      await page.waitForTimeout(1000);
      break;
    }

    if (hints.waitForSelector) {
      await page.waitForSelector(hints.waitForSelector);
    }

    // Lazy lists fill in after a scroll.
    await page.mouse.wheel(0, 20_000);
    await page.waitForTimeout(hints.settleMs ?? DEFAULT_SETTLE_MS);

    return await page.content();
  } catch (error) {
    throw new FetchError(`Rendering ${url} failed: ${errorMessage(error)}`, url, undefined, { cause: error });
  } finally {
    if (browser) {
      await browser.close();
    }
  }
}

export function createPageFetcher(options: FetcherOptions): PageFetcher {
  const retries = options.retries ?? 0;

  return {
    async fetch(url, mode, hints) {
      let lastError: unknown = null;

      for (let attempt = 0; attempt <= retries; attempt++) {
        try {
          if (attempt > 0) {
            log.info({ url, attempt }, "Retrying fetch");
          }
          return mode === "dynamic" ? await fetchDynamic(url, options, hints) : await fetchStatic(url, options);
        } catch (error) {
          lastError = error;
          log.warn({ url, attempt: attempt + 1, err: errorMessage(error) }, "Fetch attempt failed");
        }
      }

      throw lastError instanceof FetchError
        ? lastError
        : new FetchError(`Fetching ${url} failed: ${errorMessage(lastError)}`, url, undefined, { cause: lastError });
    },
  };
}
