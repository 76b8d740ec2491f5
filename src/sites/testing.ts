import { vi } from "vitest";
import { createLogger } from "../logger.js";
import type { ExtractContext, SiteConfig } from "../types.js";

/**
 * Extract context for adapter tests. `pages` serves follow-up fetches; an
 * unknown URL rejects like a failed request would.
 */
export function testContext(site: Partial<SiteConfig> & Pick<SiteConfig, "url">, pages: Record<string, string> = {}) {
  const fetchPage = vi.fn((url: string) =>
    url in pages ? Promise.resolve(pages[url] ?? "") : Promise.reject(new Error(`unexpected fetch ${url}`))
  );
  const ctx: ExtractContext = {
    site: { name: "Test site", fetch_mode: "static", extractor: "test", active: true, ...site },
    pageUrl: site.url,
    today: "2025-01-15",
    log: createLogger({ component: "extractor", site: "test" }),
    fetchPage,
  };
  return { ctx, fetchPage };
}
