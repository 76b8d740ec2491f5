import { isExpired, todayIso } from "./dates.js";
import { ConfigError, ExtractError, errorMessage } from "./errors.js";
import type { PageFetcher } from "./fetcher.js";
import { matchesFilters } from "./filter.js";
import type { SeenLedger } from "./ledger.js";
import { createLogger } from "./logger.js";
import { sendNotification } from "./notifier.js";
import { postingId } from "./posting.js";
import { printSiteReport } from "./report.js";
import { getExtractor } from "./sites/index.js";
import type { Config, IsoDate, Posting, RunSummary, SiteConfig, SiteExtractor, SiteResult } from "./types.js";

const log = createLogger({ component: "runner" });

export interface RunDeps {
  config: Config;
  fetcher: PageFetcher;
  /** Already loaded; the runner mutates it and persists once at the end. */
  ledger: SeenLedger;
  extractorFor?: (id: string) => SiteExtractor | undefined;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  notify?: (postings: Posting[], toEmail: string, today: IsoDate) => Promise<void>;
  report?: (result: SiteResult) => void;
}

export interface RunOptions {
  /** Process only the site with this name, even when it is inactive. */
  site?: string;
  /** Report without writing the ledger or sending e-mail. */
  dryRun?: boolean;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function selectSites(config: Config, siteName?: string): SiteConfig[] {
  if (!siteName) return config.sites;
  const site = config.sites.find((s) => s.name === siteName);
  if (!site) {
    throw new ConfigError(`Unknown site "${siteName}"`);
  }
  return [site];
}

/** Fetch one site and run its extractor; every candidate, no filtering. */
export async function extractSite(
  site: SiteConfig,
  deps: Pick<RunDeps, "fetcher" | "extractorFor">,
  today: IsoDate
): Promise<Posting[]> {
  const extractor = (deps.extractorFor ?? getExtractor)(site.extractor);
  if (!extractor) {
    throw new ExtractError(`No extractor "${site.extractor}" for site ${site.name}`);
  }

  const html = await deps.fetcher.fetch(site.url, site.fetch_mode, extractor.render);
  const drafts = await extractor.extract(html, {
    site,
    pageUrl: site.url,
    today,
    log: createLogger({ component: "extractor", site: site.name }),
    fetchPage: (url) => deps.fetcher.fetch(url, "static"),
  });

  return drafts.map((draft) => ({ ...draft, title: draft.title.trim(), site: site.name }));
}

async function processSite(site: SiteConfig, deps: RunDeps, today: IsoDate, seenAt: string): Promise<SiteResult> {
  const siteLog = log.child({ site: site.name });
  const { config, ledger } = deps;

  let candidates: Posting[];
  try {
    candidates = await extractSite(site, deps, today);
  } catch (error) {
    siteLog.error({ err: errorMessage(error) }, "Site failed");
    return { site: site.name, status: "failed", extracted: 0, new_postings: [], error: errorMessage(error) };
  }
  siteLog.info({ count: candidates.length }, "Extracted postings");

  const fresh: Posting[] = [];
  for (const posting of candidates) {
    if (config.skip_expired && isExpired(posting.deadline, today)) continue;
    if (!matchesFilters(posting, config)) continue;

    const id = postingId(posting, site.url);
    if (ledger.contains(id)) {
      // Still listed: a moved deadline must not let pruning drop it early.
      ledger.markSeen(id, posting.deadline, seenAt);
      continue;
    }

    // Added as accepted so a repeat later in this run is not reported twice.
    ledger.add(id, {
      first_seen: seenAt,
      last_seen: seenAt,
      site: site.name,
      title: posting.title,
      deadline: posting.deadline,
    });
    fresh.push(posting);
  }

  siteLog.info({ count: fresh.length }, "New postings");
  return { site: site.name, status: "ok", extracted: candidates.length, new_postings: fresh };
}

/**
 * One pass over the configured sites. Site failures are recorded in the
 * summary and never abort the run; ledger write failures do.
 */
export async function runOnce(deps: RunDeps, options: RunOptions = {}): Promise<RunSummary> {
  const now = deps.now ?? (() => new Date());
  const sleep = deps.sleep ?? defaultSleep;
  const report = deps.report ?? printSiteReport;
  const notify = deps.notify ?? sendNotification;
  const { config, ledger } = deps;

  const startedAt = now();
  const today = todayIso(startedAt);
  const sites = selectSites(config, options.site);

  log.info({ sites: sites.length, seen: ledger.size, dryRun: options.dryRun === true }, "Run started");

  const results: SiteResult[] = [];
  let processed = 0;
  for (const site of sites) {
    if (!site.active && !options.site) {
      results.push({ site: site.name, status: "skipped", extracted: 0, new_postings: [] });
      continue;
    }

    if (processed > 0 && config.delay_ms > 0) {
      await sleep(config.delay_ms);
    }
    processed++;

    const result = await processSite(site, deps, today, now().toISOString());
    report(result);
    results.push(result);
  }

  const newPostings = results.flatMap((r) => r.new_postings);
  const pruned = ledger.prune(today, config.retention_days);
  if (pruned > 0) {
    log.info({ pruned }, "Pruned expired ledger entries");
  }

  if (!options.dryRun) {
    await notifyNewPostings(newPostings, config, today, notify);
  }

  const finishedAt = now().toISOString();
  if (options.dryRun) {
    log.info("Dry run, ledger not written");
  } else {
    ledger.persist(finishedAt);
    log.info({ path: ledger.filePath, seen: ledger.size }, "Ledger saved");
  }

  const failed = results.filter((r) => r.status === "failed").length;
  log.info({ newPostings: newPostings.length, failed }, "Run finished");

  return {
    started_at: startedAt.toISOString(),
    finished_at: finishedAt,
    sites: results,
    new_postings: newPostings,
    pruned,
  };
}

async function notifyNewPostings(
  postings: Posting[],
  config: Config,
  today: IsoDate,
  notify: NonNullable<RunDeps["notify"]>
): Promise<void> {
  if (postings.length === 0) return;
  if (!config.notification_email) {
    log.debug("No notification email configured, skipping notification");
    return;
  }
  if (!process.env.RESEND_API_KEY) {
    log.warn("RESEND_API_KEY not set, skipping notification");
    return;
  }

  try {
    await notify(postings, config.notification_email, today);
  } catch (error) {
    log.error({ err: errorMessage(error) }, "Notification failed");
  }
}
