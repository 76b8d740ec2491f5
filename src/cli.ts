import { mkdir, writeFile } from "fs/promises";
import { dirname } from "path";
import { loadConfig } from "./config.js";
import { todayIso } from "./dates.js";
import { errorMessage } from "./errors.js";
import { createPageFetcher, type PageFetcher } from "./fetcher.js";
import { SeenLedger } from "./ledger.js";
import { createLogger } from "./logger.js";
import { postingId } from "./posting.js";
import { formatPosting } from "./report.js";
import { extractSite, runOnce, selectSites, type RunDeps } from "./runner.js";
import type { Config } from "./types.js";

const log = createLogger({ component: "cli" });

export interface RunCommandOptions {
  config: string;
  site?: string;
  dryRun?: boolean;
  output?: string;
}

export interface CommandDeps {
  fetcherFor?: (config: Config) => PageFetcher;
  report?: RunDeps["report"];
  write?: (line: string) => void;
}

function defaultFetcher(config: Config): PageFetcher {
  return createPageFetcher({
    timeoutMs: config.timeout_ms,
    userAgent: config.user_agent,
    retries: config.fetch_retries,
  });
}

/**
 * Exit code for a command: 0 once it completes, even with failed sites;
 * 1 when it throws (bad config, unreadable ledger, ...).
 */
export async function guarded(action: () => Promise<void>): Promise<number> {
  try {
    await action();
    return 0;
  } catch (error) {
    log.fatal({ err: errorMessage(error), kind: error instanceof Error ? error.name : undefined }, "Fatal error");
    return 1;
  }
}

export function runCommand(options: RunCommandOptions, deps: CommandDeps = {}): Promise<number> {
  return guarded(async () => {
    const config = loadConfig(options.config);
    const ledger = new SeenLedger(config.ledger_path);
    ledger.load();
    log.info({ path: config.ledger_path, seen: ledger.size, lastRun: ledger.lastRun || null }, "Ledger loaded");

    const summary = await runOnce(
      { config, ledger, fetcher: (deps.fetcherFor ?? defaultFetcher)(config), report: deps.report },
      { site: options.site, dryRun: options.dryRun }
    );

    if (options.output) {
      await mkdir(dirname(options.output), { recursive: true });
      await writeFile(options.output, JSON.stringify(summary, null, 2));
      log.info({ path: options.output }, "Summary written");
    }
  });
}

export function sitesCommand(options: Pick<RunCommandOptions, "config">, deps: CommandDeps = {}): Promise<number> {
  const write = deps.write ?? console.log;
  return guarded(async () => {
    const config = loadConfig(options.config);
    for (const site of config.sites) {
      const state = site.active ? "active" : "inactive";
      write(`${site.name} [${site.fetch_mode}, ${state}] ${site.url}`);
    }
  });
}

export function inspectCommand(
  siteName: string,
  options: Pick<RunCommandOptions, "config">,
  deps: CommandDeps = {}
): Promise<number> {
  const write = deps.write ?? console.log;
  return guarded(async () => {
    const config = loadConfig(options.config);
    const [site] = selectSites(config, siteName);
    if (!site) return;

    const fetcher = (deps.fetcherFor ?? defaultFetcher)(config);
    const postings = await extractSite(site, { fetcher }, todayIso());
    write(`${postings.length} candidate posting${postings.length === 1 ? "" : "s"} on ${site.name}`);
    for (const posting of postings) {
      write(formatPosting(posting));
      write(`  id: ${postingId(posting, site.url)}`);
    }
  });
}
