import type { Logger } from "pino";

/** Calendar date as `YYYY-MM-DD`; compares correctly as a string. */
export type IsoDate = string;

export type FetchMode = "static" | "dynamic";

export interface SiteConfig {
  name: string;
  url: string;
  fetch_mode: FetchMode;
  extractor: string;
  active: boolean;
}

export interface Config {
  ledger_path: string;
  timeout_ms: number;
  fetch_retries: number;
  delay_ms: number;
  user_agent: string;
  retention_days: number;
  skip_expired: boolean;
  keywords_include: string[];
  keywords_exclude: string[];
  notification_email: string;
  sites: SiteConfig[];
}

export interface PostingDraft {
  title: string;
  link: string;
  deadline: IsoDate | null;
  start_date?: IsoDate | null;
  location?: string;
  reference?: string;
}

export interface Posting extends PostingDraft {
  site: string;
}

export interface SeenEntry {
  first_seen: string;
  /** Latest run that still listed the posting; absent in older ledgers. */
  last_seen?: string;
  site: string;
  title: string;
  deadline: IsoDate | null;
}

export interface SeenPostings {
  version: 1;
  last_run: string;
  postings: Record<string, SeenEntry>;
}

/** Browser steps a dynamic site needs before its listing is in the DOM. */
export interface RenderHints {
  clickSelectors?: string[];
  waitForSelector?: string;
  settleMs?: number;
}

export interface ExtractContext {
  site: SiteConfig;
  pageUrl: string;
  today: IsoDate;
  log: Logger;
  /** Static fetch for detail or follow-up listing pages. */
  fetchPage(url: string): Promise<string>;
}

export interface SiteExtractor {
  id: string;
  render?: RenderHints;
  extract(html: string, ctx: ExtractContext): Promise<PostingDraft[]>;
}

export type SiteStatus = "ok" | "failed" | "skipped";

export interface SiteResult {
  site: string;
  status: SiteStatus;
  extracted: number;
  new_postings: Posting[];
  error?: string;
}

export interface RunSummary {
  started_at: string;
  finished_at: string;
  sites: SiteResult[];
  new_postings: Posting[];
  pruned: number;
}
