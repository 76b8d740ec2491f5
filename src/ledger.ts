import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { addDays } from "./dates.js";
import { LedgerIOError, errorMessage } from "./errors.js";
import type { IsoDate, SeenEntry, SeenPostings } from "./types.js";

function emptyLedger(): SeenPostings {
  return { version: 1, last_run: "", postings: {} };
}

const entrySchema = z.object({
  first_seen: z.string(),
  last_seen: z.string().optional(),
  site: z.string(),
  title: z.string(),
  deadline: z.string().nullable(),
});

const ledgerSchema = z.object({
  last_run: z.string().catch(""),
  postings: z.record(entrySchema),
});

function parseLedger(raw: unknown, filePath: string): SeenPostings {
  const result = ledgerSchema.safeParse(raw);
  if (!result.success) {
    const [issue] = result.error.issues;
    const [field, id] = issue?.path ?? [];
    const detail =
      field === "postings" && id !== undefined ? `a malformed entry for "${String(id)}"` : 'no valid "postings" map';
    throw new LedgerIOError(`Ledger ${filePath} has ${detail}`, filePath);
  }
  return { version: 1, last_run: result.data.last_run, postings: result.data.postings };
}

/**
 * Posting ids already reported, owned by one run: load once, mutate in
 * memory, persist once.
 */
export class SeenLedger {
  private data: SeenPostings = emptyLedger();

  constructor(readonly filePath: string) {}

  /** A missing file is an empty ledger; an unreadable or corrupt one is fatal. */
  load(): void {
    if (!fs.existsSync(this.filePath)) {
      this.data = emptyLedger();
      return;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, "utf-8"));
    } catch (error) {
      throw new LedgerIOError(`Failed to read ledger ${this.filePath}: ${errorMessage(error)}`, this.filePath, {
        cause: error,
      });
    }
    this.data = parseLedger(raw, this.filePath);
  }

  contains(id: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.data.postings, id);
  }

  /** No-op when `id` is already present; the first-seen entry is kept. */
  add(id: string, entry: SeenEntry): void {
    if (this.contains(id)) return;
    this.data.postings[id] = entry;
  }

  /** A repeat sighting: refresh `last_seen` and keep the later of the two deadlines. */
  markSeen(id: string, deadline: IsoDate | null, seenAt: string): void {
    const entry = this.get(id);
    if (!entry) return;
    entry.last_seen = seenAt;
    if (deadline !== null && (entry.deadline === null || deadline > entry.deadline)) {
      entry.deadline = deadline;
    }
  }

  get(id: string): SeenEntry | undefined {
    return this.contains(id) ? this.data.postings[id] : undefined;
  }

  get size(): number {
    return Object.keys(this.data.postings).length;
  }

  get lastRun(): string {
    return this.data.last_run;
  }

  /**
   * Drop entries whose deadline passed more than `retentionDays` ago and
   * that no run has listed within that window either. Undated entries are
   * never pruned. Returns the number removed.
   */
  prune(today: IsoDate, retentionDays: number): number {
    if (retentionDays <= 0) return 0;
    const cutoff = addDays(today, -retentionDays);

    let removed = 0;
    for (const [id, entry] of Object.entries(this.data.postings)) {
      const lastSeen = (entry.last_seen ?? entry.first_seen).slice(0, 10);
      if (entry.deadline !== null && entry.deadline < cutoff && lastSeen < cutoff) {
        delete this.data.postings[id];
        removed++;
      }
    }
    return removed;
  }

  /** Write the whole ledger through a temp file and rename. */
  persist(runAt: string): void {
    this.data.last_run = runAt;
    const tmpPath = `${this.filePath}.tmp`;
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(tmpPath, JSON.stringify(this.data, null, 2));
      fs.renameSync(tmpPath, this.filePath);
    } catch (error) {
      throw new LedgerIOError(`Failed to write ledger ${this.filePath}: ${errorMessage(error)}`, this.filePath, {
        cause: error,
      });
    }
  }
}
