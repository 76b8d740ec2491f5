import { formatDate } from "./dates.js";
import type { Posting, SiteResult } from "./types.js";

export function formatPosting(posting: Posting): string {
  const deadline = posting.deadline ? formatDate(posting.deadline) : "-";
  return `${posting.site} - ${posting.title} | Deadline: ${deadline} | Link: ${posting.link || "-"}`;
}

export function siteReportLines(result: SiteResult): string[] {
  const heading = `== ${result.site} ==`;
  if (result.status === "failed") {
    return [heading, `Failed: ${result.error ?? "unknown error"}`];
  }
  if (result.new_postings.length === 0) {
    return [heading, "No new postings"];
  }
  return [heading, ...result.new_postings.map(formatPosting)];
}

/** Human report on stdout, kept apart from the structured logs. */
export function printSiteReport(result: SiteResult, write: (line: string) => void = console.log): void {
  for (const line of siteReportLines(result)) {
    write(line);
  }
}
