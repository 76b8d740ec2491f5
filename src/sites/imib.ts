import { dateRange, latestDate } from "../dates.js";
import { fold } from "../posting.js";
import type { ExtractContext, PostingDraft, SiteExtractor } from "../types.js";
import { cleanText, collectRows, dedupePostings, firstLink, loadHtml, textOf, type CheerioAPI } from "./shared.js";

const REFERENCE = /\(IMIB\d+_C\d+\)/g;

async function tableRows($: CheerioAPI, ctx: ExtractContext): Promise<PostingDraft[]> {
  return collectRows($("table tbody tr").toArray(), ctx, (row) => {
    const cells = $(row).find("td");
    if (cells.length < 2) return null;

    const title = textOf(cells.eq(0));
    const status = cells.length >= 3 ? fold(textOf(cells.eq(2))) : "";
    if (status.includes("cerrad") || title.length < 3) return null;

    return {
      title,
      link: firstLink(cells.eq(0), ctx.pageUrl),
      deadline: latestDate(textOf(cells.eq(1))),
    };
  });
}

/**
 * When the data table is missing, calls still show up in the body text as
 * "Resolución ... (IMIB24_C07) ... Abierto ... dates". Each reference anchors
 * a window of text that holds the title, status and dates.
 */
export function referenceBlocks(bodyText: string): PostingDraft[] {
  const text = cleanText(bodyText);
  const postings: PostingDraft[] = [];

  for (const match of text.matchAll(REFERENCE)) {
    const index = match.index ?? 0;
    const from = Math.max(0, index - 300);
    const snippet = text.slice(from, Math.min(text.length, index + match[0].length + 600));
    const folded = fold(snippet);
    if (!folded.includes("abierto") && !folded.includes("abierta")) continue;

    const reference = match[0].slice(1, -1);
    const refStart = index - from;
    const resolution = folded.lastIndexOf("resoluci", refStart);
    // A heading that runs across an earlier reference belongs to another call.
    const heading = resolution >= 0 ? snippet.slice(resolution, refStart) : "";
    let title = `${heading.trim()} ${match[0]}`.trim();
    if (heading.trim().length < 15 || /\(IMIB\d+_C\d+\)/.test(heading)) {
      // These postings have no link; the reference keeps their id stable.
      title = `Convocatoria ${reference}`;
    }

    const { start, end } = dateRange(snippet);
    postings.push({
      title,
      link: "",
      deadline: end,
      start_date: start,
      reference,
      location: "Murcia",
    });
  }
  return postings;
}

export const imib: SiteExtractor = {
  id: "imib",
  render: { waitForSelector: "body", settleMs: 3500 },

  async extract(html, ctx) {
    const $ = loadHtml(html);
    let postings = await tableRows($, ctx);
    if (postings.length === 0) {
      postings = referenceBlocks($("body").text());
    }
    return dedupePostings(postings);
  },
};
