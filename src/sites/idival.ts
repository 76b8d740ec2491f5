import { dateRange } from "../dates.js";
import { fold } from "../posting.js";
import type { ExtractContext, PostingDraft, SiteExtractor } from "../types.js";
import {
  absoluteUrl,
  cleanText,
  collectRows,
  dedupePostings,
  fetchFollowUp,
  headingText,
  isClosedStatus,
  loadHtml,
  textOf,
  truncate,
  type CheerioAPI,
} from "./shared.js";

/** The employment page links out to a Fundanet "open calls" listing. */
function openCallsLink($: CheerioAPI, base: string): string {
  for (const el of $("a[href]").toArray()) {
    const $a = $(el);
    const text = fold(textOf($a));
    const href = fold($a.attr("href") ?? "");
    if (text.includes("abierta") || ["abierta", "estado=a", "convocatorias"].some((key) => href.includes(key))) {
      return absoluteUrl($a.attr("href"), base);
    }
  }
  return "";
}

async function fundanetRows($: CheerioAPI, pageUrl: string, ctx: ExtractContext): Promise<PostingDraft[]> {
  const rows = $("table")
    .toArray()
    .flatMap((table) => $(table).find("tr").slice(1).toArray());

  return collectRows(rows, ctx, (row) => {
    const cells = $(row).find("td");
    if (cells.length < 3) return null;

    const rowText = cells
      .toArray()
      .map((cell) => textOf($(cell)))
      .join(" ");
    const status = fold(rowText);
    if (!status.includes("abierta") && !status.includes("publicada")) return null;

    const title = textOf(cells.eq(0));
    if (title.length < 3) return null;

    const anchor = cells.last().find("a[href]").first().attr("href") ?? cells.eq(0).find("a[href]").first().attr("href");
    const { start, end } = dateRange(rowText);
    return { title, link: absoluteUrl(anchor, pageUrl), deadline: end, start_date: start, location: "Cantabria" };
  });
}

async function listingItems($: CheerioAPI, ctx: ExtractContext): Promise<PostingDraft[]> {
  const items = $("article, .job, .convocatoria, .oferta, .list-group-item").toArray();
  return collectRows(items, ctx, (item) => {
    const $item = $(item);
    const text = cleanText($item.text());
    if (isClosedStatus(text)) return null;

    const title = headingText($item, ["h1", "h2", "h3", "h4", ".title", ".entry-title", "a"]) || truncate(text, 120);
    if (title.length < 5) return null;

    const { start, end } = dateRange(text);
    return {
      title,
      link: absoluteUrl($item.find("a[href]").first().attr("href"), ctx.pageUrl),
      deadline: end,
      start_date: start,
      location: "Cantabria",
    };
  });
}

export const idival: SiteExtractor = {
  id: "idival",

  async extract(html, ctx) {
    const $ = loadHtml(html);

    const callsUrl = openCallsLink($, ctx.pageUrl);
    if (callsUrl) {
      ctx.log.debug({ url: callsUrl }, "Following open calls listing");
      const calls = await fetchFollowUp(callsUrl, ctx);
      const postings = calls === null ? [] : await fundanetRows(loadHtml(calls), callsUrl, ctx);
      if (postings.length > 0) return dedupePostings(postings);
    }

    return dedupePostings(await listingItems($, ctx));
  },
};
