import { latestDate } from "../dates.js";
import { fold } from "../posting.js";
import type { ExtractContext, PostingDraft, SiteExtractor } from "../types.js";
import { absoluteUrl, cleanText, collectRows, dedupePostings, fetchFollowUp, loadHtml, textOf } from "./shared.js";

const MAX_PAGES = 3;
const TITLE_WORDS = ["contratacion", "tecnico", "investigador", "personal"];

/** Highest page number in the `.pagination` block, capped at MAX_PAGES. */
export function pageCount(html: string): number {
  const $ = loadHtml(html);
  let max = 1;
  for (const el of $(".pagination a[href]").toArray()) {
    const n = Number.parseInt(textOf($(el)), 10);
    if (Number.isFinite(n)) max = Math.max(max, n);
  }
  return Math.min(max, MAX_PAGES);
}

async function parsePage(html: string, ctx: ExtractContext): Promise<PostingDraft[]> {
  const $ = loadHtml(html);
  return collectRows($("div.empleo-item").toArray(), ctx, (item) => {
    const $item = $(item);
    const status = $item.find("span.status.status--open").first();
    if (!fold(textOf(status)).includes("abierta")) return null;

    const anchor = $item
      .find("a[href]")
      .toArray()
      .map((el) => $(el))
      .find(($a) => TITLE_WORDS.some((word) => fold(textOf($a)).includes(word)));
    if (!anchor) return null;

    const title = textOf(anchor);
    const link = absoluteUrl(anchor.attr("href"), ctx.pageUrl);
    if (title.length < 15 || !link.includes("/es/talento/empleo/")) return null;

    return { title, link, deadline: latestDate(cleanText($item.text())), location: "Valencia" };
  });
}

export const iisLaFe: SiteExtractor = {
  id: "iis-la-fe",

  async extract(html, ctx) {
    const postings = await parsePage(html, ctx);

    const pages = pageCount(html);
    for (let page = 2; page <= pages; page++) {
      const url = new URL(ctx.pageUrl);
      url.searchParams.set("page", String(page));
      const next = await fetchFollowUp(url.toString(), ctx);
      if (next !== null) {
        postings.push(...(await parsePage(next, ctx)));
      }
    }

    return dedupePostings(postings);
  },
};
