import { latestDate, tryParseSpanishDate } from "../dates.js";
import type { ExtractContext, PostingDraft, SiteExtractor } from "../types.js";
import {
  cleanText,
  collectRows,
  dedupePostings,
  firstLink,
  headingText,
  isBoilerplateTitle,
  isClosedStatus,
  loadHtml,
  textOf,
  truncate,
  type CheerioAPI,
} from "./shared.js";

const HEADER_WORDS = ["f.inicio", "f.fin"];

/**
 * Fundanet "convocatorias propias" table: title (linked) | start | end.
 * The listing URL filters on `Estado=A`, so every row is open.
 */
async function tableRows($: CheerioAPI, ctx: ExtractContext): Promise<PostingDraft[]> {
  return collectRows($("table tr").toArray(), ctx, (row) => {
    const cells = $(row).find("td, th");
    if (cells.length < 2) return null;

    const first = cells.eq(0);
    const title = textOf(first);
    if (title.length < 5 || isBoilerplateTitle(title, HEADER_WORDS)) return null;

    return {
      title,
      link: firstLink(first, ctx.pageUrl),
      start_date: cells.length >= 3 ? tryParseSpanishDate(textOf(cells.eq(1))) : null,
      deadline: cells.length >= 3 ? tryParseSpanishDate(textOf(cells.eq(2))) : null,
    };
  });
}

/** Older layout without a table: one list item or block per call. */
async function blockRows($: CheerioAPI, ctx: ExtractContext): Promise<PostingDraft[]> {
  const blocks = $('li, div[class*="convocatoria"], div[class*="oferta"], div[class*="plaza"]').toArray();
  return collectRows(blocks, ctx, (block) => {
    const $block = $(block);
    const text = cleanText($block.text());
    const title = headingText($block, ["h1", "h2", "h3", "h4", "h5", "h6", ".title", ".titulo", "a"]) || truncate(text);
    if (title.length < 5 || isBoilerplateTitle(title) || isClosedStatus(text)) return null;

    return { title, link: firstLink($block, ctx.pageUrl), deadline: latestDate(text) };
  });
}

export const fimabis: SiteExtractor = {
  id: "fimabis",

  async extract(html, ctx) {
    const $ = loadHtml(html);
    let postings = await tableRows($, ctx);
    if (postings.length === 0) {
      postings = await blockRows($, ctx);
    }
    return dedupePostings(postings);
  },
};
