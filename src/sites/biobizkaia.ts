import { dateRange, tryParseSpanishDate } from "../dates.js";
import type { ExtractContext, PostingDraft, SiteExtractor } from "../types.js";
import {
  collectRows,
  dedupePostings,
  firstLink,
  headingText,
  isBoilerplateTitle,
  isClosedStatus,
  loadHtml,
  textOf,
  type CheerioAPI,
} from "./shared.js";

const NAV_WORDS = ["footer", "politica", "aviso legal"];

function acceptable(posting: PostingDraft, status = ""): PostingDraft | null {
  if (posting.title.length < 5 || isBoilerplateTitle(posting.title, NAV_WORDS)) return null;
  if (status && isClosedStatus(status)) return null;
  return posting;
}

/** Fundanet table: title | start | deadline | status. */
async function tableRows($: CheerioAPI, ctx: ExtractContext): Promise<PostingDraft[]> {
  const rows = $("table").first().find("tr").slice(1).toArray();
  return collectRows(rows, ctx, (row) => {
    const $row = $(row);
    const cells = $row.find("td, th");
    if (cells.length < 3) return null;

    return acceptable(
      {
        title: textOf(cells.eq(0)),
        link: firstLink($row, ctx.pageUrl),
        start_date: tryParseSpanishDate(textOf(cells.eq(1))),
        deadline: tryParseSpanishDate(textOf(cells.eq(2))),
        location: "Bizkaia",
      },
      textOf(cells.eq(3))
    );
  });
}

async function blockRows($: CheerioAPI, ctx: ExtractContext): Promise<PostingDraft[]> {
  const blocks = $('div[class*="oferta"], div[class*="convocatoria"], div[class*="item"], article').toArray();
  return collectRows(blocks, ctx, (block) => {
    const $block = $(block);
    const { start, end } = dateRange($block.text());
    return acceptable({
      title: headingText($block, ["h1", "h2", "h3", "h4", "a", ".title", ".titulo"]),
      link: firstLink($block, ctx.pageUrl),
      start_date: start,
      deadline: end,
      location: "Bizkaia",
    });
  });
}

export const biobizkaia: SiteExtractor = {
  id: "biobizkaia",

  async extract(html, ctx) {
    const $ = loadHtml(html);
    let postings = await tableRows($, ctx);
    if (postings.length === 0) {
      postings = await blockRows($, ctx);
    }
    return dedupePostings(postings);
  },
};
