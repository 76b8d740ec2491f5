import { fold } from "../posting.js";
import type { PostingDraft, SiteExtractor } from "../types.js";
import { absoluteUrl, collectRows, loadHtml, textOf, truncate, type CheerioAPI, type Element } from "./shared.js";

/**
 * A block is open when its `p.status--0` "Abierta" markers outnumber its
 * `p.status--1` "Cerrada" ones.
 */
function isOpenBlock($: CheerioAPI, block: Element): boolean {
  let open = 0;
  let closed = 0;
  for (const el of $(block).find("p.status").toArray()) {
    const $p = $(el);
    const text = fold(textOf($p));
    if ($p.hasClass("status--0") && text.includes("abierta")) open++;
    else if ($p.hasClass("status--1") && text.includes("cerrada")) closed++;
  }
  return open > closed;
}

export const iisgm: SiteExtractor = {
  id: "iisgm",

  async extract(html, ctx) {
    const $ = loadHtml(html);
    const hasOffer = (el: Element) => $(el).find("p.status").length > 0 && $(el).find("a[href]").length > 0;
    // Innermost divs holding both a status marker and a link; outer wrappers would merge offers.
    const blocks = $("div")
      .toArray()
      .filter((el) => hasOffer(el) && !$(el).find("div").toArray().some(hasOffer));

    const open = blocks.filter((block) => isOpenBlock($, block));
    const anchors = open.flatMap((block) => $(block).find("a[href]").toArray());

    const postings = await collectRows(anchors, ctx, (anchor): PostingDraft | null => {
      const link = absoluteUrl($(anchor).attr("href"), ctx.pageUrl);
      const title = truncate(textOf($(anchor)));
      if (title.length < 5 || !link.includes("/ofertas-de-empleo/")) return null;
      return { title, link, deadline: null, location: "Madrid" };
    });

    // Links are unique per offer.
    const seen = new Set<string>();
    return postings.filter((posting) => {
      if (seen.has(posting.link)) return false;
      seen.add(posting.link);
      return true;
    });
  },
};
