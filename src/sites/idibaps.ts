import { dateRange } from "../dates.js";
import type { SiteExtractor } from "../types.js";
import { cleanText, collectRows, dedupePostings, firstLink, headingText, loadHtml, type Element } from "./shared.js";

export const idibaps: SiteExtractor = {
  id: "idibaps",
  // The listing opens on whichever tab was last published; switch to open offers.
  render: {
    clickSelectors: [
      "text=Abiertas",
      "text=Activas",
      "text=Open",
      "[data-tab*='abierta']",
      "[data-tab*='open']",
      "button:has-text('Abiertas')",
    ],
    settleMs: 2000,
  },

  async extract(html, ctx) {
    const $ = loadHtml(html);

    let cards: Element[] = $("li.research-offer-list_item.u-wrapper").toArray();
    if (cards.length === 0) {
      cards = $('li[class*="research-offer"]').toArray();
    }

    const postings = await collectRows(cards, ctx, (card) => {
      const $card = $(card);
      const text = cleanText($card.text());

      const title =
        headingText($card, ["h1", "h2", "h3", "h4", "h5", "h6", ".title", ".titulo", ".job-title", "a"], 11) ||
        (text.length > 10 ? text.slice(0, 200) : "");
      if (title.length < 5) return null;

      // Cards without a date range are section banners, not offers.
      const { start, end } = dateRange(text);
      if (!end) return null;

      return { title, link: firstLink($card, ctx.pageUrl), deadline: end, start_date: start, location: "Barcelona" };
    });

    return dedupePostings(postings);
  },
};
