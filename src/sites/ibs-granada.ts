import { dateRange } from "../dates.js";
import type { SiteExtractor } from "../types.js";
import { collectRows, dedupePostings, firstLink, loadHtml, textOf } from "./shared.js";

export const ibsGranada: SiteExtractor = {
  id: "ibs-granada",

  async extract(html, ctx) {
    const $ = loadHtml(html);

    const postings = await collectRows($("article.job_list_item").toArray(), ctx, (item) => {
      const $item = $(item);
      // Only `<span class="status open">` marks an offer still accepting applications.
      if (!$item.find("span.status").first().hasClass("open")) return null;

      const heading = $item.find("h3").first();
      const title = textOf(heading);
      if (title.length < 3) return null;

      // "15 ene. 2025 - 30 ene. 2025"
      const { start, end } = dateRange(textOf($item.find("p.range").first()));
      return {
        title,
        link: firstLink(heading, ctx.pageUrl),
        deadline: end,
        start_date: start,
        location: "Granada",
      };
    });

    return dedupePostings(postings);
  },
};
