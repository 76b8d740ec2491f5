import type { SiteExtractor } from "../types.js";
import { absoluteUrl, collectRows, dedupePostings, loadHtml, readDetailPage, textOf } from "./shared.js";

export const ibsal: SiteExtractor = {
  id: "ibsal",

  async extract(html, ctx) {
    const $ = loadHtml(html);

    const links: string[] = [];
    for (const el of $("a[href]").toArray()) {
      if (!textOf($(el))) continue;
      const url = absoluteUrl($(el).attr("href"), ctx.pageUrl);
      if (url.includes("/convocatorias/ref-") && !links.includes(url)) links.push(url);
    }

    return dedupePostings(await collectRows(links, ctx, (url) => readDetailPage(url, ctx, "Salamanca")));
  },
};
