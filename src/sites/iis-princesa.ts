import { latestDate } from "../dates.js";
import { fold } from "../posting.js";
import type { SiteExtractor } from "../types.js";
import { absoluteUrl, cleanText, collectRows, dedupePostings, loadHtml, textOf, truncate, type Element } from "./shared.js";

/** Title from the PDF name when the surrounding text is too short: `oferta_tecnico-lab.pdf` → `oferta tecnico lab`. */
export function titleFromPdf(url: string): string {
  const filename = decodeURIComponent(new URL(url).pathname.split("/").pop() ?? "");
  return filename.replace(/\.pdf$/i, "").replace(/[_-]+/g, " ").trim();
}

export const iisPrincesa: SiteExtractor = {
  id: "iis-princesa",

  async extract(html, ctx) {
    const $ = loadHtml(html);

    // Offers are PDF links between the "Ofertas disponibles" heading and the next h3.
    const heading = $("h3")
      .filter((_, el) => fold(textOf($(el))).includes("disponibles"))
      .first();
    if (heading.length === 0) {
      ctx.log.debug("No available-offers heading on page");
      return [];
    }

    const anchors: Element[] = heading
      .nextUntil("h3")
      .find("a[href]")
      .addBack("a[href]")
      .toArray()
      .filter((el) => fold(textOf($(el))).includes("descargar"));

    const postings = await collectRows(anchors, ctx, (anchor) => {
      const $anchor = $(anchor);
      const link = absoluteUrl($anchor.attr("href"), ctx.pageUrl);
      if (!/\.pdf$/i.test(link)) return null;

      const context = cleanText($anchor.parent().text());
      const description = cleanText(context.replace(/Descargar oferta/gi, ""));
      const title = context.length > 20 && description ? truncate(description) : titleFromPdf(link);
      if (title.length < 5) return null;

      return { title, link, deadline: latestDate(context), location: "Madrid" };
    });

    return dedupePostings(postings);
  },
};
