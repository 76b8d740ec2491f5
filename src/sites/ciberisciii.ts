import { tryParseSpanishDate } from "../dates.js";
import { fold } from "../posting.js";
import type { PostingDraft, SiteExtractor } from "../types.js";
import { cleanText, collectRows, dedupePostings, firstLink, loadHtml, type Element } from "./shared.js";

const SECTIONS = ["#divOfertasEmpleo", "#divOfertasEmpleoReposicion", "#divOfertasEmpleoEstabilizacion"];

const OPEN_STATES = new Set(["abierta", "publicada"]);

export const ciberisciii: SiteExtractor = {
  id: "ciberisciii",
  render: { settleMs: 5000 },

  async extract(html, ctx) {
    const $ = loadHtml(html);
    const rows: Element[] = [];
    for (const section of SECTIONS) {
      // First row of each table is the header.
      rows.push(...$(section).find("tr").slice(1).toArray());
    }

    const postings = await collectRows(rows, ctx, (row): PostingDraft | null => {
      const cells = $(row)
        .find("td")
        .toArray()
        .map((cell) => cleanText($(cell).text()));
      // Area | Convocatoria | Desde | Hasta | Estado | Provincia | Categoría | Titulación | [Centro] | Enlace
      if (cells.length < 9) return null;

      const [area = "", title = "", from = "", until = "", status = "", province = ""] = cells;
      if (status && !OPEN_STATES.has(fold(status))) return null;
      if (title.length < 2) return null;

      return {
        title,
        link: firstLink($(row), ctx.pageUrl),
        deadline: tryParseSpanishDate(until),
        start_date: tryParseSpanishDate(from),
        location: province || undefined,
        reference: area || undefined,
      };
    });

    return dedupePostings(postings);
  },
};
