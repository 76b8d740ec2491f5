import { tryParseSpanishDate } from "../dates.js";
import { fold } from "../posting.js";
import type { PostingDraft, SiteExtractor } from "../types.js";
import { collectRows, firstLink, loadHtml, textOf } from "./shared.js";

const OPEN_STATES = new Set(["abierta", "abierto", "open"]);

// Grant and fellowship calls share the table with job offers.
const NOT_JOBS = [
  "ayudas para la intensificacion",
  "intensificacion de la actividad investigadora",
  "intensificacion investigadora",
  "convocatoria de ayudas",
  "profesionales sanitarios",
  "becas",
  "subvenciones",
];

export const puertaHierro: SiteExtractor = {
  id: "puerta-hierro",

  async extract(html, ctx) {
    const $ = loadHtml(html);
    const rows = $("table")
      .toArray()
      .flatMap((table) => $(table).find("tr").slice(1).toArray());

    const postings = await collectRows(rows, ctx, (row): PostingDraft | null => {
      const cells = $(row).find("td, th");
      const text = (i: number) => textOf(cells.eq(i));

      let posting: PostingDraft;
      let status: string;
      if (cells.length >= 7) {
        // Ref | Título | Convocatoria | F. inicio | F. fin | Estado | ...
        posting = {
          reference: text(0),
          title: text(1),
          link: firstLink(cells.eq(2), ctx.pageUrl),
          start_date: tryParseSpanishDate(text(3)),
          deadline: tryParseSpanishDate(text(4)),
          location: "Madrid",
        };
        status = text(5);
      } else if (cells.length >= 5) {
        // Ref | Título | F. inicio | F. fin | Estado
        posting = {
          reference: text(0),
          title: text(1),
          link: "",
          start_date: tryParseSpanishDate(text(2)),
          deadline: tryParseSpanishDate(text(3)),
          location: "Madrid",
        };
        status = text(4);
      } else {
        return null;
      }

      if (!OPEN_STATES.has(fold(status))) return null;
      if (posting.title.length < 5) return null;
      const title = fold(posting.title);
      if (NOT_JOBS.some((phrase) => title.includes(phrase))) return null;
      return posting;
    });

    // Rows rarely carry links, so duplicates are keyed on title + reference.
    const seen = new Set<string>();
    return postings.filter((posting) => {
      const key = `${fold(posting.title)}|${posting.reference ?? ""}`;
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });
  },
};
