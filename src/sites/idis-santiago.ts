import { extractDates } from "../dates.js";
import type { SiteExtractor } from "../types.js";
import {
  cleanText,
  collectRows,
  dedupePostings,
  firstLink,
  headingText,
  loadHtml,
  type Cheerio,
  type Element,
} from "./shared.js";

const BLOCK_SELECTOR = ["oferta", "convocatoria", "empleo", "trabajo"]
  .flatMap((word) => ["div", "section", "article"].map((tag) => `${tag}[class*="${word}"]`))
  .join(", ");

// Reference numbers look like "23/2025"; the lookarounds keep "15/01/2025" from matching.
const REFERENCE = /(?<![\d/])(\d{1,4}\/\d{4})(?![\d/])/;

const ROLE_WORDS = ["TITULADO/A", "TÉCNICO/A", "INVESTIGADOR"];

function titleOf($block: Cheerio<Element>): string {
  const heading = headingText($block, ["h1", "h2", "h3", "h4", "h5", "h6", ".title", ".titulo"], 6);
  if (heading) return heading;

  const lines = $block
    .text()
    .split("\n")
    .map((line) => cleanText(line))
    .filter(Boolean);
  const role = lines.find((line) => ROLE_WORDS.some((word) => line.includes(word)));
  if (role) return role;
  return lines.find((line) => line.length > 10)?.slice(0, 200) ?? "";
}

export const idisSantiago: SiteExtractor = {
  id: "idis-santiago",

  async extract(html, ctx) {
    const $ = loadHtml(html);
    // Wrappers such as `div.ofertas-list` match too; keep only the innermost blocks.
    const blocks = $<Element, string>(BLOCK_SELECTOR)
      .toArray()
      .filter((el) => $(el).find(BLOCK_SELECTOR).length === 0);

    const postings = await collectRows(blocks, ctx, (block) => {
      const $block = $(block);
      const text = cleanText($block.text());

      if (!text.includes("Abierto") && text.includes("Cerrado")) return null;

      const title = titleOf($block);
      if (title.length < 5) return null;

      // Publication date first, application deadline second; a lone date is both.
      const [start = null, end = start] = extractDates(text);

      return {
        title,
        link: firstLink($block, ctx.pageUrl),
        deadline: end,
        start_date: start,
        reference: REFERENCE.exec(text)?.[1],
        location: "Santiago de Compostela",
      };
    });

    return dedupePostings(postings);
  },
};
