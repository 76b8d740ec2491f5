import { latestDate } from "../dates.js";
import { fold } from "../posting.js";
import type { SiteExtractor } from "../types.js";
import {
  absoluteUrl,
  cleanText,
  collectRows,
  dedupePostings,
  headingText,
  isBoilerplateTitle,
  loadHtml,
  type Cheerio,
  type Element,
} from "./shared.js";

// Personio has shipped several job-list layouts; the first selector that
// yields job-like elements wins.
const SELECTORS = [
  "a.job-list-item",
  ".job-item",
  ".position-item",
  ".job-listing-item",
  ".job-card",
  ".position-card",
  'a[href*="/job/"]',
  'a[href*="/jobs/"]',
  'a[href*="/position/"]',
];

const POSITIVE = ["empleo", "oferta", "vacante", "investigador", "tecnico", "doctor", "postdoc", "contrato", "plaza", "puesto", "job", "position", "career"];
const NEGATIVE = ["navegacion", "menu", "buscar", "intranet", "contacto", "navigation", "search", "footer", "header"];

const CITIES = ["barcelona", "badalona", "madrid", "valencia", "sevilla", "bilbao", "granada"];

function isJobElement($el: Cheerio<Element>): boolean {
  const text = fold(cleanText($el.text()));
  const href = fold($el.attr("href") ?? "");
  if (text.length <= 5) return false;
  if (NEGATIVE.some((word) => text.includes(word))) return false;
  return POSITIVE.some((word) => text.includes(word) || href.includes(word));
}

export const igtp: SiteExtractor = {
  id: "igtp",

  async extract(html, ctx) {
    const $ = loadHtml(html);

    let elements: Element[] = [];
    for (const selector of SELECTORS) {
      elements = $<Element, string>(selector)
        .toArray()
        .filter((el) => isJobElement($(el)));
      if (elements.length > 0) break;
    }

    const postings = await collectRows(elements, ctx, (el) => {
      const $el = $(el);
      const text = cleanText($el.text());
      const title =
        headingText($el, ["h1", "h2", "h3", "h4", "h5", "h6", ".job-title", ".position-title", ".title"]) ||
        text.split(" ").slice(0, 10).join(" ");
      if (title.length < 5 || isBoilerplateTitle(title, ["navigation"])) return null;

      const href = $el.is("a") ? $el.attr("href") : $el.find("a[href]").first().attr("href");
      const folded = fold(text);
      const city = CITIES.find((name) => folded.includes(name));

      return {
        title,
        link: absoluteUrl(href, ctx.pageUrl),
        deadline: latestDate(text),
        location: city ? city.charAt(0).toUpperCase() + city.slice(1) : undefined,
      };
    });

    return dedupePostings(postings);
  },
};
