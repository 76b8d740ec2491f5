import { fold } from "../posting.js";
import type { SiteExtractor } from "../types.js";
import { absoluteUrl, collectRows, dedupePostings, loadHtml, readDetailPage, textOf } from "./shared.js";

const MAX_DETAIL_PAGES = 40;

const OFFER_WORDS = ["convocatoria", "oferta", "empleo", "plaza"];
const NAV_WORDS = ["inicio", "contacto", "aviso", "politica", "cookies"];

/** Offer detail pages live under `/ofertas-de-empleo-ibis/<slug>`; the section index itself is not one. */
export function detailLinks(html: string, base: string): string[] {
  const $ = loadHtml(html);
  const links: string[] = [];

  for (const el of $("a[href]").toArray()) {
    const $a = $(el);
    const text = fold(textOf($a));
    if (!text || text === "ofertas de empleo") continue;
    if (!OFFER_WORDS.some((word) => text.includes(word))) continue;
    if (NAV_WORDS.some((word) => text.includes(word))) continue;

    const url = absoluteUrl($a.attr("href"), base);
    const path = url ? new URL(url).pathname.replace(/\/+$/, "") : "";
    if (!path.includes("/ofertas-de-empleo-ibis/")) continue;
    if (!links.includes(url)) links.push(url);
  }
  return links.slice(0, MAX_DETAIL_PAGES);
}

export const ibisSevilla: SiteExtractor = {
  id: "ibis-sevilla",

  async extract(html, ctx) {
    const links = detailLinks(html, ctx.pageUrl);
    ctx.log.debug({ count: links.length }, "Reading offer detail pages");
    return dedupePostings(await collectRows(links, ctx, (url) => readDetailPage(url, ctx, "Sevilla")));
  },
};
