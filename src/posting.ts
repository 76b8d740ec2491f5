import type { Posting } from "./types.js";

/** Lower-case and strip diacritics so "Técnico" matches "tecnico". */
export function fold(text: string): string {
  return text.normalize("NFD").replace(/[\u0300-\u036f]/g, "").toLowerCase();
}

export function slugify(text: string, maxLength = 100): string {
  return fold(text)
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .substring(0, maxLength);
}

/**
 * Stable ledger key for a posting: its link, unless the link is missing or
 * just points back at the listing page, in which case site + title slug.
 */
export function postingId(posting: Posting, listingUrl: string): string {
  const link = posting.link.trim();
  if (link && stripTrailingSlash(link) !== stripTrailingSlash(listingUrl)) {
    return link;
  }
  return `${posting.site}:${slugify(posting.title)}`;
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}
