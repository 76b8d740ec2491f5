import { load, type Cheerio, type CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import { dateRange } from "../dates.js";
import { errorMessage, ExtractError } from "../errors.js";
import { fold } from "../posting.js";
import type { ExtractContext, PostingDraft } from "../types.js";

export type { Cheerio, CheerioAPI, Element };

export function loadHtml(html: string): CheerioAPI {
  return load(html);
}

export function cleanText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function textOf($el: Cheerio<Element>): string {
  return cleanText($el.text());
}

/** Cut long free-text titles the way the listing pages truncate them. */
export function truncate(text: string, max = 100): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

/** Resolve `href` against `base`; empty string when there is no usable link. */
export function absoluteUrl(href: string | undefined, base: string): string {
  const trimmed = href?.trim();
  if (!trimmed || trimmed.startsWith("#") || trimmed.toLowerCase().startsWith("javascript:")) return "";
  try {
    return new URL(trimmed, base).toString();
  } catch {
    return "";
  }
}

export function firstLink($el: Cheerio<Element>, base: string): string {
  return absoluteUrl($el.find("a[href]").first().attr("href"), base);
}

export function isClosedStatus(text: string): boolean {
  return /cerrad[ao]|finalizad[ao]/.test(fold(text));
}

export function isOpenStatus(text: string): boolean {
  return /abiert[ao]|publicad[ao]|vigente/.test(fold(text));
}

/** Titles of navigation, cookie banners and table headers rather than offers. */
export function isBoilerplateTitle(title: string, extra: string[] = []): boolean {
  const folded = fold(title);
  return ["titulo", "title", "cabecera", "header", "menu", "navegacion", "cookie", ...extra].some((word) =>
    folded.includes(word)
  );
}

/** First non-empty text among `selectors` inside `$el`. */
export function headingText($el: Cheerio<Element>, selectors: string[], minLength = 1): string {
  for (const selector of selectors) {
    const text = textOf($el.find(selector).first());
    if (text.length >= minLength) return text;
  }
  return "";
}

export function dedupePostings(postings: PostingDraft[]): PostingDraft[] {
  const seen = new Set<string>();
  return postings.filter((posting) => {
    const key = `${fold(posting.title.trim())}|${posting.link}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * Parse each row independently; a row that throws is logged and skipped so
 * one odd listing entry cannot sink the page.
 */
export async function collectRows<T>(
  rows: T[],
  ctx: ExtractContext,
  parse: (row: T, index: number) => PostingDraft | null | Promise<PostingDraft | null>
): Promise<PostingDraft[]> {
  const postings: PostingDraft[] = [];
  for (const [index, row] of rows.entries()) {
    try {
      const posting = await parse(row, index);
      if (posting) postings.push(posting);
    } catch (error) {
      const err = new ExtractError(`Row ${index} of ${ctx.site.name}: ${errorMessage(error)}`, { cause: error });
      ctx.log.debug({ err: err.message }, "Skipping unparseable row");
    }
  }
  return postings;
}

/**
 * Fetch a follow-up listing page. A failure is logged as an ExtractError and
 * yields `null` so the caller keeps what it already has.
 */
export async function fetchFollowUp(url: string, ctx: ExtractContext): Promise<string | null> {
  try {
    return await ctx.fetchPage(url);
  } catch (error) {
    const err = new ExtractError(`Follow-up page ${url} of ${ctx.site.name}: ${errorMessage(error)}`, { cause: error });
    ctx.log.debug({ err: err.message }, "Skipping follow-up page");
    return null;
  }
}

/**
 * Read an offer's own page: first heading as title, every date on the page
 * as the start/deadline range. A page that says "abierta" anywhere counts as
 * open even if it also mentions a closed call.
 */
export async function readDetailPage(url: string, ctx: ExtractContext, location?: string): Promise<PostingDraft | null> {
  const $ = loadHtml(await ctx.fetchPage(url));
  const text = cleanText($("body").text());

  let title = "";
  for (const selector of ["h1", ".entry-title", ".title", "h2"]) {
    title = textOf($<Element, string>(selector).first());
    if (title) break;
  }
  title ||= truncate(text, 120);

  if (!isOpenStatus(text) && isClosedStatus(text)) return null;
  if (title.length < 5) return null;

  const { start, end } = dateRange(text);
  return { title, link: url, deadline: end, start_date: start, location };
}
