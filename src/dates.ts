import { ParseError } from "./errors.js";
import type { IsoDate } from "./types.js";

const MONTHS: Record<string, number> = {
  enero: 1,
  febrero: 2,
  marzo: 3,
  abril: 4,
  mayo: 5,
  junio: 6,
  julio: 7,
  agosto: 8,
  septiembre: 9,
  setiembre: 9,
  octubre: 10,
  noviembre: 11,
  diciembre: 12,
  ene: 1,
  feb: 2,
  mar: 3,
  abr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  ago: 8,
  sep: 9,
  sept: 9,
  oct: 10,
  nov: 11,
  dic: 12,
};

type Parts = [day: string, month: string, year: string];

interface DatePattern {
  regex: RegExp;
  parts(match: RegExpExecArray): Parts;
}

// Order matters: the first pattern that yields a valid date wins.
const PATTERNS: DatePattern[] = [
  { regex: /(\d{1,2})\/(\d{1,2})\/(\d{4})/g, parts: (m) => [m[1], m[2], m[3]] },
  { regex: /(\d{1,2})-(\d{1,2})-(\d{4})/g, parts: (m) => [m[1], m[2], m[3]] },
  { regex: /(\d{1,2})\s+de\s+([a-záéíóú]+)\.?\s+de\s+(\d{4})/gi, parts: (m) => [m[1], m[2], m[3]] },
  { regex: /(\d{1,2})\s+([a-záéíóú]+)\.?\s+(\d{4})/gi, parts: (m) => [m[1], m[2], m[3]] },
  { regex: /(\d{4})-(\d{1,2})-(\d{1,2})/g, parts: (m) => [m[3], m[2], m[1]] },
];

function monthNumber(raw: string): number | null {
  if (/^\d+$/.test(raw)) return Number(raw);
  return MONTHS[raw.toLowerCase()] ?? null;
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

function toIso([dayRaw, monthRaw, yearRaw]: Parts): IsoDate | null {
  const day = Number(dayRaw);
  const month = monthNumber(monthRaw);
  const year = Number(yearRaw);
  if (month === null || month < 1 || month > 12 || day < 1) return null;

  // Date.UTC rolls 31/02 over into March; reject anything that moved.
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (probe.getUTCFullYear() !== year || probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
    return null;
  }
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

interface DateMatch {
  start: number;
  end: number;
  date: IsoDate;
}

function* matchesOf(pattern: DatePattern, text: string): Generator<DateMatch> {
  const regex = new RegExp(pattern.regex.source, pattern.regex.flags);
  let match: RegExpExecArray | null;
  while ((match = regex.exec(text)) !== null) {
    const date = toIso(pattern.parts(match));
    if (date) yield { start: match.index, end: match.index + match[0].length, date };
  }
}

/**
 * Parse the first recognizable Spanish date in `text`.
 *
 * Accepts `15/01/2025`, `15-01-2025`, `15 de enero de 2025`, `15 ene. 2025`
 * and `2025-01-15`, anywhere inside a longer string.
 */
export function parseSpanishDate(text: string): IsoDate {
  const normalized = text.trim();
  for (const pattern of PATTERNS) {
    for (const { date } of matchesOf(pattern, normalized)) {
      return date;
    }
  }
  throw new ParseError(text);
}

export function tryParseSpanishDate(text: string | null | undefined): IsoDate | null {
  if (!text) return null;
  try {
    return parseSpanishDate(text);
  } catch (error) {
    if (error instanceof ParseError) return null;
    throw error;
  }
}

/** Every date in `text`, in the order it appears. */
export function extractDates(text: string): IsoDate[] {
  const found: DateMatch[] = [];

  for (const pattern of PATTERNS) {
    for (const match of matchesOf(pattern, text)) {
      // A span already claimed by an earlier pattern is not read twice.
      if (found.some((f) => match.start < f.end && match.end > f.start)) continue;
      found.push(match);
    }
  }

  return found.sort((a, b) => a.start - b.start).map((f) => f.date);
}

/** Earliest and latest date in `text`; the latest is treated as the deadline. */
export function dateRange(text: string): { start: IsoDate | null; end: IsoDate | null } {
  const dates = extractDates(text).sort();
  if (dates.length === 0) return { start: null, end: null };
  return { start: dates[0] ?? null, end: dates[dates.length - 1] ?? null };
}

export function latestDate(text: string): IsoDate | null {
  return dateRange(text).end;
}

export function isExpired(deadline: IsoDate | null, today: IsoDate): boolean {
  return deadline !== null && deadline < today;
}

export function formatDate(date: IsoDate): string {
  const [year, month, day] = date.split("-");
  return `${day}/${month}/${year}`;
}

export function daysUntil(date: IsoDate, today: IsoDate): number {
  const ms = Date.parse(`${date}T00:00:00Z`) - Date.parse(`${today}T00:00:00Z`);
  return Math.round(ms / 86_400_000);
}

/** Local calendar date of `now`. */
export function todayIso(now: Date = new Date()): IsoDate {
  return `${pad(now.getFullYear(), 4)}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
}

export function addDays(date: IsoDate, days: number): IsoDate {
  const d = new Date(Date.parse(`${date}T00:00:00Z`) + days * 86_400_000);
  return `${pad(d.getUTCFullYear(), 4)}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}`;
}
