import type { EstimatingDictionary } from "./schema";

const OPEN_BRACKETS = /[\[{【〔〈《「『]/g;
const CLOSE_BRACKETS = /[\]}】〕〉》」』]/g;
const STRIPPED_PUNCTUATION = /[・\/\-‐‑–]/g;
const LATIN_TERM = /^[a-z0-9 .]+$/;
const SIZE_TOKEN = /(\d+)\s*(mm|cm|a|m)(?![a-z0-9])/i;

/**
 * Canonical comparison form: NFKC width/kana folding, brackets unified to
 * parentheses, `・` `/` `-` removed, lowercase, single spaces.
 * normalizeText(normalizeText(x)) === normalizeText(x).
 */
export function normalizeText(text: string | null | undefined): string {
  if (!text) return "";
  return text
    .normalize("NFKC")
    .toLowerCase()
    .replace(OPEN_BRACKETS, "(")
    .replace(CLOSE_BRACKETS, ")")
    .replace(STRIPPED_PUNCTUATION, "")
    .normalize("NFKC")
    .replace(/\s+/g, " ")
    .trim();
}

const boundaryPatterns = new Map<string, RegExp>();

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Containment on normalized strings. Latin-script needles must match whole
 * words ("gas" does not match "gasket"); anything else is a plain substring.
 */
export function containsTerm(haystack: string, needle: string): boolean {
  if (!needle || !haystack) return false;
  if (!LATIN_TERM.test(needle)) return haystack.includes(needle);

  let pattern = boundaryPatterns.get(needle);
  if (!pattern) {
    pattern = new RegExp(`(^|[^a-z0-9])${escapeRegExp(needle)}($|[^a-z0-9])`);
    boundaryPatterns.set(needle, pattern);
  }
  return pattern.test(haystack);
}

export function eitherContains(a: string, b: string): boolean {
  return containsTerm(a, b) || containsTerm(b, a);
}

export function tokenize(normalized: string): string[] {
  return normalized.split(" ").filter((t) => t.length > 1);
}

/**
 * First size token such as `15A` or `20MM`; empty string when absent.
 */
export function extractSize(text: string | null | undefined): string {
  if (!text) return "";
  const match = SIZE_TOKEN.exec(text.normalize("NFKC"));
  if (!match) return "";
  return `${match[1]}${match[2].toUpperCase()}`;
}

/**
 * First keyword of the ordered category list found in the text.
 */
export function extractCategory(text: string | null | undefined, dictionary: EstimatingDictionary): string {
  const normalized = normalizeText(text);
  if (!normalized) return "";
  for (const category of dictionary.categories) {
    if (containsTerm(normalized, normalizeText(category))) return category;
  }
  return "";
}
