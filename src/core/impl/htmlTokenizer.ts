import * as cheerio from "cheerio";

import type { Token, TokenCounts } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";

const QUOTE_VARIANTS_RE = /[’‘‛ʼʻ]/g;
// apostrophe closing a word: "students' " -> "students "
const TRAILING_APOSTROPHE_RE = /(?<=[\p{L}\p{N}_])'(?=\s|$)/gu;
const POSSESSIVE_RE = /(?<=[\p{L}\p{N}_])'s(?![\p{L}\p{N}_])/gu;
const NUMBER_COMMA_RE = /(?<=\p{Nd}),(?=\p{Nd})/gu;
const NON_WORD_RE = /[^\p{L}\p{N}_\s]/gu;

/**
 * Extracts the visible text of an HTML document: markup removed, entities
 * decoded, tags acting as word separators.
 */
export function htmlToText(html: string): string {
  const spaced = html.replace(/</g, " <").replace(/>/g, "> ");
  return cheerio.load(spaced).root().text();
}

/**
 * Normalizes extracted text into lowercase word tokens:
 * - curly quotes and modifier apostrophes become '
 * - word-final apostrophes and possessive 's are dropped
 * - thousands separators inside numbers are dropped
 * - any other punctuation separates words
 */
export function normalizeText(text: string): string {
  return text
    .replace(QUOTE_VARIANTS_RE, "'")
    .replace(TRAILING_APOSTROPHE_RE, "")
    .replace(POSSESSIVE_RE, "")
    .replace(NUMBER_COMMA_RE, "")
    .replace(NON_WORD_RE, " ")
    .toLowerCase();
}

export class HtmlTokenizer implements Tokenizer {
  *tokenize(html: string): Iterable<Token> {
    for (const term of normalizeText(htmlToText(html)).split(/\s+/)) {
      if (term.length) yield term;
    }
  }
}

export function countTokens(tokens: Iterable<Token>, into: TokenCounts = new Map()): TokenCounts {
  for (const t of tokens) into.set(t, (into.get(t) ?? 0) + 1);
  return into;
}
