import type { DocumentFrequencyTable, Token } from "./types.js";

/**
 * - "skip": lines that do not split into exactly two `:` parts are ignored
 * - "strict": such lines raise MalformedLineError
 */
export type LineTolerance = "skip" | "strict";

export interface FrequencyLoadOptions {
  /** Only files whose name ends with this are read. Defaults to ".txt". */
  suffix?: string;
  /** File names to leave out even when they match `suffix`. */
  ignore?: readonly string[];
  lineTolerance?: LineTolerance;
}

/**
 * Reads per-document `token:count` files into a frequency table.
 *
 * Contract notes:
 * - stopwords and single-character tokens are dropped
 * - counts of a token repeated within one file are summed
 * - an unreadable or malformed file rejects the whole load
 */
export interface FrequencyTableLoader {
  load(directory: string, stopwords: ReadonlySet<Token>, options?: FrequencyLoadOptions): Promise<DocumentFrequencyTable>;
}
