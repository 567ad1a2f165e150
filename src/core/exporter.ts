import type { ScoredDocument, Token, TokenCounts, WeightedToken } from "./types.js";

/**
 * Orders a document's weights and writes them as `<token>: <weight>` lines.
 *
 * Ordering is weight descending, then token ascending.
 */
export interface RankedExporter {
  rank(scored: ScoredDocument): WeightedToken[];
  serialize(ranked: WeightedToken[]): string;
  /** Writes `<baseName>_Sort_by_Term_Weight.<ext>` and returns its path. */
  write(directory: string, baseName: string, scored: ScoredDocument): Promise<string>;
}

/** Writes token counts as `<token>: <count>` lines, most frequent first. */
export interface FrequencyExporter {
  sort(counts: TokenCounts): Array<[Token, number]>;
  serialize(sorted: Array<[Token, number]>): string;
  write(directory: string, baseName: string, counts: TokenCounts): Promise<string>;
  writeCombined(directory: string, counts: TokenCounts): Promise<string>;
}
