import type { Token } from "./types.js";

/**
 * Loads a flat word list used to filter tokens.
 *
 * No case folding is applied: entries must follow the corpus' case convention.
 */
export interface StopwordLoader {
  load(path: string): Promise<ReadonlySet<Token>>;
}
