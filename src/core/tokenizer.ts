import type { Token } from "./types.js";

/**
 * Turns a raw document into a stream of normalized tokens.
 *
 * Contract notes:
 * - should be deterministic for a given input
 * - tokens are lowercase; no stopword or length filtering happens here
 */
export interface Tokenizer {
  tokenize(text: string): Iterable<Token>;
}
