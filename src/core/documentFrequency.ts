import type { CorpusDocumentFrequency, DocumentFrequencyTable } from "./types.js";

/**
 * Counts, for the whole corpus, how many documents contain each token.
 * A token contributes at most 1 per document regardless of its count.
 */
export interface DocumentFrequencyAggregator {
  aggregate(table: DocumentFrequencyTable): CorpusDocumentFrequency;
}
