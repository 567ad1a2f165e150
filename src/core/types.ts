/** Shared core types used by module contracts. */

/** Source file name of a document. */
export type DocId = string;

/** A normalized token: lowercase, longer than one character, not a stopword. */
export type Token = string;

/** token -> occurrences within one document */
export type TokenCounts = Map<Token, number>;

/** One entry per loaded document; never mutated after load. */
export type DocumentFrequencyTable = Map<DocId, TokenCounts>;

/** token -> number of documents containing it at least once */
export type CorpusDocumentFrequency = Map<Token, number>;

/** token -> normalized tf-idf weight for one document */
export type ScoredDocument = Map<Token, number>;

export interface WeightedToken {
  token: Token;
  weight: number;
}
