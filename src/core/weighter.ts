import type { CorpusDocumentFrequency, DocId, DocumentFrequencyTable, ScoredDocument } from "./types.js";

/**
 * What to do when every raw score of a document is zero:
 * - "zero": every token gets weight 0
 * - "throw": raise DegenerateNormError
 */
export type ZeroNormPolicy = "zero" | "throw";

export interface WeightOptions {
  zeroNorm?: ZeroNormPolicy;
}

/**
 * Scores every document's tokens against corpus document frequencies.
 *
 * Output is a pure function of the inputs. Each ScoredDocument holds exactly
 * the tokens of its source document and has unit L2 norm unless degenerate.
 */
export interface TermWeighter {
  compute(
    table: DocumentFrequencyTable,
    df: CorpusDocumentFrequency,
    totalDocuments: number,
    options?: WeightOptions,
  ): Map<DocId, ScoredDocument>;
}
