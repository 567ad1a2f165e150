import type { CorpusDocumentFrequency, DocId, DocumentFrequencyTable, ScoredDocument, Token, TokenCounts } from "../types.js";
import type { TermWeighter, WeightOptions, ZeroNormPolicy } from "../weighter.js";
import { DegenerateNormError } from "../errors.js";

/** Dampened term frequency, in [0, ln 2]. */
export function termFrequency(count: number, totalTerms: number): number {
  if (totalTerms <= 0) return 0;
  return Math.log(1 + count / totalTerms);
}

/**
 * ln(N / df), except a token present in every document gets ln(1) + 1 = 1
 * so a single-document corpus keeps its term-frequency signal.
 */
export function inverseDocumentFrequency(df: number, totalDocuments: number): number {
  if (!Number.isInteger(df) || df < 1 || df > totalDocuments) {
    throw new RangeError(`document frequency ${df} outside [1, ${totalDocuments}]`);
  }
  const idf = Math.log(totalDocuments / df);
  return df === totalDocuments ? idf + 1 : idf;
}

/**
 * Log-dampened TF-IDF with per-document L2 normalization:
 * - tf = ln(1 + count / total terms of the document)
 * - idf as in `inverseDocumentFrequency`
 * - weight = tf * idf / ||tf * idf||
 */
export class LogTfIdfWeighter implements TermWeighter {
  compute(
    table: DocumentFrequencyTable,
    df: CorpusDocumentFrequency,
    totalDocuments: number,
    options?: WeightOptions,
  ): Map<DocId, ScoredDocument> {
    const zeroNorm = options?.zeroNorm ?? "zero";
    const out = new Map<DocId, ScoredDocument>();

    for (const [docId, counts] of table) {
      out.set(docId, this.scoreDocument(docId, counts, df, totalDocuments, zeroNorm));
    }

    return out;
  }

  private scoreDocument(
    docId: DocId,
    counts: TokenCounts,
    df: CorpusDocumentFrequency,
    totalDocuments: number,
    zeroNorm: ZeroNormPolicy,
  ): ScoredDocument {
    const scored: ScoredDocument = new Map();
    if (counts.size === 0) return scored;

    let totalTerms = 0;
    for (const c of counts.values()) totalTerms += c;

    let sumOfSquares = 0;
    for (const [token, count] of counts) {
      const score = termFrequency(count, totalTerms) * inverseDocumentFrequency(this.lookup(df, token), totalDocuments);
      scored.set(token, score);
      sumOfSquares += score * score;
    }

    const norm = Math.sqrt(sumOfSquares);
    if (norm === 0) {
      if (zeroNorm === "throw") throw new DegenerateNormError(docId);
      for (const token of scored.keys()) scored.set(token, 0);
      return scored;
    }

    for (const [token, score] of scored) scored.set(token, score / norm);
    return scored;
  }

  private lookup(df: CorpusDocumentFrequency, token: Token): number {
    const n = df.get(token);
    if (n === undefined) throw new RangeError(`no document frequency for token ${JSON.stringify(token)}`);
    return n;
  }
}
