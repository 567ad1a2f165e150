import type { CorpusDocumentFrequency, DocumentFrequencyTable } from "../types.js";
import type { DocumentFrequencyAggregator } from "../documentFrequency.js";

export class CountingDocumentFrequencyAggregator implements DocumentFrequencyAggregator {
  aggregate(table: DocumentFrequencyTable): CorpusDocumentFrequency {
    const df: CorpusDocumentFrequency = new Map();
    for (const [, counts] of table) {
      // map keys are already distinct per document
      for (const token of counts.keys()) {
        df.set(token, (df.get(token) ?? 0) + 1);
      }
    }
    return df;
  }
}
