import type { Logger } from "pino";

import type { DocId, Token } from "../types.js";
import type { StopwordLoader } from "../stopwords.js";
import type { FrequencyTableLoader, LineTolerance } from "../frequencyTable.js";
import type { DocumentFrequencyAggregator } from "../documentFrequency.js";
import type { TermWeighter, ZeroNormPolicy } from "../weighter.js";
import type { RankedExporter } from "../exporter.js";
import { exportBaseName } from "./fixedPointRankedExporter.js";

export interface WeightingDeps {
  stopwords: StopwordLoader;
  loader: FrequencyTableLoader;
  aggregator: DocumentFrequencyAggregator;
  weighter: TermWeighter;
  exporter: RankedExporter;
  logger: Logger;
}

export interface WeightingRunOptions {
  importDir: string;
  exportDir: string;
  stoplistPath: string;
  suffix?: string;
  lineTolerance?: LineTolerance;
  zeroNorm?: ZeroNormPolicy;
}

export interface WeightingSummary {
  documents: number;
  /** distinct tokens across the corpus */
  tokens: number;
  files: string[];
}

/**
 * Frequency files in, ranked weight files out.
 *
 * The whole corpus is loaded and aggregated before any document is scored.
 */
export class WeightingPipeline {
  constructor(private readonly deps: WeightingDeps) {}

  async run(opts: WeightingRunOptions): Promise<WeightingSummary> {
    const { logger } = this.deps;

    const stopwords = await this.deps.stopwords.load(opts.stoplistPath);
    logger.debug({ stopwords: stopwords.size, path: opts.stoplistPath }, "stopwords loaded");

    const table = await this.deps.loader.load(opts.importDir, stopwords, {
      suffix: opts.suffix,
      lineTolerance: opts.lineTolerance,
    });
    const totalDocuments = table.size;
    logger.info({ documents: totalDocuments, importDir: opts.importDir }, "frequency tables loaded");

    const df = this.deps.aggregator.aggregate(table);
    const scores = this.deps.weighter.compute(table, df, totalDocuments, { zeroNorm: opts.zeroNorm });

    const files: string[] = [];
    const writtenBy = new Map<string, DocId>();
    for (const docId of table.keys()) {
      const scored = scores.get(docId) ?? new Map<Token, number>();
      const baseName = exportBaseName(docId);

      const previous = writtenBy.get(baseName);
      if (previous !== undefined) {
        logger.warn({ docId, previous, baseName }, "export name collision, overwriting earlier document");
      }
      writtenBy.set(baseName, docId);

      const file = await this.deps.exporter.write(opts.exportDir, baseName, scored);
      logger.debug({ docId, file, tokens: scored.size }, "weights written");
      if (!files.includes(file)) files.push(file);
    }

    logger.info({ documents: totalDocuments, tokens: df.size, exportDir: opts.exportDir }, "term weights exported");
    return { documents: totalDocuments, tokens: df.size, files };
  }
}
