import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";

import type { TokenCounts } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";
import type { FrequencyExporter } from "../exporter.js";
import { IOError } from "../errors.js";
import { countTokens } from "./htmlTokenizer.js";

export interface ExtractionDeps {
  tokenizer: Tokenizer;
  exporter: FrequencyExporter;
  logger: Logger;
}

export interface ExtractionRunOptions {
  importDir: string;
  exportDir: string;
  /** Defaults to ".html". */
  suffix?: string;
}

export interface ExtractionSummary {
  processed: string[];
  skipped: string[];
  /** distinct tokens across processed documents */
  tokens: number;
}

/**
 * HTML documents in, per-document and combined frequency files out.
 *
 * A document that cannot be read is logged and skipped.
 */
export class ExtractionPipeline {
  constructor(private readonly deps: ExtractionDeps) {}

  async run(opts: ExtractionRunOptions): Promise<ExtractionSummary> {
    const { logger } = this.deps;
    const suffix = opts.suffix ?? ".html";

    let names: string[];
    try {
      names = await readdir(opts.importDir);
    } catch (e) {
      throw new IOError(opts.importDir, "cannot list directory", { cause: e });
    }

    const combined: TokenCounts = new Map();
    const processed: string[] = [];
    const skipped: string[] = [];

    for (const name of names.filter((n) => n.endsWith(suffix)).sort()) {
      const filePath = path.join(opts.importDir, name);
      let html: string;
      try {
        html = await readFile(filePath, "utf8");
      } catch (e) {
        logger.warn({ err: e, file: filePath }, "failed to read document, skipping");
        skipped.push(name);
        continue;
      }

      const counts = countTokens(this.deps.tokenizer.tokenize(html));
      for (const [token, n] of counts) combined.set(token, (combined.get(token) ?? 0) + n);

      const file = await this.deps.exporter.write(opts.exportDir, name.slice(0, -suffix.length), counts);
      logger.debug({ file, tokens: counts.size }, "frequencies written");
      processed.push(name);
    }

    await this.deps.exporter.writeCombined(opts.exportDir, combined);
    logger.info({ processed: processed.length, skipped: skipped.length, exportDir: opts.exportDir }, "documents tokenized");

    return { processed, skipped, tokens: combined.size };
  }
}
