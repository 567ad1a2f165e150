import type { Logger } from "pino";

import {
  CountFrequencyExporter,
  CountingDocumentFrequencyAggregator,
  ExtractionPipeline,
  FileFrequencyTableLoader,
  FileStopwordLoader,
  FixedPointRankedExporter,
  HtmlTokenizer,
  LogTfIdfWeighter,
  WeightingPipeline,
  type ExtractionSummary,
  type WeightingSummary,
} from "../core/impl/index.js";
import { ConfigurationError } from "../core/errors.js";
import type { AppConfig } from "./config.js";
import { ensureDirectory, requireDirectory, requireFile } from "./preflight.js";

export const COMMANDS = ["tokenize", "weights"] as const;
export type Command = (typeof COMMANDS)[number];

export function parseCommand(argv: readonly string[]): Command {
  if (argv.length > 1) {
    throw new ConfigurationError(`unexpected arguments: ${argv.slice(1).join(" ")}`);
  }
  const raw = argv[0] ?? "weights";
  const command = COMMANDS.find((c) => c === raw);
  if (!command) {
    throw new ConfigurationError(`unknown command ${JSON.stringify(raw)}, expected one of: ${COMMANDS.join(", ")}`);
  }
  return command;
}

export function createWeightingPipeline(config: AppConfig, logger: Logger): WeightingPipeline {
  return new WeightingPipeline({
    stopwords: new FileStopwordLoader(),
    loader: new FileFrequencyTableLoader(),
    aggregator: new CountingDocumentFrequencyAggregator(),
    weighter: new LogTfIdfWeighter(),
    exporter: new FixedPointRankedExporter({ extension: config.weightExtension }),
    logger,
  });
}

export function createExtractionPipeline(logger: Logger): ExtractionPipeline {
  return new ExtractionPipeline({
    tokenizer: new HtmlTokenizer(),
    exporter: new CountFrequencyExporter(),
    logger,
  });
}

export async function runWeights(config: AppConfig, logger: Logger): Promise<WeightingSummary> {
  await requireFile(config.stoplistPath, "Stoplist");
  await requireDirectory(config.importDir, "Import");
  await ensureDirectory(config.exportDir, logger);

  return createWeightingPipeline(config, logger).run({
    importDir: config.importDir,
    exportDir: config.exportDir,
    stoplistPath: config.stoplistPath,
    lineTolerance: config.lineTolerance,
    zeroNorm: config.zeroNorm,
  });
}

export async function runTokenize(config: AppConfig, logger: Logger): Promise<ExtractionSummary> {
  await requireDirectory(config.importDir, "Import");
  await ensureDirectory(config.exportDir, logger);

  return createExtractionPipeline(logger).run({
    importDir: config.importDir,
    exportDir: config.exportDir,
  });
}
