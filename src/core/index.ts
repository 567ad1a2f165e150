export type * from "./types.js";
export type { StopwordLoader } from "./stopwords.js";
export type { FrequencyLoadOptions, FrequencyTableLoader, LineTolerance } from "./frequencyTable.js";
export type { DocumentFrequencyAggregator } from "./documentFrequency.js";
export type { TermWeighter, WeightOptions, ZeroNormPolicy } from "./weighter.js";
export type { FrequencyExporter, RankedExporter } from "./exporter.js";
export type { Tokenizer } from "./tokenizer.js";
export * from "./errors.js";
export * from "./impl/index.js";
