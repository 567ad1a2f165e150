export { FileStopwordLoader, parseStopwords } from "./fileStopwordLoader.js";
export {
  COMBINED_FREQUENCY_FILE,
  DEFAULT_FREQUENCY_SUFFIX,
  FileFrequencyTableLoader,
  parseFrequencyText,
} from "./fileFrequencyTableLoader.js";
export { CountingDocumentFrequencyAggregator } from "./countingDocumentFrequencyAggregator.js";
export { LogTfIdfWeighter, inverseDocumentFrequency, termFrequency } from "./logTfIdfWeighter.js";
export {
  FixedPointRankedExporter,
  compareWeighted,
  exportBaseName,
  type RankedExporterOptions,
} from "./fixedPointRankedExporter.js";
export { CountFrequencyExporter } from "./countFrequencyExporter.js";
export { HtmlTokenizer, countTokens, htmlToText, normalizeText } from "./htmlTokenizer.js";
export {
  WeightingPipeline,
  type WeightingDeps,
  type WeightingRunOptions,
  type WeightingSummary,
} from "./weightingPipeline.js";
export {
  ExtractionPipeline,
  type ExtractionDeps,
  type ExtractionRunOptions,
  type ExtractionSummary,
} from "./extractionPipeline.js";
