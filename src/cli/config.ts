import { z } from "zod";

import { ConfigurationError } from "../core/errors.js";

const nonEmpty = z.string().trim().min(1);

const configSchema = z.object({
  TFIDF_IMPORT_DIR: nonEmpty.default("Import"),
  TFIDF_EXPORT_DIR: nonEmpty.default("Export"),
  TFIDF_STOPLIST: nonEmpty.default("stoplist.txt"),
  TFIDF_LINE_TOLERANCE: z.enum(["skip", "strict"]).default("skip"),
  TFIDF_ZERO_NORM: z.enum(["zero", "throw"]).default("zero"),
  TFIDF_WEIGHT_EXT: z
    .string()
    .trim()
    .regex(/^[A-Za-z0-9]+$/, "must be alphanumeric")
    .default("wts"),
});

export interface AppConfig {
  importDir: string;
  exportDir: string;
  stoplistPath: string;
  lineTolerance: "skip" | "strict";
  zeroNorm: "zero" | "throw";
  weightExtension: string;
}

/**
 * Reads settings from the environment. Unset or empty variables take their
 * defaults; anything else invalid is a ConfigurationError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present: Record<string, string> = {};
  for (const key of Object.keys(configSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== "") present[key] = value;
  }

  const parsed = configSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigurationError(`invalid configuration: ${details}`);
  }

  const c = parsed.data;
  return {
    importDir: c.TFIDF_IMPORT_DIR,
    exportDir: c.TFIDF_EXPORT_DIR,
    stoplistPath: c.TFIDF_STOPLIST,
    lineTolerance: c.TFIDF_LINE_TOLERANCE,
    zeroNorm: c.TFIDF_ZERO_NORM,
    weightExtension: c.TFIDF_WEIGHT_EXT,
  };
}
