import { writeFile } from "node:fs/promises";
import path from "node:path";

import type { ScoredDocument, WeightedToken } from "../types.js";
import type { RankedExporter } from "../exporter.js";
import { IOError } from "../errors.js";

export interface RankedExporterOptions {
  /** Output file extension without the dot. Defaults to "wts". */
  extension?: string;
  /** Digits after the decimal point. Defaults to 5. */
  fractionDigits?: number;
}

export function compareWeighted(a: WeightedToken, b: WeightedToken): number {
  return b.weight - a.weight || (a.token < b.token ? -1 : a.token > b.token ? 1 : 0);
}

/**
 * Export base name of a document: file name without extension, cut at the
 * first underscore (`doc1_Sort_by_Frequency.txt` -> `doc1`).
 */
export function exportBaseName(docId: string): string {
  const ext = path.extname(docId);
  const stem = ext ? docId.slice(0, -ext.length) : docId;
  return stem.split("_")[0] || stem;
}

export class FixedPointRankedExporter implements RankedExporter {
  private readonly extension: string;
  private readonly fractionDigits: number;

  constructor(options: RankedExporterOptions = {}) {
    this.extension = options.extension ?? "wts";
    this.fractionDigits = options.fractionDigits ?? 5;
  }

  rank(scored: ScoredDocument): WeightedToken[] {
    const ranked: WeightedToken[] = [];
    for (const [token, weight] of scored) ranked.push({ token, weight });
    ranked.sort(compareWeighted);
    return ranked;
  }

  serialize(ranked: WeightedToken[]): string {
    let out = "";
    for (const { token, weight } of ranked) {
      out += `${token}: ${weight.toFixed(this.fractionDigits)}\n`;
    }
    return out;
  }

  fileName(baseName: string): string {
    return `${baseName}_Sort_by_Term_Weight.${this.extension}`;
  }

  async write(directory: string, baseName: string, scored: ScoredDocument): Promise<string> {
    const filePath = path.join(directory, this.fileName(baseName));
    try {
      await writeFile(filePath, this.serialize(this.rank(scored)), "utf8");
    } catch (e) {
      throw new IOError(filePath, "cannot write weight file", { cause: e });
    }
    return filePath;
  }
}
