import { writeFile } from "node:fs/promises";
import path from "node:path";

import type { Token, TokenCounts } from "../types.js";
import type { FrequencyExporter } from "../exporter.js";
import { IOError } from "../errors.js";
import { COMBINED_FREQUENCY_FILE } from "./fileFrequencyTableLoader.js";

export class CountFrequencyExporter implements FrequencyExporter {
  sort(counts: TokenCounts): Array<[Token, number]> {
    return Array.from(counts.entries()).sort(
      (a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0),
    );
  }

  serialize(sorted: Array<[Token, number]>): string {
    return sorted.map(([token, count]) => `${token}: ${count}\n`).join("");
  }

  write(directory: string, baseName: string, counts: TokenCounts): Promise<string> {
    return this.writeSorted(path.join(directory, `${baseName}_Sort_by_Frequency.txt`), counts);
  }

  writeCombined(directory: string, counts: TokenCounts): Promise<string> {
    return this.writeSorted(path.join(directory, COMBINED_FREQUENCY_FILE), counts);
  }

  private async writeSorted(filePath: string, counts: TokenCounts): Promise<string> {
    try {
      await writeFile(filePath, this.serialize(this.sort(counts)), "utf8");
    } catch (e) {
      throw new IOError(filePath, "cannot write frequency file", { cause: e });
    }
    return filePath;
  }
}
