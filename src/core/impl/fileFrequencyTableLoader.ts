import { readdir, readFile } from "node:fs/promises";
import path from "node:path";

import type { DocumentFrequencyTable, Token, TokenCounts } from "../types.js";
import type { FrequencyLoadOptions, FrequencyTableLoader, LineTolerance } from "../frequencyTable.js";
import { IOError, MalformedLineError } from "../errors.js";

export const DEFAULT_FREQUENCY_SUFFIX = ".txt";
export const COMBINED_FREQUENCY_FILE = "Combined_Sort_by_Frequency.txt";

const COUNT_RE = /^\+?\d+$/;

/** Length in code points, so an astral character counts once. */
function tokenLength(token: string): number {
  return Array.from(token).length;
}

/**
 * Parses one frequency file's contents.
 *
 * `source` only labels errors.
 */
export function parseFrequencyText(
  text: string,
  stopwords: ReadonlySet<Token>,
  lineTolerance: LineTolerance = "skip",
  source = "<input>",
): TokenCounts {
  const counts: TokenCounts = new Map();
  const lines = text.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i]!.trim();
    if (!line.length) continue;

    const parts = line.split(":");
    if (parts.length !== 2) {
      if (lineTolerance === "strict") throw new MalformedLineError(source, i + 1, line);
      continue;
    }

    const token = parts[0]!.trim();
    const rawCount = parts[1]!.trim();
    if (!COUNT_RE.test(rawCount)) {
      throw new IOError(source, `line ${i + 1}: count ${JSON.stringify(rawCount)} is not a non-negative integer`);
    }

    if (stopwords.has(token) || tokenLength(token) <= 1) continue;
    counts.set(token, (counts.get(token) ?? 0) + Number.parseInt(rawCount, 10));
  }

  return counts;
}

/**
 * Reads every matching file of a directory, in file-name order.
 *
 * Any read failure or malformed count rejects the whole load.
 */
export class FileFrequencyTableLoader implements FrequencyTableLoader {
  async load(
    directory: string,
    stopwords: ReadonlySet<Token>,
    options?: FrequencyLoadOptions,
  ): Promise<DocumentFrequencyTable> {
    const suffix = options?.suffix ?? DEFAULT_FREQUENCY_SUFFIX;
    const ignore = new Set(options?.ignore ?? [COMBINED_FREQUENCY_FILE]);
    const lineTolerance = options?.lineTolerance ?? "skip";

    let names: string[];
    try {
      names = await readdir(directory);
    } catch (e) {
      throw new IOError(directory, "cannot list directory", { cause: e });
    }

    const table: DocumentFrequencyTable = new Map();
    for (const name of names.filter((n) => n.endsWith(suffix) && !ignore.has(n)).sort()) {
      const filePath = path.join(directory, name);
      let text: string;
      try {
        text = await readFile(filePath, "utf8");
      } catch (e) {
        throw new IOError(filePath, "cannot read frequency file", { cause: e });
      }
      table.set(name, parseFrequencyText(text, stopwords, lineTolerance, filePath));
    }

    return table;
  }
}
