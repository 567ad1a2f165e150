import { readFile } from "node:fs/promises";

import type { Token } from "../types.js";
import type { StopwordLoader } from "../stopwords.js";
import { IOError } from "../errors.js";

export function parseStopwords(text: string): Set<Token> {
  const words = new Set<Token>();
  for (const w of text.split(/\s+/)) {
    if (w.length) words.add(w);
  }
  return words;
}

export class FileStopwordLoader implements StopwordLoader {
  async load(path: string): Promise<ReadonlySet<Token>> {
    let text: string;
    try {
      text = await readFile(path, "utf8");
    } catch (e) {
      throw new IOError(path, "cannot read stopword list", { cause: e });
    }
    return parseStopwords(text);
  }
}
