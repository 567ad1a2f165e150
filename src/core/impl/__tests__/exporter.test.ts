import { readFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";

import { CountFrequencyExporter, FixedPointRankedExporter, IOError, exportBaseName } from "../../index.js";
import { makeDir, removeDir } from "./tmp.js";

describe("FixedPointRankedExporter", () => {
  const exporter = new FixedPointRankedExporter();

  it("ranks by weight descending, then token ascending", () => {
    const ranked = exporter.rank(new Map([["b", 0.5], ["c", 0.9], ["a", 0.5]]));
    expect(ranked).toEqual([
      { token: "c", weight: 0.9 },
      { token: "a", weight: 0.5 },
      { token: "b", weight: 0.5 },
    ]);
  });

  it("serializes five decimal places per line", () => {
    const text = exporter.serialize([
      { token: "cat", weight: 0.8131149374929539 },
      { token: "sat", weight: 0.5821031681977256 },
      { token: "nil", weight: 0 },
    ]);
    expect(text).toBe("cat: 0.81311\nsat: 0.58210\nnil: 0.00000\n");
  });

  it("serializes nothing for an empty document", () => {
    expect(exporter.serialize(exporter.rank(new Map()))).toBe("");
  });

  describe("write", () => {
    let dir = "";
    afterEach(() => removeDir(dir));

    it("writes <base>_Sort_by_Term_Weight.<ext>", async () => {
      dir = await makeDir();
      const file = await new FixedPointRankedExporter({ extension: "out" }).write(dir, "doc1", new Map([["cat", 1]]));
      expect(file).toBe(path.join(dir, "doc1_Sort_by_Term_Weight.out"));
      expect(await readFile(file, "utf8")).toBe("cat: 1.00000\n");
    });

    it("rejects with IOError when the directory is missing", async () => {
      dir = await makeDir();
      await expect(exporter.write(path.join(dir, "missing"), "doc1", new Map())).rejects.toBeInstanceOf(IOError);
    });
  });
});

describe("exportBaseName", () => {
  it("drops the extension and everything from the first underscore", () => {
    expect(exportBaseName("doc1_Sort_by_Frequency.txt")).toBe("doc1");
    expect(exportBaseName("report.txt")).toBe("report");
    expect(exportBaseName("my.notes.txt")).toBe("my.notes");
    expect(exportBaseName("plain")).toBe("plain");
    expect(exportBaseName("_hidden.txt")).toBe("_hidden");
  });
});

describe("CountFrequencyExporter", () => {
  const exporter = new CountFrequencyExporter();

  it("sorts by count descending, then token ascending", () => {
    const sorted = exporter.sort(new Map([["b", 2], ["c", 5], ["a", 2]]));
    expect(sorted).toEqual([["c", 5], ["a", 2], ["b", 2]]);
    expect(exporter.serialize(sorted)).toBe("c: 5\na: 2\nb: 2\n");
  });

  describe("write", () => {
    let dir = "";
    afterEach(() => removeDir(dir));

    it("writes per-document and combined files", async () => {
      dir = await makeDir();
      const one = await exporter.write(dir, "page", new Map([["cat", 1], ["dog", 3]]));
      const all = await exporter.writeCombined(dir, new Map([["cat", 4]]));
      expect(path.basename(one)).toBe("page_Sort_by_Frequency.txt");
      expect(await readFile(one, "utf8")).toBe("dog: 3\ncat: 1\n");
      expect(path.basename(all)).toBe("Combined_Sort_by_Frequency.txt");
      expect(await readFile(all, "utf8")).toBe("cat: 4\n");
    });
  });
});
