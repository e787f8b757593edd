import { describe, expect, it } from "vitest";
import { indexTableSpansByPage, PAGE_BREAK, reconstructText } from "../../src/convert/textReconstructor";
import { AnalyzeResult } from "../../src/types";
import { cell, line, page, table } from "../helpers";

const tableOnPage = (pageNumber: number, offset: number, length: number) =>
  table({
    rowCount: 1,
    columnCount: 2,
    cells: [cell(0, 0, "a"), cell(0, 1, "b")],
    boundingRegions: [{ pageNumber }],
    spans: [{ offset, length }],
  });

describe("reconstructText", () => {
  it("skips lines that start inside a table span", () => {
    const result: AnalyzeResult = {
      pages: [page(1, [line("L1", 0), line("L2", 10), line("L3", 30)])],
      tables: [tableOnPage(1, 5, 10)],
    };

    const document = reconstructText(result);

    expect(document.contentType).toBe("text");
    expect(document.content).toBe("L1\nL3\n\f");
  });

  it("treats both ends of a table span as inside", () => {
    const result: AnalyzeResult = {
      pages: [page(1, [line("start", 5), line("end", 15), line("after", 16)])],
      tables: [tableOnPage(1, 5, 10)],
    };

    expect(reconstructText(result).content).toBe("after\n\f");
  });

  it("only applies a table span to the page the table starts on", () => {
    const result: AnalyzeResult = {
      pages: [page(1, [line("first page", 10)]), page(2, [line("second page", 10)])],
      tables: [tableOnPage(2, 0, 20)],
    };

    expect(reconstructText(result).content).toBe("first page\n\f\f");
  });

  it("emits a page break for pages without lines", () => {
    const result: AnalyzeResult = {
      pages: [page(1, []), page(2, [line("x", 0)])],
      tables: [],
    };

    expect(reconstructText(result).content).toBe(`${PAGE_BREAK}x\n${PAGE_BREAK}`);
  });

  it("keeps lines that have no spans", () => {
    const result: AnalyzeResult = {
      pages: [page(1, [{ content: "floating", spans: [] }])],
      tables: [tableOnPage(1, 0, 100)],
    };

    expect(reconstructText(result).content).toBe("floating\n\f");
  });

  it("copies caller metadata", () => {
    const baseMeta = { source: "report" };
    const document = reconstructText({ pages: [], tables: [] }, baseMeta);

    expect(document.content).toBe("");
    expect(document.meta).toEqual({ extra: { source: "report" } });
    expect(document.meta.extra).not.toBe(baseMeta);
  });
});

describe("indexTableSpansByPage", () => {
  it("ignores tables without bounding regions or spans", () => {
    const index = indexTableSpansByPage({
      pages: [],
      tables: [
        tableOnPage(1, 0, 5),
        { ...tableOnPage(1, 10, 5), boundingRegions: [] },
        { ...tableOnPage(2, 20, 5), spans: [] },
        tableOnPage(1, 30, 5),
      ],
    });

    expect([...index.keys()]).toEqual([1]);
    expect(index.get(1)).toEqual([
      { offset: 0, length: 5 },
      { offset: 30, length: 5 },
    ]);
  });
});
