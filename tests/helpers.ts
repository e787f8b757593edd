import { vi } from "vitest";
import { Logger } from "../src/observability";
import { AnalyzedPage, AnalyzedTable, PageLine, TableCell } from "../src/types";

export function cell(rowIndex: number, columnIndex: number, content: string, overrides: Partial<TableCell> = {}): TableCell {
  return { rowIndex, columnIndex, rowSpan: 1, columnSpan: 1, kind: "body", content, ...overrides };
}

export function header(rowIndex: number, columnIndex: number, content: string): TableCell {
  return cell(rowIndex, columnIndex, content, { kind: "columnHeader" });
}

export function line(content: string, offset: number): PageLine {
  return { content, spans: [{ offset, length: content.length }] };
}

export function page(pageNumber: number, lines: PageLine[]): AnalyzedPage {
  return { pageNumber, lines };
}

export function table(overrides: Partial<AnalyzedTable> & Pick<AnalyzedTable, "rowCount" | "columnCount" | "cells">): AnalyzedTable {
  return { boundingRegions: [], spans: [], ...overrides };
}

export function quietLogger(component = "test"): Logger {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
  return new Logger({ component, runId: "run_test" });
}
