import { AnalyzedPage, MetaRecord, PageLine } from "../types";

export function findPage(pages: AnalyzedPage[], pageNumber: number): AnalyzedPage | undefined {
  return pages.find((page) => page.pageNumber === pageNumber);
}

/** Offset of the line's first span, or undefined for a line without spans. */
export function lineOffset(line: PageLine): number | undefined {
  return line.spans.at(0)?.offset;
}

export function takeLast<T>(items: T[], count: number): T[] {
  return count > 0 ? items.slice(-count) : [];
}

export function takeFirst<T>(items: T[], count: number): T[] {
  return count > 0 ? items.slice(0, count) : [];
}

export function cloneMeta(meta: MetaRecord | undefined): MetaRecord {
  return meta ? structuredClone(meta) : {};
}
