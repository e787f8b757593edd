import { AnalyzedPage, AnalyzedTable, DocumentMeta, MetaRecord, TableCell, TableDocumentDraft } from "../types";
import { MalformedTableResultError } from "./errors";
import { cloneMeta, findPage, lineOffset, takeFirst, takeLast } from "./layout";

/**
 * How a cell whose row or column span is absent or zero is expanded.
 *
 * - `drop`: the span is taken literally, so the cell contributes no placements.
 * - `one`: the span counts as one.
 */
export type ZeroSpanPolicy = "drop" | "one";

export interface TableReconstructionOptions {
  baseMeta?: MetaRecord;
  precedingContextLen: number;
  followingContextLen: number;
  mergeMultipleColumnHeaders: boolean;
  addPageNumber: boolean;
  zeroSpanPolicy: ZeroSpanPolicy;
  /** Position of the table in the analysis result, reported in errors. */
  tableIndex?: number;
}

interface TableContext {
  precedingContext: string;
  followingContext: string;
}

const SELECTION_MARKERS = [":selected:", ":unselected:"];

export function stripSelectionMarkers(content: string): string {
  return SELECTION_MARKERS.reduce((acc, marker) => acc.replaceAll(marker, ""), content);
}

function spanCount(span: number | undefined, policy: ZeroSpanPolicy): number {
  if (!span) {
    return policy === "one" ? 1 : 0;
  }
  return span;
}

function isCaption(cell: TableCell, cellIndex: number, table: AnalyzedTable): boolean {
  return cellIndex === 0 && cell.columnSpan === table.columnCount;
}

export function reconstructTable(
  table: AnalyzedTable,
  pages: AnalyzedPage[],
  options: TableReconstructionOptions,
): TableDocumentDraft {
  const tableIndex = options.tableIndex ?? 0;
  const grid: string[][] = Array.from({ length: table.rowCount }, () => new Array<string>(table.columnCount).fill(""));
  const extraHeaderRows = new Set<number>();
  let caption = "";
  let rowOffset = 0;

  const ensureInGrid = (cellIndex: number, row: number, column: number): void => {
    if (row < 0 || row >= grid.length || column < 0 || column >= table.columnCount) {
      throw new MalformedTableResultError({
        tableIndex,
        cellIndex,
        row,
        column,
        rowCount: grid.length,
        columnCount: table.columnCount,
      });
    }
  };

  for (const [cellIndex, cell] of table.cells.entries()) {
    const content = stripSelectionMarkers(cell.content);

    if (isCaption(cell, cellIndex, table)) {
      caption = content;
      rowOffset = 1;
      grid.shift();
      continue;
    }

    const columnSpan = spanCount(cell.columnSpan, options.zeroSpanPolicy);
    const rowSpan = spanCount(cell.rowSpan, options.zeroSpanPolicy);
    for (let c = 0; c < columnSpan; c += 1) {
      const column = cell.columnIndex + c;
      for (let r = 0; r < rowSpan; r += 1) {
        if (options.mergeMultipleColumnHeaders && cell.kind === "columnHeader" && cell.rowIndex > rowOffset) {
          // Later header rows fold into the first one and are removed afterwards.
          const headerRow = cell.rowIndex - rowOffset;
          ensureInGrid(cellIndex, headerRow, column);
          grid[0][column] += `\n${content}`;
          extraHeaderRows.add(headerRow);
        } else {
          const row = cell.rowIndex + r - rowOffset;
          ensureInGrid(cellIndex, row, column);
          grid[row][column] = content;
        }
      }
    }
  }

  for (const row of [...extraHeaderRows].sort((a, b) => b - a)) {
    grid.splice(row, 1);
  }

  const context = buildTableContext(table, pages, caption, options);
  const meta: DocumentMeta = {
    precedingContext: context.precedingContext,
    followingContext: context.followingContext,
    extra: cloneMeta(options.baseMeta),
  };

  const firstRegion = table.boundingRegions.at(0);
  if (options.addPageNumber && firstRegion) {
    meta.page = firstRegion.pageNumber;
  }

  const [header = [], ...rows] = grid;
  return {
    contentType: "table",
    content: { header, rows },
    meta,
  };
}

/**
 * Collects the body lines around a table.
 *
 * The end offset comes from the table's first span only, so for a table
 * continued over several pages the following context is matched against the
 * end of its first fragment.
 */
export function buildTableContext(
  table: AnalyzedTable,
  pages: AnalyzedPage[],
  caption: string,
  options: Pick<TableReconstructionOptions, "precedingContextLen" | "followingContextLen">,
): TableContext {
  const firstRegion = table.boundingRegions.at(0);
  const lastRegion = table.boundingRegions.at(-1);
  const startPage = firstRegion ? findPage(pages, firstRegion.pageNumber) : undefined;
  const endPage =
    table.boundingRegions.length === 1 ? startPage : lastRegion ? findPage(pages, lastRegion.pageNumber) : undefined;
  const tableSpan = table.spans.at(0);

  let precedingLines: string[] = [];
  let followingLines: string[] = [];
  if (tableSpan) {
    const tableStart = tableSpan.offset;
    const tableEnd = tableStart + tableSpan.length;

    precedingLines = (startPage?.lines ?? [])
      .filter((line) => {
        const offset = lineOffset(line);
        return offset !== undefined && offset < tableStart;
      })
      .map((line) => line.content);

    followingLines = (endPage?.lines ?? [])
      .filter((line) => {
        const offset = lineOffset(line);
        return offset !== undefined && offset > tableEnd;
      })
      .map((line) => line.content);
  }

  const precedingContext = `${takeLast(precedingLines, options.precedingContextLen).join("\n")}\n${caption}`.trim();
  const followingContext = takeFirst(followingLines, options.followingContextLen).join("\n");
  return { precedingContext, followingContext };
}
