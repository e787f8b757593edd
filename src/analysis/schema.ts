import { z } from "zod";
import { InvalidAnalysisResultError } from "../convert/errors";
import { AnalyzeResult, CellKind } from "../types";

// Wire format of the layout analysis service. Only the fields the converter
// reads are declared; anything else in the payload is ignored.

const spanSchema = z.object({
  offset: z.number().int().min(0),
  length: z.number().int().min(0),
});

const boundingRegionSchema = z.object({
  page_number: z.number().int().min(1),
});

const lineSchema = z.object({
  content: z.string(),
  spans: z.array(spanSchema).nullish(),
});

const pageSchema = z.object({
  page_number: z.number().int().min(1),
  lines: z.array(lineSchema).nullish(),
});

const cellSchema = z.object({
  row_index: z.number().int().min(0),
  column_index: z.number().int().min(0),
  row_span: z.number().int().min(0).nullish(),
  column_span: z.number().int().min(0).nullish(),
  kind: z.string().nullish(),
  content: z.string(),
});

const tableSchema = z.object({
  row_count: z.number().int().positive(),
  column_count: z.number().int().positive(),
  cells: z.array(cellSchema),
  bounding_regions: z.array(boundingRegionSchema).nullish(),
  spans: z.array(spanSchema).nullish(),
});

export const analyzeResultSchema = z.object({
  pages: z.array(pageSchema).nullish(),
  tables: z.array(tableSchema).nullish(),
});

export type AnalyzeResultPayload = z.infer<typeof analyzeResultSchema>;

export function toCellKind(kind: string | null | undefined): CellKind {
  if (kind === "columnHeader") {
    return "columnHeader";
  }
  if (kind === undefined || kind === null || kind === "content" || kind === "body") {
    return "body";
  }
  return "other";
}

export function fromPayload(payload: AnalyzeResultPayload): AnalyzeResult {
  return {
    pages: (payload.pages ?? []).map((page) => ({
      pageNumber: page.page_number,
      lines: (page.lines ?? []).map((line) => ({
        content: line.content,
        spans: line.spans ?? [],
      })),
    })),
    tables: (payload.tables ?? []).map((table) => ({
      rowCount: table.row_count,
      columnCount: table.column_count,
      cells: table.cells.map((cell) => ({
        rowIndex: cell.row_index,
        columnIndex: cell.column_index,
        rowSpan: cell.row_span ?? undefined,
        columnSpan: cell.column_span ?? undefined,
        kind: toCellKind(cell.kind),
        content: cell.content,
      })),
      boundingRegions: (table.bounding_regions ?? []).map((region) => ({ pageNumber: region.page_number })),
      spans: table.spans ?? [],
    })),
  };
}

export function toPayload(result: AnalyzeResult): AnalyzeResultPayload {
  return {
    pages: result.pages.map((page) => ({
      page_number: page.pageNumber,
      lines: page.lines.map((line) => ({ content: line.content, spans: line.spans })),
    })),
    tables: result.tables.map((table) => ({
      row_count: table.rowCount,
      column_count: table.columnCount,
      cells: table.cells.map((cell) => ({
        row_index: cell.rowIndex,
        column_index: cell.columnIndex,
        row_span: cell.rowSpan,
        column_span: cell.columnSpan,
        kind: cell.kind,
        content: cell.content,
      })),
      bounding_regions: table.boundingRegions.map((region) => ({ page_number: region.pageNumber })),
      spans: table.spans,
    })),
  };
}

export function parseAnalyzeResult(raw: unknown, source = "<input>"): AnalyzeResult {
  const parsed = analyzeResultSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidAnalysisResultError(
      source,
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`),
    );
  }
  return fromPayload(parsed.data);
}
