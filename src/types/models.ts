export interface DocumentSpan {
  offset: number;
  length: number;
}

export interface BoundingRegion {
  pageNumber: number;
}

export type CellKind = "body" | "columnHeader" | "other";

export interface TableCell {
  rowIndex: number;
  columnIndex: number;
  rowSpan?: number;
  columnSpan?: number;
  kind: CellKind;
  content: string;
}

export interface AnalyzedTable {
  rowCount: number;
  columnCount: number;
  cells: TableCell[];
  boundingRegions: BoundingRegion[];
  spans: DocumentSpan[];
}

export interface PageLine {
  content: string;
  spans: DocumentSpan[];
}

export interface AnalyzedPage {
  pageNumber: number;
  lines: PageLine[];
}

export interface AnalyzeResult {
  pages: AnalyzedPage[];
  tables: AnalyzedTable[];
}

export type MetaValue = string | number | boolean | null | MetaValue[] | { [key: string]: MetaValue };

export type MetaRecord = Record<string, MetaValue>;

export interface DocumentMeta {
  precedingContext?: string;
  followingContext?: string;
  page?: number;
  extra: MetaRecord;
}

export interface TableContent {
  header: string[];
  rows: string[][];
}

export type DocumentContentType = "text" | "table";

export interface TextDocument {
  id: string;
  contentType: "text";
  content: string;
  meta: DocumentMeta;
}

export interface TableDocument {
  id: string;
  contentType: "table";
  content: TableContent;
  meta: DocumentMeta;
}

export type Document = TextDocument | TableDocument;

export type TextDocumentDraft = Omit<TextDocument, "id">;

export type TableDocumentDraft = Omit<TableDocument, "id">;

export type DocumentDraft = TextDocumentDraft | TableDocumentDraft;

export interface SerializedDocument {
  id: string;
  content: string | TableContent;
  content_type: DocumentContentType;
  meta: MetaRecord;
}

export interface ConversionRecord {
  sourceId: string;
  sourcePath: string;
  sha256: string;
  status: "converted_ok" | "converted_failed" | "skipped";
  documentCount: number;
  tableCount: number;
  error?: string;
  runId: string;
  convertedAt: string;
}
