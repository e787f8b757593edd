export type ConversionErrorCode =
  | "MALFORMED_TABLE_RESULT"
  | "CONTENT_TYPE_MISMATCH"
  | "INVALID_ANALYSIS_RESULT"
  | "INVALID_CONFIG";

export abstract class ConversionError extends Error {
  abstract readonly code: ConversionErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export interface CellPlacement {
  tableIndex: number;
  cellIndex: number;
  row: number;
  column: number;
  rowCount: number;
  columnCount: number;
}

export class MalformedTableResultError extends ConversionError {
  readonly code = "MALFORMED_TABLE_RESULT";
  readonly placement: CellPlacement;

  constructor(placement: CellPlacement) {
    super(
      `Table ${placement.tableIndex} cell ${placement.cellIndex} targets row ${placement.row}, column ${placement.column} ` +
        `outside a ${placement.rowCount}x${placement.columnCount} grid`,
    );
    this.placement = placement;
  }
}

export class ContentTypeMismatchError extends ConversionError {
  readonly code = "CONTENT_TYPE_MISMATCH";
  readonly expected: string;
  readonly actual: string;

  constructor(expected: string, actual: string) {
    super(`Document content type must be '${expected}', got '${actual}'`);
    this.expected = expected;
    this.actual = actual;
  }
}

export class InvalidAnalysisResultError extends ConversionError {
  readonly code = "INVALID_ANALYSIS_RESULT";
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid analysis result in ${source}: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export class ConfigError extends ConversionError {
  readonly code = "INVALID_CONFIG";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
