import { IdHashKey } from "./documents";
import { ZeroSpanPolicy } from "./tableReconstructor";

export interface ConverterOptions {
  /** Number of body lines before a table kept as its preceding context. */
  precedingContextLen: number;
  /** Number of body lines after a table kept as its following context. */
  followingContextLen: number;
  /** Fold second and later column header rows into the first header row. */
  mergeMultipleColumnHeaders: boolean;
  /** Tag table documents with the page the table starts on. */
  addPageNumber: boolean;
  /** ISO 639-1 codes the text is expected in; unset skips the check. */
  validLanguages?: string[];
  idHashKeys: IdHashKey[];
  zeroSpanPolicy: ZeroSpanPolicy;
}

export const DEFAULT_CONVERTER_OPTIONS: ConverterOptions = {
  precedingContextLen: 3,
  followingContextLen: 3,
  mergeMultipleColumnHeaders: true,
  addPageNumber: true,
  validLanguages: undefined,
  idHashKeys: ["content"],
  zeroSpanPolicy: "drop",
};
