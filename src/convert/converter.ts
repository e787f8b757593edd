import { Logger, MetricsRegistry } from "../observability";
import { AnalyzeResult, Document, MetaRecord, TableDocument, TextDocument } from "../types";
import { assignId, IdHashKey, tableCellValues } from "./documents";
import { LanguageValidator, StopwordLanguageValidator } from "./languageValidator";
import { ConverterOptions, DEFAULT_CONVERTER_OPTIONS } from "./options";
import { reconstructTable } from "./tableReconstructor";
import { reconstructText } from "./textReconstructor";

export interface LayoutConverterDeps {
  logger: Logger;
  metrics?: MetricsRegistry;
  languageValidator?: LanguageValidator;
}

export interface ConvertInput {
  /** Caller metadata copied onto every produced document. */
  meta?: MetaRecord;
  /** Name of the analysed file, used in diagnostics. */
  source?: string;
  validLanguages?: string[];
  idHashKeys?: IdHashKey[];
}

/**
 * Turns one analysis result into table documents, in detection order,
 * followed by a single body-text document.
 *
 * A converter holds only its options and collaborators, so one instance can
 * serve any number of conversions.
 */
export class LayoutConverter {
  private readonly options: ConverterOptions;
  private readonly logger: Logger;
  private readonly metrics?: MetricsRegistry;
  private readonly languageValidator: LanguageValidator;

  constructor(options: Partial<ConverterOptions>, deps: LayoutConverterDeps) {
    this.options = { ...DEFAULT_CONVERTER_OPTIONS, ...options };
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.languageValidator = deps.languageValidator ?? new StopwordLanguageValidator();
  }

  convert(result: AnalyzeResult, input: ConvertInput = {}): Document[] {
    const idHashKeys = input.idHashKeys ?? this.options.idHashKeys;
    const validLanguages = input.validLanguages ?? this.options.validLanguages;

    const tables = this.convertTables(result, input.meta, idHashKeys);
    const text = this.convertText(result, input.meta, idHashKeys);
    const documents: Document[] = [...tables, text];

    if (validLanguages && validLanguages.length > 0) {
      this.checkLanguage(documents, text, validLanguages, input.source);
    }

    this.metrics?.incrementCounter("tables_converted", tables.length);
    this.metrics?.incrementCounter("documents_emitted", documents.length);
    this.logger.debug("convert_complete", {
      source: input.source,
      tableCount: tables.length,
      pageCount: result.pages.length,
    });
    return documents;
  }

  private convertTables(result: AnalyzeResult, meta: MetaRecord | undefined, idHashKeys: IdHashKey[]): TableDocument[] {
    return result.tables.map((table, tableIndex) =>
      assignId(
        reconstructTable(table, result.pages, {
          baseMeta: meta,
          precedingContextLen: this.options.precedingContextLen,
          followingContextLen: this.options.followingContextLen,
          mergeMultipleColumnHeaders: this.options.mergeMultipleColumnHeaders,
          addPageNumber: this.options.addPageNumber,
          zeroSpanPolicy: this.options.zeroSpanPolicy,
          tableIndex,
        }),
        idHashKeys,
      ),
    );
  }

  private convertText(result: AnalyzeResult, meta: MetaRecord | undefined, idHashKeys: IdHashKey[]): TextDocument {
    return assignId(reconstructText(result, meta), idHashKeys);
  }

  private checkLanguage(documents: Document[], text: TextDocument, validLanguages: string[], source?: string): void {
    let fileText = text.content;
    for (const document of documents) {
      if (document === text) {
        continue;
      }
      for (const cell of tableCellValues(document)) {
        fileText += ` ${cell}`;
      }
    }

    if (!this.languageValidator.validate(fileText, validLanguages)) {
      this.metrics?.incrementCounter("language_check_failed", 1);
      this.logger.warn("language_check_failed", {
        source,
        validLanguages,
        hint: "The file may not have been decoded in the correct text format.",
      });
    }
  }
}
