import { AnalyzeResult, DocumentSpan, MetaRecord, PageLine, TextDocumentDraft } from "../types";
import { cloneMeta, lineOffset } from "./layout";

export const PAGE_BREAK = "\f";

export function indexTableSpansByPage(result: AnalyzeResult): Map<number, DocumentSpan[]> {
  const spansByPage = new Map<number, DocumentSpan[]>();
  for (const table of result.tables) {
    const region = table.boundingRegions.at(0);
    const span = table.spans.at(0);
    if (!region || !span) {
      continue;
    }
    const spans = spansByPage.get(region.pageNumber) ?? [];
    spans.push(span);
    spansByPage.set(region.pageNumber, spans);
  }
  return spansByPage;
}

export function isLineInTable(line: PageLine, tableSpans: DocumentSpan[]): boolean {
  const offset = lineOffset(line);
  if (offset === undefined) {
    return false;
  }
  return tableSpans.some((span) => span.offset <= offset && offset <= span.offset + span.length);
}

export function reconstructText(result: AnalyzeResult, baseMeta?: MetaRecord): TextDocumentDraft {
  const spansByPage = indexTableSpansByPage(result);
  let text = "";

  for (const page of result.pages) {
    const tableSpans = spansByPage.get(page.pageNumber) ?? [];
    for (const line of page.lines) {
      if (isLineInTable(line, tableSpans)) {
        continue;
      }
      text += `${line.content}\n`;
    }
    text += PAGE_BREAK;
  }

  return {
    contentType: "text",
    content: text,
    meta: { extra: cloneMeta(baseMeta) },
  };
}
