import crypto from "node:crypto";
import { describe, expect, it } from "vitest";
import {
  computeDocumentId,
  ContentTypeMismatchError,
  isIdHashKey,
  serializeDocument,
  serializeMeta,
  stableStringify,
  tableCellValues,
} from "../../src/convert";
import { TableDocument, TextDocument } from "../../src/types";

const textDocument: TextDocument = {
  id: "text-1",
  contentType: "text",
  content: "hello",
  meta: { extra: { source: "a" } },
};

const tableDocument: TableDocument = {
  id: "table-1",
  contentType: "table",
  content: { header: ["h1", "h2"], rows: [["a", "b"], ["c", "d"]] },
  meta: { extra: {}, precedingContext: "before", followingContext: "after", page: 2 },
};

describe("stableStringify", () => {
  it("sorts object keys at every depth", () => {
    expect(stableStringify({ b: 1, a: [{ d: null, c: "x" }] })).toBe('{"a":[{"c":"x","d":null}],"b":1}');
  });
});

describe("serializeMeta", () => {
  it("flattens context and page next to caller metadata", () => {
    expect(serializeMeta(tableDocument.meta)).toEqual({
      preceding_context: "before",
      following_context: "after",
      page: 2,
    });
    expect(serializeMeta(textDocument.meta)).toEqual({ source: "a" });
  });
});

describe("computeDocumentId", () => {
  it("hashes the selected fields in order", () => {
    const expected = crypto.createHash("sha256").update(":text:hello").digest("hex");

    expect(computeDocumentId(textDocument, ["content_type", "content"])).toBe(expected);
  });

  it("depends on key order", () => {
    expect(computeDocumentId(textDocument, ["content", "content_type"])).not.toBe(
      computeDocumentId(textDocument, ["content_type", "content"]),
    );
  });

  it("changes with the content when content is hashed", () => {
    const editedText = { ...textDocument, content: "hello!" };
    const editedTable = {
      ...tableDocument,
      content: { header: ["h1", "h2"], rows: [["a", "b"], ["c", "e"]] },
    };

    expect(computeDocumentId(editedText, ["content"])).not.toBe(computeDocumentId(textDocument, ["content"]));
    expect(computeDocumentId(editedTable, ["content"])).not.toBe(computeDocumentId(tableDocument, ["content"]));
    expect(computeDocumentId(editedText, ["content_type"])).toBe(computeDocumentId(textDocument, ["content_type"]));
  });

  it("changes with the content type when content_type is hashed", () => {
    const textId = computeDocumentId(textDocument, ["content_type"]);
    const tableId = computeDocumentId(tableDocument, ["content_type"]);

    expect(tableId).not.toBe(textId);
    expect(tableId).toBe(crypto.createHash("sha256").update(":table").digest("hex"));
  });
});

describe("isIdHashKey", () => {
  it("accepts only known keys", () => {
    expect(["content", "meta", "id", "page"].filter(isIdHashKey)).toEqual(["content", "meta"]);
  });
});

describe("tableCellValues", () => {
  it("lists header cells then data cells", () => {
    expect(tableCellValues(tableDocument)).toEqual(["h1", "h2", "a", "b", "c", "d"]);
  });

  it("rejects text documents", () => {
    expect(() => tableCellValues(textDocument)).toThrow(ContentTypeMismatchError);
    expect(() => tableCellValues(textDocument)).toThrow("Document content type must be 'table', got 'text'");
  });
});

describe("serializeDocument", () => {
  it("uses snake_case field names", () => {
    expect(serializeDocument(tableDocument)).toEqual({
      id: "table-1",
      content: { header: ["h1", "h2"], rows: [["a", "b"], ["c", "d"]] },
      content_type: "table",
      meta: { preceding_context: "before", following_context: "after", page: 2 },
    });
  });
});
