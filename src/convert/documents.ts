import crypto from "node:crypto";
import { Document, DocumentDraft, DocumentMeta, MetaRecord, MetaValue, SerializedDocument, TableContent } from "../types";
import { ConfigError, ContentTypeMismatchError } from "./errors";

export const ID_HASH_KEYS = ["content", "content_type", "meta"] as const;

export type IdHashKey = (typeof ID_HASH_KEYS)[number];

export function isIdHashKey(value: string): value is IdHashKey {
  return (ID_HASH_KEYS as readonly string[]).includes(value);
}

/** JSON encoding with object keys sorted, so equal values always hash the same. */
export function stableStringify(value: MetaValue): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const entries = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${stableStringify(value[key])}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value);
}

export function serializeMeta(meta: DocumentMeta): MetaRecord {
  const record: MetaRecord = { ...meta.extra };
  if (meta.precedingContext !== undefined) {
    record.preceding_context = meta.precedingContext;
  }
  if (meta.followingContext !== undefined) {
    record.following_context = meta.followingContext;
  }
  if (meta.page !== undefined) {
    record.page = meta.page;
  }
  return record;
}

function tableToMetaValue(content: TableContent): MetaValue {
  return { header: content.header, rows: content.rows };
}

function hashField(draft: DocumentDraft, key: IdHashKey): string {
  switch (key) {
    case "content":
      return draft.contentType === "text" ? draft.content : stableStringify(tableToMetaValue(draft.content));
    case "content_type":
      return draft.contentType;
    case "meta":
      return stableStringify(serializeMeta(draft.meta));
  }
}

export function computeDocumentId(draft: DocumentDraft, idHashKeys: readonly IdHashKey[]): string {
  if (idHashKeys.length === 0) {
    throw new ConfigError(`idHashKeys must contain at least one of ${ID_HASH_KEYS.join(", ")}`);
  }
  const hashInput = idHashKeys.map((key) => `:${hashField(draft, key)}`).join("");
  return crypto.createHash("sha256").update(hashInput).digest("hex");
}

export function assignId<T extends DocumentDraft>(draft: T, idHashKeys: readonly IdHashKey[]): T & { id: string } {
  return { ...draft, id: computeDocumentId(draft, idHashKeys) };
}

export function tableCellValues(document: Document): string[] {
  if (document.contentType !== "table") {
    throw new ContentTypeMismatchError("table", document.contentType);
  }
  return [...document.content.header, ...document.content.rows.flat()];
}

export function serializeDocument(document: Document): SerializedDocument {
  return {
    id: document.id,
    content: document.content,
    content_type: document.contentType,
    meta: serializeMeta(document.meta),
  };
}
