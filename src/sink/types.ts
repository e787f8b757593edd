import { ConversionRecord, SerializedDocument } from "../types";

export interface DocumentBatch {
  sourceId: string;
  sourcePath: string;
  documents: SerializedDocument[];
}

export interface Sink {
  publishDocuments(batch: DocumentBatch): Promise<void>;
  publishConversionResult(records: ConversionRecord[]): Promise<void>;
}
