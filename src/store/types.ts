import { ConversionRecord } from "../types";

export interface StoreStats {
  totalSources: number;
  convertedOk: number;
  convertedFailed: number;
  documents: number;
  tables: number;
  runs: number;
}

export type RunStatus = "completed" | "failed";

export interface ConversionStore {
  startRun(runId: string, startedAt: string): Promise<void>;
  finishRun(runId: string, status: RunStatus, finishedAt: string): Promise<void>;
  getConversion(sourceId: string): Promise<ConversionRecord | undefined>;
  /** Records the latest outcome for a source. Skipped outcomes leave the stored record untouched. */
  markConversionResult(record: ConversionRecord): Promise<void>;
  getStats(): Promise<StoreStats>;
  close(): Promise<void>;
}
