import { ConversionRecord } from "../types";
import { ConversionStore, RunStatus, StoreStats } from "./types";

interface RunRow {
  startedAt: string;
  finishedAt?: string;
  status: RunStatus | "running";
}

export class InMemoryStore implements ConversionStore {
  private readonly conversions = new Map<string, ConversionRecord>();
  private readonly runs = new Map<string, RunRow>();

  async startRun(runId: string, startedAt: string): Promise<void> {
    this.runs.set(runId, { startedAt, status: "running" });
  }

  async finishRun(runId: string, status: RunStatus, finishedAt: string): Promise<void> {
    const run = this.runs.get(runId);
    if (run) {
      this.runs.set(runId, { ...run, status, finishedAt });
    }
  }

  async getConversion(sourceId: string): Promise<ConversionRecord | undefined> {
    const record = this.conversions.get(sourceId);
    return record ? { ...record } : undefined;
  }

  async markConversionResult(record: ConversionRecord): Promise<void> {
    if (record.status === "skipped") {
      return;
    }
    this.conversions.set(record.sourceId, { ...record });
  }

  async getStats(): Promise<StoreStats> {
    const records = [...this.conversions.values()];
    const ok = records.filter((record) => record.status === "converted_ok");
    return {
      totalSources: records.length,
      convertedOk: ok.length,
      convertedFailed: records.filter((record) => record.status === "converted_failed").length,
      documents: ok.reduce((acc, record) => acc + record.documentCount, 0),
      tables: ok.reduce((acc, record) => acc + record.tableCount, 0),
      runs: this.runs.size,
    };
  }

  async close(): Promise<void> {
    this.conversions.clear();
    this.runs.clear();
  }
}
