import fs from "node:fs";
import path from "node:path";
import { AppConfig } from "../config";
import { ConversionRecord } from "../types";
import { DocumentBatch, Sink } from "./types";

export class LocalJsonlSink implements Sink {
  private readonly documentsPath: string;
  private readonly conversionsPath: string;
  private readonly runId: string;

  constructor(config: AppConfig, runId: string) {
    const documentsDir = path.resolve(config.outputDirs.documents);
    const manifestsDir = path.resolve(config.outputDirs.manifests);
    fs.mkdirSync(documentsDir, { recursive: true });
    fs.mkdirSync(manifestsDir, { recursive: true });
    this.documentsPath = path.join(documentsDir, "documents.jsonl");
    this.conversionsPath = path.join(manifestsDir, "conversions.jsonl");
    this.runId = runId;
  }

  async publishDocuments(batch: DocumentBatch): Promise<void> {
    await this.appendLines(
      this.documentsPath,
      batch.documents.map((document) => ({
        runId: this.runId,
        sourceId: batch.sourceId,
        ...document,
      })),
    );
  }

  async publishConversionResult(records: ConversionRecord[]): Promise<void> {
    await this.appendLines(
      this.conversionsPath,
      records.map((record) => ({
        ...record,
        runId: this.runId,
      })),
    );
  }

  private async appendLines(filePath: string, records: unknown[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    const content = records.map((record) => JSON.stringify(record)).join("\n") + "\n";
    await fs.promises.appendFile(filePath, content, "utf-8");
  }
}
