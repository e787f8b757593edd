import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { ConversionRecord } from "../types";
import { ConversionStore, RunStatus, StoreStats } from "./types";

type ConversionRow = {
  sourceId: string;
  sourcePath: string;
  sha256: string;
  status: "converted_ok" | "converted_failed";
  documentCount: number;
  tableCount: number;
  error: string | null;
  runId: string;
  convertedAt: string;
};

const IN_MEMORY = ":memory:";

export class SqliteStore implements ConversionStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath === IN_MEMORY) {
      this.db = new Database(IN_MEMORY);
    } else {
      const absolutePath = path.resolve(dbPath);
      fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
      this.db = new Database(absolutePath);
      this.db.pragma("journal_mode = WAL");
    }
    this.initializeSchema();
  }

  async startRun(runId: string, startedAt: string): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO runs (runId, startedAt, finishedAt, status)
        VALUES (@runId, @startedAt, NULL, 'running')
        ON CONFLICT(runId) DO UPDATE SET
          startedAt = excluded.startedAt,
          finishedAt = NULL,
          status = 'running'
      `,
      )
      .run({
        runId,
        startedAt,
      });
  }

  async finishRun(runId: string, status: RunStatus, finishedAt: string): Promise<void> {
    this.db
      .prepare(
        `
        UPDATE runs
        SET
          status = @status,
          finishedAt = @finishedAt
        WHERE runId = @runId
      `,
      )
      .run({
        runId,
        status,
        finishedAt,
      });
  }

  async getConversion(sourceId: string): Promise<ConversionRecord | undefined> {
    const row = this.db
      .prepare(
        `
        SELECT sourceId, sourcePath, sha256, status, documentCount, tableCount, error, runId, convertedAt
        FROM conversions
        WHERE sourceId = ?
      `,
      )
      .get(sourceId) as ConversionRow | undefined;

    if (!row) {
      return undefined;
    }

    return {
      sourceId: row.sourceId,
      sourcePath: row.sourcePath,
      sha256: row.sha256,
      status: row.status,
      documentCount: row.documentCount,
      tableCount: row.tableCount,
      error: row.error ?? undefined,
      runId: row.runId,
      convertedAt: row.convertedAt,
    };
  }

  async markConversionResult(record: ConversionRecord): Promise<void> {
    if (record.status === "skipped") {
      return;
    }

    const statement = this.db.prepare(`
      INSERT INTO conversions (
        sourceId, sourcePath, sha256, status, documentCount, tableCount,
        error, runId, convertedAt, attempts
      )
      VALUES (
        @sourceId, @sourcePath, @sha256, @status, @documentCount, @tableCount,
        @error, @runId, @convertedAt, 1
      )
      ON CONFLICT(sourceId) DO UPDATE SET
        sourcePath = excluded.sourcePath,
        sha256 = excluded.sha256,
        status = excluded.status,
        documentCount = excluded.documentCount,
        tableCount = excluded.tableCount,
        error = excluded.error,
        runId = excluded.runId,
        convertedAt = excluded.convertedAt,
        attempts = attempts + 1
    `);

    statement.run({
      sourceId: record.sourceId,
      sourcePath: record.sourcePath,
      sha256: record.sha256,
      status: record.status,
      documentCount: record.documentCount,
      tableCount: record.tableCount,
      error: record.error ?? null,
      runId: record.runId,
      convertedAt: record.convertedAt,
    });
  }

  async getStats(): Promise<StoreStats> {
    const totals = this.db
      .prepare(
        `
        SELECT
          COUNT(*) AS totalSources,
          COALESCE(SUM(CASE WHEN status = 'converted_ok' THEN 1 ELSE 0 END), 0) AS convertedOk,
          COALESCE(SUM(CASE WHEN status = 'converted_failed' THEN 1 ELSE 0 END), 0) AS convertedFailed,
          COALESCE(SUM(CASE WHEN status = 'converted_ok' THEN documentCount ELSE 0 END), 0) AS documents,
          COALESCE(SUM(CASE WHEN status = 'converted_ok' THEN tableCount ELSE 0 END), 0) AS tables
        FROM conversions
      `,
      )
      .get() as Omit<StoreStats, "runs">;
    const runs = this.db.prepare("SELECT COUNT(*) AS count FROM runs").get() as { count: number };

    return { ...totals, runs: runs.count };
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS conversions (
        sourceId TEXT PRIMARY KEY,
        sourcePath TEXT NOT NULL,
        sha256 TEXT NOT NULL,
        status TEXT NOT NULL,
        documentCount INTEGER NOT NULL DEFAULT 0,
        tableCount INTEGER NOT NULL DEFAULT 0,
        error TEXT NULL,
        runId TEXT NOT NULL,
        convertedAt TEXT NOT NULL,
        attempts INTEGER NOT NULL DEFAULT 0
      );

      CREATE TABLE IF NOT EXISTS runs (
        runId TEXT PRIMARY KEY,
        startedAt TEXT NOT NULL,
        finishedAt TEXT NULL,
        status TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_conversions_status ON conversions(status);
      CREATE INDEX IF NOT EXISTS idx_conversions_sha ON conversions(sha256);
    `);
  }
}
