import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { ANALYSIS_SUFFIX, analysisSidecarPath, readAnalyzeResultFile, writeAnalyzeResultFile } from "../analysis";
import { AppConfig } from "../config";
import { ConversionError, errorMessage, LayoutConverter, serializeDocument } from "../convert";
import { Logger, MetricsRegistry } from "../observability";
import { Sink } from "../sink";
import { ConversionStore, StoreStats } from "../store";
import { ConversionRecord, MetaRecord } from "../types";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  store: ConversionStore;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: Sink;
  converter: LayoutConverter;
}

export interface ConvertCommandOptions {
  force?: boolean;
  meta?: MetaRecord;
  validLanguages?: string[];
}

export interface ConvertSummary {
  processed: number;
  ok: number;
  failed: number;
  skipped: number;
}

type FileOutcome = ConversionRecord["status"];

export function sourceIdFor(filePath: string): string {
  return crypto.createHash("sha256").update(path.resolve(filePath)).digest("hex").slice(0, 24);
}

function isAnalysisInput(fileName: string): boolean {
  return fileName.endsWith(".json") && !fileName.endsWith(ANALYSIS_SUFFIX);
}

/** Expands directories to the analysis JSON files directly inside them. */
export async function collectAnalysisFiles(paths: string[]): Promise<string[]> {
  const files: string[] = [];
  for (const input of paths) {
    const absolutePath = path.resolve(input);
    const stat = await fs.promises.stat(absolutePath);
    if (!stat.isDirectory()) {
      files.push(absolutePath);
      continue;
    }

    const entries = await fs.promises.readdir(absolutePath, { withFileTypes: true });
    files.push(
      ...entries
        .filter((entry) => entry.isFile() && isAnalysisInput(entry.name))
        .map((entry) => path.join(absolutePath, entry.name))
        .sort(),
    );
  }
  return [...new Set(files)];
}

async function convertFile(ctx: CommandContext, filePath: string, options: ConvertCommandOptions): Promise<FileOutcome> {
  const sourceId = sourceIdFor(filePath);
  const stopTimer = ctx.metrics.startTimer("convert_ms");
  let sha256 = "";

  try {
    const loaded = await readAnalyzeResultFile(filePath);
    sha256 = loaded.sha256;

    const previous = await ctx.store.getConversion(sourceId);
    if (!options.force && previous?.status === "converted_ok" && previous.sha256 === sha256) {
      await ctx.sink.publishConversionResult([
        { ...previous, status: "skipped", runId: ctx.runId, convertedAt: new Date().toISOString() },
      ]);
      const durationMs = stopTimer();
      ctx.metrics.incrementCounter("files_skipped", 1);
      ctx.logger.info("convert_file_skipped", { sourceId, sourcePath: filePath, durationMs, reason: "unchanged" });
      return "skipped";
    }

    const documents = ctx.converter.convert(loaded.result, {
      meta: options.meta,
      source: filePath,
      validLanguages: options.validLanguages,
    });

    if (ctx.config.saveJson) {
      await writeAnalyzeResultFile(analysisSidecarPath(filePath), loaded.result);
    }

    await ctx.sink.publishDocuments({
      sourceId,
      sourcePath: filePath,
      documents: documents.map(serializeDocument),
    });

    const record: ConversionRecord = {
      sourceId,
      sourcePath: filePath,
      sha256,
      status: "converted_ok",
      documentCount: documents.length,
      tableCount: documents.filter((document) => document.contentType === "table").length,
      runId: ctx.runId,
      convertedAt: new Date().toISOString(),
    };
    await ctx.store.markConversionResult(record);
    await ctx.sink.publishConversionResult([record]);

    const durationMs = stopTimer();
    ctx.metrics.incrementCounter("files_converted", 1);
    ctx.logger.info("convert_file_ok", {
      sourceId,
      sourcePath: filePath,
      durationMs,
      documentCount: record.documentCount,
      tableCount: record.tableCount,
    });
    return "converted_ok";
  } catch (error) {
    const durationMs = stopTimer();
    const message = errorMessage(error);
    const record: ConversionRecord = {
      sourceId,
      sourcePath: filePath,
      sha256,
      status: "converted_failed",
      documentCount: 0,
      tableCount: 0,
      error: message,
      runId: ctx.runId,
      convertedAt: new Date().toISOString(),
    };
    await ctx.store.markConversionResult(record);
    await ctx.sink.publishConversionResult([record]);

    ctx.metrics.incrementCounter("files_failed", 1);
    ctx.logger.error("convert_file_failed", {
      sourceId,
      sourcePath: filePath,
      durationMs,
      code: error instanceof ConversionError ? error.code : undefined,
      error: message,
    });
    return "converted_failed";
  }
}

export async function runConvert(
  ctx: CommandContext,
  paths: string[],
  options: ConvertCommandOptions = {},
): Promise<ConvertSummary> {
  await ctx.store.startRun(ctx.runId, new Date().toISOString());
  const summary: ConvertSummary = { processed: 0, ok: 0, failed: 0, skipped: 0 };

  try {
    const files = await collectAnalysisFiles(paths);
    ctx.logger.info("convert_start", { fileCount: files.length, force: Boolean(options.force) });

    for (const filePath of files) {
      const outcome = await convertFile(ctx, filePath, options);
      summary.processed += 1;
      if (outcome === "converted_ok") {
        summary.ok += 1;
      } else if (outcome === "skipped") {
        summary.skipped += 1;
      } else {
        summary.failed += 1;
      }
    }
  } catch (error) {
    await ctx.store.finishRun(ctx.runId, "failed", new Date().toISOString());
    throw error;
  }

  await ctx.store.finishRun(ctx.runId, summary.failed > 0 ? "failed" : "completed", new Date().toISOString());
  ctx.logger.info("convert_complete", { ...summary });
  return summary;
}

export async function runStatus(ctx: Pick<CommandContext, "store" | "logger">): Promise<StoreStats> {
  ctx.logger.info("status_start");
  const stats = await ctx.store.getStats();
  ctx.logger.info("status_complete", { stats });
  return stats;
}
