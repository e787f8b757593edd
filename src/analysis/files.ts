import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { errorMessage, InvalidAnalysisResultError } from "../convert/errors";
import { AnalyzeResult } from "../types";
import { parseAnalyzeResult, toPayload } from "./schema";

export const ANALYSIS_SUFFIX = ".analysis.json";

export interface LoadedAnalysis {
  result: AnalyzeResult;
  sha256: string;
  bytes: number;
}

export async function readAnalyzeResultFile(filePath: string): Promise<LoadedAnalysis> {
  const raw = await fs.promises.readFile(filePath);
  const sha256 = crypto.createHash("sha256").update(raw).digest("hex");

  let json: unknown;
  try {
    json = JSON.parse(raw.toString("utf-8"));
  } catch (error) {
    throw new InvalidAnalysisResultError(filePath, [`not valid JSON: ${errorMessage(error)}`]);
  }

  return { result: parseAnalyzeResult(json, filePath), sha256, bytes: raw.byteLength };
}

/** Path of the normalized analysis copy written next to a source file. */
export function analysisSidecarPath(sourcePath: string): string {
  const parsed = path.parse(sourcePath);
  return path.join(parsed.dir, `${parsed.name}${ANALYSIS_SUFFIX}`);
}

export async function writeAnalyzeResultFile(filePath: string, result: AnalyzeResult): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, JSON.stringify(toPayload(result), null, 2), "utf-8");
}
