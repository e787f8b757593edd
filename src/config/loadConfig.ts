import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ID_HASH_KEYS } from "../convert/documents";
import { ConfigError, errorMessage } from "../convert/errors";
import { DEFAULT_CONVERTER_OPTIONS } from "../convert/options";
import { AppConfig, ConfigOverrides } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  converter: DEFAULT_CONVERTER_OPTIONS,
  saveJson: false,
  logLevel: "info",
  outputDirs: {
    documents: "data/documents",
    manifests: "data/manifests",
  },
  storePath: "data/state.sqlite",
};

const converterSchema = z.object({
  precedingContextLen: z.number().int().min(0),
  followingContextLen: z.number().int().min(0),
  mergeMultipleColumnHeaders: z.boolean(),
  addPageNumber: z.boolean(),
  validLanguages: z.array(z.string().regex(/^[a-z]{2}$/, "expected an ISO 639-1 code")).optional(),
  idHashKeys: z.array(z.enum(ID_HASH_KEYS)).min(1),
  zeroSpanPolicy: z.enum(["drop", "one"]),
});

const outputDirsSchema = z.object({
  documents: z.string().min(1),
  manifests: z.string().min(1),
});

const appConfigSchema = z.object({
  converter: converterSchema,
  saveJson: z.boolean(),
  logLevel: z.enum(["debug", "info", "warn", "error"]),
  outputDirs: outputDirsSchema,
  storePath: z.string().min(1),
}) satisfies z.ZodType<AppConfig>;

const configOverridesSchema = appConfigSchema
  .omit({ converter: true, outputDirs: true })
  .partial()
  .extend({
    converter: converterSchema.partial().optional(),
    outputDirs: outputDirsSchema.partial().optional(),
  }) satisfies z.ZodType<ConfigOverrides>;

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");
}

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(absolutePath, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Config file ${absolutePath} is not valid JSON: ${errorMessage(error)}`);
  }

  const parsed = configOverridesSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${absolutePath}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toList(value: string | undefined): string[] | undefined {
  if (!value) {
    return undefined;
  }
  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);
  const converter = { ...DEFAULT_CONFIG.converter, ...(fileConfig.converter ?? {}) };
  const outputDirs = { ...DEFAULT_CONFIG.outputDirs, ...(fileConfig.outputDirs ?? {}) };

  const candidate = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    converter: {
      precedingContextLen: toInt(env.PRECEDING_CONTEXT_LEN, converter.precedingContextLen),
      followingContextLen: toInt(env.FOLLOWING_CONTEXT_LEN, converter.followingContextLen),
      mergeMultipleColumnHeaders: toBool(env.MERGE_MULTIPLE_COLUMN_HEADERS, converter.mergeMultipleColumnHeaders),
      addPageNumber: toBool(env.ADD_PAGE_NUMBER, converter.addPageNumber),
      validLanguages: toList(env.VALID_LANGUAGES) ?? converter.validLanguages,
      idHashKeys: toList(env.ID_HASH_KEYS) ?? converter.idHashKeys,
      zeroSpanPolicy: env.ZERO_SPAN_POLICY ?? converter.zeroSpanPolicy,
    },
    saveJson: toBool(env.SAVE_JSON, fileConfig.saveJson ?? DEFAULT_CONFIG.saveJson),
    logLevel: env.LOG_LEVEL ?? fileConfig.logLevel ?? DEFAULT_CONFIG.logLevel,
    storePath: env.STORE_PATH ?? fileConfig.storePath ?? DEFAULT_CONFIG.storePath,
    outputDirs: {
      documents: env.OUTPUT_DOCUMENTS_DIR ?? outputDirs.documents,
      manifests: env.OUTPUT_MANIFESTS_DIR ?? outputDirs.manifests,
    },
  };

  const parsed = appConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export { DEFAULT_CONFIG };
