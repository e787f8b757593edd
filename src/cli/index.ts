import { loadConfig } from "../config";
import { LayoutConverter } from "../convert";
import { runConvert, runStatus } from "../core/commands";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { createSink } from "../sink";
import { createStore } from "../store";
import { MetaRecord } from "../types";

export type CommandName = "convert" | "status";

export interface ParsedCliArgs {
  command: CommandName;
  paths: string[];
  force: boolean;
  meta: MetaRecord;
  validLanguages?: string[];
  configPath?: string;
}

const HELP_TEXT = `
Usage:
  layout-converter <command> [options]

Commands:
  convert <path...>  Convert analysis JSON files (or directories of them) into documents
  status             Show conversion statistics from the state store

Options:
  --config <path>            Optional path to JSON config file
  --force                    Convert files even when an unchanged copy was already converted
  --meta <key=value>         Metadata attached to every document (repeatable)
  --valid-languages <codes>  Comma-separated ISO 639-1 codes the text is expected in
  -h, --help                 Show this help
`;

const OPTIONS_WITH_VALUE = new Set(["--config", "--meta", "--valid-languages"]);

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "convert" || raw === "status") {
    return raw;
  }
  return undefined;
}

function parseMetaPair(raw: string): [string, string] | undefined {
  const separator = raw.indexOf("=");
  if (separator <= 0) {
    return undefined;
  }
  return [raw.slice(0, separator), raw.slice(separator + 1)];
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const paths: string[] = [];
  const meta: MetaRecord = {};
  let configPath: string | undefined;
  let validLanguages: string[] | undefined;
  let force = false;

  for (let index = 1; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === "--force") {
      force = true;
      continue;
    }
    if (!OPTIONS_WITH_VALUE.has(arg)) {
      paths.push(arg);
      continue;
    }

    const value = argv[index + 1];
    index += 1;
    if (value === undefined) {
      continue;
    }
    if (arg === "--config") {
      configPath = value;
    } else if (arg === "--meta") {
      const pair = parseMetaPair(value);
      if (pair) {
        meta[pair[0]] = pair[1];
      }
    } else {
      validLanguages = value
        .split(",")
        .map((code) => code.trim())
        .filter((code) => code.length > 0);
    }
  }

  if (command === "convert" && paths.length === 0) {
    return "help";
  }

  return { command, paths, force, meta, validLanguages, configPath };
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const config = loadConfig(parsed.configPath);
  const runId = createRunId();
  const store = createStore(config);
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId, minLevel: config.logLevel });

  logger.info("command_start", {
    command: parsed.command,
    paths: parsed.paths,
    force: parsed.force,
  });

  try {
    switch (parsed.command) {
      case "convert": {
        const sink = createSink(config, runId);
        const converterLogger = logger.child("converter");
        const converter = new LayoutConverter(config.converter, { logger: converterLogger, metrics });
        const summary = await runConvert(
          { runId, config, store, sink, metrics, converter, logger: logger.child("convert") },
          parsed.paths,
          { force: parsed.force, meta: parsed.meta, validLanguages: parsed.validLanguages },
        );
        logger.info("command_complete", { command: parsed.command });
        return summary.failed > 0 ? 1 : 0;
      }
      case "status":
        await runStatus({ store, logger: logger.child("status") });
        logger.info("command_complete", { command: parsed.command });
        return 0;
    }
  } finally {
    await store.close();
    metrics.printSummary();
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
