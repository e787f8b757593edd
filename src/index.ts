export * from "./analysis";
export * from "./config";
export * from "./convert";
export { collectAnalysisFiles, runConvert, runStatus, sourceIdFor } from "./core/commands";
export type { CommandContext, ConvertCommandOptions, ConvertSummary } from "./core/commands";
export * from "./observability";
export * from "./sink";
export * from "./store";
export * from "./types";
