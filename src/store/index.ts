import { AppConfig } from "../config";
import { SqliteStore } from "./sqliteStore";
import { ConversionStore } from "./types";

export function createStore(config: AppConfig): ConversionStore {
  return new SqliteStore(config.storePath);
}

export { InMemoryStore } from "./memoryStore";
export { SqliteStore } from "./sqliteStore";
export * from "./types";
