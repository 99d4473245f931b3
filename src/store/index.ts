import type { AppConfig } from "../config";
import { HeaderStore } from "./types";
import { SqliteHeaderStore } from "./sqliteStore";

export function createStore(config: Pick<AppConfig, "storePath" | "tableName">): HeaderStore {
  return new SqliteHeaderStore(config.storePath, config.tableName);
}

export * from "./memoryStore";
export * from "./sqliteStore";
export * from "./types";
