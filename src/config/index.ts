export * from "./apiKey";
export * from "./loadConfig";
export * from "./types";
