import fs from "node:fs";
import path from "node:path";
import { AppConfig } from "./types";

export function readApiKeyFromFile(filePath: string): string {
  const absolutePath = path.resolve(filePath);
  let content: string;
  try {
    content = fs.readFileSync(absolutePath, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Unable to read API key file ${absolutePath}: ${reason}`);
  }

  const firstLine = content.split(/\r?\n/, 1)[0] ?? "";
  return firstLine.trim();
}

export function resolveApiKey(config: Pick<AppConfig, "apiKey" | "apiKeyFile">): string {
  if (config.apiKey && config.apiKey.trim() !== "") {
    return config.apiKey.trim();
  }

  if (config.apiKeyFile) {
    const key = readApiKeyFromFile(config.apiKeyFile);
    if (key === "") {
      throw new Error(`API key file is empty: ${path.resolve(config.apiKeyFile)}`);
    }
    return key;
  }

  throw new Error("No API key configured: set API_KEY, API_KEY_FILE or --api-key-file");
}

export function bearerHeaders(apiKey: string): Record<string, string> {
  return { authorization: `Bearer ${apiKey}` };
}
