import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { parseLogLevel } from "../observability/logger";
import { AppConfig, ConfigOverrides, SinkType } from "./types";

const ConfigOverridesSchema = z
  .object({
    apiBaseUrl: z.string().url(),
    headersEndpoint: z.string().min(1),
    payloadEndpoint: z.string().min(1),
    apiKey: z.string(),
    apiKeyFile: z.string(),
    userAgent: z.string(),
    ignoreHttpsErrors: z.boolean(),
    requestTimeoutMs: z.number().int().positive(),
    maxAttempts: z.number().int(),
    defaultDelaySeconds: z.number(),
    pacingDelaySeconds: z.number().nonnegative(),
    storePath: z.string().min(1),
    tableName: z.string().min(1),
    outputDirs: z.object({ payloads: z.string(), manifests: z.string() }).partial(),
    artifacts: z.object({ raw: z.boolean(), formatted: z.boolean(), units: z.boolean() }).partial(),
    sinkType: z.enum(["local_jsonl", "none"]),
    logLevel: z.enum(["debug", "info", "warn", "error"]),
  })
  .partial()
  .strict();

const DEFAULT_CONFIG: AppConfig = {
  apiBaseUrl: "https://api.welldatalabs.com",
  headersEndpoint: "jobheaders",
  payloadEndpoint: "persecdata",
  apiKey: undefined,
  apiKeyFile: undefined,
  userAgent: "jobdata-sync/1.0",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 120_000,
  maxAttempts: 3,
  defaultDelaySeconds: 70,
  pacingDelaySeconds: 70,
  storePath: "data/job-headers.sqlite",
  tableName: "job_headers",
  outputDirs: {
    payloads: "data/persec",
    manifests: "data/manifests",
  },
  artifacts: {
    raw: true,
    formatted: true,
    units: true,
  },
  sinkType: "local_jsonl",
  logLevel: "info",
};

type Env = Record<string, string | undefined>;

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const result = ConfigOverridesSchema.safeParse(JSON.parse(raw));
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new Error(`Invalid config file ${absolutePath}: ${issues.join("; ")}`);
  }
  return result.data;
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

function toSinkType(value: string | undefined, fallback: SinkType): SinkType {
  const normalized = value?.trim().toLowerCase();
  return normalized === "local_jsonl" || normalized === "none" ? normalized : fallback;
}

export function loadConfig(configPath?: string, env: Env = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    outputDirs: {
      ...DEFAULT_CONFIG.outputDirs,
      ...(fileConfig.outputDirs ?? {}),
    },
    artifacts: {
      ...DEFAULT_CONFIG.artifacts,
      ...(fileConfig.artifacts ?? {}),
    },
  };

  return {
    ...merged,
    apiBaseUrl: env.API_BASE_URL ?? merged.apiBaseUrl,
    headersEndpoint: env.HEADERS_ENDPOINT ?? merged.headersEndpoint,
    payloadEndpoint: env.PAYLOAD_ENDPOINT ?? merged.payloadEndpoint,
    apiKey: env.API_KEY ?? merged.apiKey,
    apiKeyFile: env.API_KEY_FILE ?? merged.apiKeyFile,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    maxAttempts: toInt(env.MAX_ATTEMPTS, merged.maxAttempts),
    defaultDelaySeconds: toInt(env.DEFAULT_DELAY_SECONDS, merged.defaultDelaySeconds),
    pacingDelaySeconds: toInt(env.PACING_DELAY_SECONDS, merged.pacingDelaySeconds),
    storePath: env.STORE_PATH ?? merged.storePath,
    tableName: env.STORE_TABLE ?? merged.tableName,
    outputDirs: {
      payloads: env.OUTPUT_PAYLOADS_DIR ?? merged.outputDirs.payloads,
      manifests: env.OUTPUT_MANIFESTS_DIR ?? merged.outputDirs.manifests,
    },
    artifacts: {
      raw: toBool(env.ARTIFACT_RAW, merged.artifacts.raw),
      formatted: toBool(env.ARTIFACT_FORMATTED, merged.artifacts.formatted),
      units: toBool(env.ARTIFACT_UNITS, merged.artifacts.units),
    },
    sinkType: toSinkType(env.SINK_TYPE, merged.sinkType),
    logLevel: parseLogLevel(env.LOG_LEVEL, merged.logLevel),
  };
}

export { DEFAULT_CONFIG };
