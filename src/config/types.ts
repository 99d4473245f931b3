import type { LogLevel } from "../observability/types";

export interface OutputDirs {
  payloads: string;
  manifests: string;
}

export interface ArtifactToggles {
  raw: boolean;
  formatted: boolean;
  units: boolean;
}

export type SinkType = "local_jsonl" | "none";

export interface AppConfig {
  apiBaseUrl: string;
  headersEndpoint: string;
  payloadEndpoint: string;
  apiKey?: string;
  apiKeyFile?: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  maxAttempts: number;
  defaultDelaySeconds: number;
  pacingDelaySeconds: number;
  storePath: string;
  tableName: string;
  outputDirs: OutputDirs;
  artifacts: ArtifactToggles;
  sinkType: SinkType;
  logLevel: LogLevel;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "outputDirs" | "artifacts">> & {
  outputDirs?: Partial<OutputDirs>;
  artifacts?: Partial<ArtifactToggles>;
};
