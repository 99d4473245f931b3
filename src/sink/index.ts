import type { AppConfig } from "../config";
import { LocalJsonlSink } from "./localJsonlSink";
import { NoopSink } from "./noopSink";
import { Sink } from "./types";

export function createSink(config: Pick<AppConfig, "sinkType" | "outputDirs">, runId: string): Sink {
  switch (config.sinkType) {
    case "local_jsonl":
      return new LocalJsonlSink(config, runId);
    case "none":
      return new NoopSink();
  }
}

export { LocalJsonlSink } from "./localJsonlSink";
export { NoopSink } from "./noopSink";
export * from "./types";
