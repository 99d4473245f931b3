import fs from "node:fs";
import path from "node:path";
import type { AppConfig } from "../config";
import { JobDownloadResult } from "../types";
import { Sink } from "./types";

export class LocalJsonlSink implements Sink {
  private readonly downloadsPath: string;
  private readonly runId: string;

  constructor(config: Pick<AppConfig, "outputDirs">, runId: string) {
    const manifestsDir = path.resolve(config.outputDirs.manifests);
    fs.mkdirSync(manifestsDir, { recursive: true });
    this.downloadsPath = path.join(manifestsDir, "downloads.jsonl");
    this.runId = runId;
  }

  async publishDownloadResult(results: JobDownloadResult[]): Promise<void> {
    await this.appendLines(
      this.downloadsPath,
      results.map((result) => ({
        runId: this.runId,
        ...result,
      })),
    );
  }

  private async appendLines(filePath: string, records: unknown[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    const content = records.map((record) => JSON.stringify(record)).join("\n") + "\n";
    await fs.promises.appendFile(filePath, content, "utf-8");
  }
}
