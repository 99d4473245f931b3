import { JobDownloadResult } from "../types";
import { Sink } from "./types";

export class NoopSink implements Sink {
  async publishDownloadResult(_results: JobDownloadResult[]): Promise<void> {
    return;
  }
}
