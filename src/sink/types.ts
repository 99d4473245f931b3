import { JobDownloadResult } from "../types";

export interface Sink {
  publishDownloadResult(results: JobDownloadResult[]): Promise<void>;
}
