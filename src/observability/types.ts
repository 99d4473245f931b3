export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  jobId?: string;
  url?: string;
  attempt?: number;
  statusCode?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "headers_fetched"
  | "jobs_queued"
  | "downloads_ok"
  | "downloads_failed"
  | "fetch_retries"
  | "artifacts_written"
  | "artifacts_failed"
  | "artifacts_skipped"
  | "upserts_applied"
  | "upserts_failed";

export type MetricTimerName = "header_fetch_ms" | "payload_fetch_ms";
