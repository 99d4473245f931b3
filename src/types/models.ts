export type AttributeValue = string | number | boolean | null | AttributeValue[] | { [key: string]: AttributeValue };

export interface JobHeader {
  jobId: string;
  modifiedUtc: Date | null;
  attributes: Record<string, AttributeValue>;
}

export interface StoredHeaderEntry {
  jobId: string;
  modifiedUtc: Date | null;
}

export interface SyncWorkItem {
  jobId: string;
  header: JobHeader;
}

export type ArtifactKind = "raw" | "formatted" | "units";

export type ArtifactOutcome =
  | { kind: ArtifactKind; status: "written"; location: string; bytes: number }
  | { kind: ArtifactKind; status: "skipped" }
  | { kind: ArtifactKind; status: "failed"; location: string; error: string; contractViolation: boolean };

export interface JobDownloadResult {
  jobId: string;
  url: string;
  status: "downloaded_ok" | "download_failed" | "payload_invalid";
  statusCode?: number;
  attempts: number;
  artifacts: ArtifactOutcome[];
  upsert?: "applied" | "not_applicable" | "delete_failed" | "insert_failed";
  error?: string;
  downloadedAt: string;
}
