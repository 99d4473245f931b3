import { errorMessage } from "../core/errors";
import type { Logger } from "../observability";
import type { HeaderStore } from "../store";
import { JobHeader, StoredHeaderEntry } from "../types";

export type UpsertResult =
  | { status: "applied"; entry: StoredHeaderEntry }
  | { status: "not_applicable"; jobId: string }
  | { status: "delete_failed"; jobId: string; error: string }
  | { status: "insert_failed"; jobId: string; error: string };

// The delete commits in its own transaction and the insert runs after it. If the
// insert fails or the process dies in between, the job has no stored entry and the
// next cycle downloads it again.
export async function upsertJobHeader(
  store: HeaderStore,
  candidates: readonly JobHeader[],
  jobId: string,
  logger?: Logger,
): Promise<UpsertResult> {
  const candidate = candidates.find((header) => header.jobId === jobId);
  if (!candidate) {
    logger?.warn("upsert_not_applicable", { jobId });
    return { status: "not_applicable", jobId };
  }

  const entry: StoredHeaderEntry = { jobId, modifiedUtc: candidate.modifiedUtc };

  try {
    await store.deleteEntry(jobId);
  } catch (error) {
    logger?.error("upsert_delete_failed", { jobId, error: errorMessage(error) });
    return { status: "delete_failed", jobId, error: errorMessage(error) };
  }

  try {
    await store.insertEntry(entry);
  } catch (error) {
    logger?.error("upsert_insert_failed", { jobId, error: errorMessage(error) });
    return { status: "insert_failed", jobId, error: errorMessage(error) };
  }

  logger?.debug("upsert_applied", { jobId, modifiedUtc: entry.modifiedUtc?.toISOString() ?? null });
  return { status: "applied", entry };
}
