import { sameInstant } from "../core/time";
import { JobHeader, StoredHeaderEntry, SyncWorkItem } from "../types";

type Timestamped = Pick<StoredHeaderEntry, "jobId" | "modifiedUtc">;

function indexByJobId(entries: readonly Timestamped[]): Map<string, Date | null> {
  const index = new Map<string, Date | null>();
  for (const entry of entries) {
    index.set(entry.jobId, entry.modifiedUtc);
  }
  return index;
}

export function missingJobIds(remote: readonly Timestamped[], stored: readonly Timestamped[]): Set<string> {
  const storedIndex = indexByJobId(stored);
  const missing = new Set<string>();
  for (const entry of remote) {
    if (!storedIndex.has(entry.jobId)) {
      missing.add(entry.jobId);
    }
  }
  return missing;
}

export function changedJobIds(remote: readonly Timestamped[], stored: readonly Timestamped[]): Set<string> {
  const storedIndex = indexByJobId(stored);
  const changed = new Set<string>();
  for (const entry of remote) {
    if (!storedIndex.has(entry.jobId)) {
      continue;
    }
    const storedModified = storedIndex.get(entry.jobId) ?? null;
    if (!sameInstant(entry.modifiedUtc, storedModified)) {
      changed.add(entry.jobId);
    }
  }
  return changed;
}

export function computeWork(remote: readonly Timestamped[], stored: readonly Timestamped[]): Set<string> {
  const work = missingJobIds(remote, stored);
  for (const jobId of changedJobIds(remote, stored)) {
    work.add(jobId);
  }
  return work;
}

export function selectWorkItems(remote: readonly JobHeader[], work: ReadonlySet<string>, limit?: number): SyncWorkItem[] {
  const items: SyncWorkItem[] = [];
  const seen = new Set<string>();
  for (const header of remote) {
    if (limit !== undefined && items.length >= limit) {
      break;
    }
    if (!work.has(header.jobId) || seen.has(header.jobId)) {
      continue;
    }
    seen.add(header.jobId);
    items.push({ jobId: header.jobId, header });
  }
  return items;
}
