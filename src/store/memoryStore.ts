import { StoredHeaderEntry } from "../types";
import { HeaderStore, StoreStats } from "./types";

export class InMemoryHeaderStore implements HeaderStore {
  private readonly entries = new Map<string, Date | null>();

  constructor(initial: readonly StoredHeaderEntry[] = []) {
    for (const entry of initial) {
      this.entries.set(entry.jobId, entry.modifiedUtc);
    }
  }

  async listEntries(): Promise<StoredHeaderEntry[]> {
    return [...this.entries].map(([jobId, modifiedUtc]) => ({ jobId, modifiedUtc }));
  }

  async deleteEntry(jobId: string): Promise<void> {
    this.entries.delete(jobId);
  }

  async insertEntry(entry: StoredHeaderEntry): Promise<void> {
    if (this.entries.has(entry.jobId)) {
      throw new Error(`Entry already exists for job ${entry.jobId}`);
    }
    this.entries.set(entry.jobId, entry.modifiedUtc);
  }

  async getStats(): Promise<StoreStats> {
    let newest: Date | null = null;
    let nullModifiedEntries = 0;
    for (const modified of this.entries.values()) {
      if (modified === null) {
        nullModifiedEntries += 1;
      } else if (newest === null || modified.getTime() > newest.getTime()) {
        newest = modified;
      }
    }
    return {
      totalEntries: this.entries.size,
      nullModifiedEntries,
      newestModifiedUtc: newest ? newest.toISOString() : null,
    };
  }

  async close(): Promise<void> {
    return;
  }
}
