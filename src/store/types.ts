import { StoredHeaderEntry } from "../types";

export interface StoreStats {
  totalEntries: number;
  nullModifiedEntries: number;
  newestModifiedUtc: string | null;
}

export interface HeaderStore {
  listEntries(): Promise<StoredHeaderEntry[]>;
  deleteEntry(jobId: string): Promise<void>;
  insertEntry(entry: StoredHeaderEntry): Promise<void>;
  getStats(): Promise<StoreStats>;
  close(): Promise<void>;
}
