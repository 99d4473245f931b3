import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { ContractViolationError } from "../core/errors";
import { parseUtcTimestamp, toIsoOrNull } from "../core/time";
import { StoredHeaderEntry } from "../types";
import { HeaderStore, StoreStats } from "./types";

type EntryRow = {
  job_id: string;
  modified_utc: string | null;
};

type StatsRow = {
  total: number;
  nullModified: number | null;
  newest: string | null;
};

const IN_MEMORY = ":memory:";
const REQUIRED_COLUMNS = ["job_id", "modified_utc"];

export function assertTableName(tableName: string): void {
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(tableName)) {
    throw new ContractViolationError(`Invalid table name: ${tableName}`);
  }
}

export class SqliteHeaderStore implements HeaderStore {
  private readonly db: Database.Database;
  private readonly table: string;

  constructor(dbPath: string, tableName = "job_headers") {
    assertTableName(tableName);
    this.table = tableName;
    if (dbPath === IN_MEMORY) {
      this.db = new Database(IN_MEMORY);
    } else {
      const absolutePath = path.resolve(dbPath);
      fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
      this.db = new Database(absolutePath);
      this.db.pragma("journal_mode = WAL");
    }
    this.initializeSchema();
  }

  async listEntries(): Promise<StoredHeaderEntry[]> {
    const rows = this.db.prepare<[], EntryRow>(`SELECT job_id, modified_utc FROM ${this.table}`).all();
    return rows.map((row) => ({
      jobId: row.job_id,
      modifiedUtc: parseUtcTimestamp(row.modified_utc),
    }));
  }

  async deleteEntry(jobId: string): Promise<void> {
    const statement = this.db.prepare<[string]>(`DELETE FROM ${this.table} WHERE job_id = ?`);
    const tx = this.db.transaction((id: string) => {
      statement.run(id);
    });
    tx(jobId);
  }

  async insertEntry(entry: StoredHeaderEntry): Promise<void> {
    this.db
      .prepare<{ jobId: string; modifiedUtc: string | null }>(
        `INSERT INTO ${this.table} (job_id, modified_utc) VALUES (@jobId, @modifiedUtc)`,
      )
      .run({
        jobId: entry.jobId,
        modifiedUtc: toIsoOrNull(entry.modifiedUtc),
      });
  }

  async getStats(): Promise<StoreStats> {
    const row = this.db
      .prepare<[], StatsRow>(
        `
        SELECT
          COUNT(*) AS total,
          SUM(CASE WHEN modified_utc IS NULL THEN 1 ELSE 0 END) AS nullModified,
          MAX(modified_utc) AS newest
        FROM ${this.table}
      `,
      )
      .get();

    return {
      totalEntries: row?.total ?? 0,
      nullModifiedEntries: row?.nullModified ?? 0,
      newestModifiedUtc: row?.newest ?? null,
    };
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ${this.table} (
        job_id TEXT PRIMARY KEY,
        modified_utc TEXT NULL
      )
    `);

    const columns = this.db
      .prepare<[], { name: string }>(`PRAGMA table_info(${this.table})`)
      .all()
      .map((column) => column.name)
      .sort();
    if (columns.join(",") !== REQUIRED_COLUMNS.join(",")) {
      throw new ContractViolationError(
        `Table ${this.table} must have exactly the columns ${REQUIRED_COLUMNS.join(", ")}; found ${columns.join(", ")}`,
      );
    }
  }
}
