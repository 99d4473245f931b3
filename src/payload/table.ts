import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { MalformedPayloadError, MissingColumnError, errorMessage } from "../core/errors";
import { JOB_TIME_LABEL, isWireJobTime } from "./jobTime";
import { normalizeLabel } from "./labels";

export type Cell = readonly [label: string, value: string];
export type Row = readonly Cell[];

export interface PayloadTable {
  labels: string[];
  unitsRow: Row | null;
  dataRows: Row[];
}

// Row 2 carries the units unless its job time cell already holds a timestamp.
function isUnitsRecord(labels: readonly string[], record: readonly string[]): boolean {
  const timeIndex = labels.findIndex((label) => normalizeLabel(label) === JOB_TIME_LABEL);
  if (timeIndex < 0) {
    return true;
  }
  return !isWireJobTime(record[timeIndex] ?? "");
}

function toRow(labels: readonly string[], record: readonly string[]): Row {
  return labels.map((label, index): Cell => [label, record[index] ?? ""]);
}

function parseRecords(rawText: string): string[][] {
  try {
    const records: unknown = parse(rawText, {
      bom: true,
      relax_column_count: true,
      skip_empty_lines: true,
    });
    if (!Array.isArray(records) || !records.every((record) => Array.isArray(record))) {
      throw new MalformedPayloadError("expected CSV records");
    }
    return records.map((record: unknown[]) => record.map((value) => String(value)));
  } catch (error) {
    if (error instanceof MalformedPayloadError) {
      throw error;
    }
    throw new MalformedPayloadError(errorMessage(error));
  }
}

export function parsePayloadTable(rawText: string): PayloadTable {
  const [labels = [], ...records] = parseRecords(rawText);
  const [first, ...rest] = records;
  if (first !== undefined && isUnitsRecord(labels, first)) {
    return { labels, unitsRow: toRow(labels, first), dataRows: rest.map((record) => toRow(labels, record)) };
  }
  return { labels, unitsRow: null, dataRows: records.map((record) => toRow(labels, record)) };
}

export function relabelRow(row: Row, rename: (label: string) => string): Row {
  return row.map(([label, value]): Cell => [rename(label), value]);
}

export function mapColumn(row: Row, target: string, transform: (value: string) => string): Row {
  return row.map(([label, value]): Cell => (label === target ? [label, transform(value)] : [label, value]));
}

export function mapValues(row: Row, transform: (value: string) => string): Row {
  return row.map(([label, value]): Cell => [label, transform(value)]);
}

export function requireColumn(labels: readonly string[], column: string): void {
  if (!labels.includes(column)) {
    throw new MissingColumnError(column, [...labels]);
  }
}

export function rowsToCsv(labels: readonly string[], rows: readonly Row[]): string {
  return stringify([[...labels], ...rows.map((row) => row.map(([, value]) => value))]);
}
