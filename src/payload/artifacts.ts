import fs from "node:fs";
import path from "node:path";
import { ContractViolationError, errorMessage } from "../core/errors";
import type { Logger } from "../observability";
import type { ArtifactKind, ArtifactOutcome } from "../types";
import { JOB_TIME_LABEL, retypeJobTime } from "./jobTime";
import { normalizeLabel, stripUnitParentheses } from "./labels";
import { PayloadTable, mapColumn, mapValues, parsePayloadTable, relabelRow, requireColumn, rowsToCsv } from "./table";

export type ArtifactTarget = { kind: "file"; path: string } | { kind: "skip" };

export const SKIP_ARTIFACT: ArtifactTarget = { kind: "skip" };

export function fileTarget(location: string): ArtifactTarget {
  return { kind: "file", path: location };
}

export type ArtifactTargets = Record<ArtifactKind, ArtifactTarget>;

export type ArtifactWriter = (location: string, content: string) => Promise<void>;

export async function writeFileAtomic(location: string, content: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(location), { recursive: true });
  const tempPath = `${location}.part`;
  try {
    await fs.promises.writeFile(tempPath, content, "utf-8");
    await fs.promises.rename(tempPath, location);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw error;
  }
}

export function renderFormatted(table: PayloadTable): string {
  const labels = table.labels.map(normalizeLabel);
  requireColumn(labels, JOB_TIME_LABEL);
  const rows = table.dataRows.map((row) => mapColumn(relabelRow(row, normalizeLabel), JOB_TIME_LABEL, retypeJobTime));
  return rowsToCsv(labels, rows);
}

export function renderUnits(table: PayloadTable): string {
  if (!table.unitsRow) {
    throw new Error("payload has no units row");
  }
  const labels = table.labels.map(normalizeLabel);
  const units = mapValues(relabelRow(table.unitsRow, normalizeLabel), stripUnitParentheses);
  return rowsToCsv(labels, [units]);
}

export interface DeriveDeps {
  writer?: ArtifactWriter;
  logger?: Logger;
  jobId?: string;
}

const ARTIFACT_ORDER: readonly ArtifactKind[] = ["raw", "formatted", "units"];

export async function deriveArtifacts(
  rawText: string,
  targets: ArtifactTargets,
  deps: DeriveDeps = {},
): Promise<ArtifactOutcome[]> {
  const writer = deps.writer ?? writeFileAtomic;
  let table: PayloadTable | undefined;
  const getTable = (): PayloadTable => {
    table ??= parsePayloadTable(rawText);
    return table;
  };

  const render: Record<ArtifactKind, () => string> = {
    raw: () => rawText,
    formatted: () => renderFormatted(getTable()),
    units: () => renderUnits(getTable()),
  };

  const outcomes: ArtifactOutcome[] = [];
  for (const kind of ARTIFACT_ORDER) {
    const target = targets[kind];
    if (target.kind === "skip") {
      outcomes.push({ kind, status: "skipped" });
      continue;
    }

    try {
      const content = render[kind]();
      await writer(target.path, content);
      outcomes.push({ kind, status: "written", location: target.path, bytes: Buffer.byteLength(content, "utf-8") });
      deps.logger?.debug("artifact_written", { jobId: deps.jobId, artifact: kind, location: target.path });
    } catch (error) {
      const contractViolation = error instanceof ContractViolationError;
      outcomes.push({ kind, status: "failed", location: target.path, error: errorMessage(error), contractViolation });
      deps.logger?.[contractViolation ? "error" : "warn"]("artifact_failed", {
        jobId: deps.jobId,
        artifact: kind,
        location: target.path,
        contractViolation,
        error: errorMessage(error),
      });
    }
  }
  return outcomes;
}
