import path from "node:path";
import type { ArtifactToggles } from "../config";
import { ArtifactTargets, SKIP_ARTIFACT, fileTarget } from "./artifacts";

function safeFileComponent(jobId: string): string {
  return jobId.replace(/[^A-Za-z0-9._-]/g, "_");
}

export function rawArtifactFilename(jobId: string): string {
  return `original_${safeFileComponent(jobId)}.csv`;
}

export function formattedArtifactFilename(jobId: string): string {
  return `formatted_${safeFileComponent(jobId)}.csv`;
}

export function unitsArtifactFilename(jobId: string): string {
  return `units_${safeFileComponent(jobId)}.csv`;
}

export function artifactTargetsFor(jobId: string, baseDir: string, enabled: ArtifactToggles): ArtifactTargets {
  const root = path.resolve(baseDir);
  return {
    raw: enabled.raw ? fileTarget(path.join(root, rawArtifactFilename(jobId))) : SKIP_ARTIFACT,
    formatted: enabled.formatted ? fileTarget(path.join(root, formattedArtifactFilename(jobId))) : SKIP_ARTIFACT,
    units: enabled.units ? fileTarget(path.join(root, unitsArtifactFilename(jobId))) : SKIP_ARTIFACT,
  };
}
