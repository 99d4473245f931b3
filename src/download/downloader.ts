import type { AppConfig } from "../config";
import { bearerHeaders } from "../config/apiKey";
import { joinUrl } from "../core/fetch";
import { CATEGORY_HINTS, FetchPolicy, Sleeper, Transport, executeFetch, sleep as defaultSleep } from "../fetch";
import { Logger, MetricsRegistry } from "../observability";
import { ArtifactWriter, artifactTargetsFor, deriveArtifacts } from "../payload";
import { Sink } from "../sink";
import { HeaderStore } from "../store";
import { upsertJobHeader } from "../sync/upsert";
import { JobDownloadResult, JobHeader, SyncWorkItem } from "../types";

export interface DownloaderDeps {
  config: Pick<AppConfig, "apiBaseUrl" | "payloadEndpoint" | "outputDirs" | "artifacts" | "pacingDelaySeconds">;
  policy: FetchPolicy;
  apiKey: string;
  transport: Transport;
  logger: Logger;
  metrics: MetricsRegistry;
  store: HeaderStore;
  sink: Sink;
  candidates: readonly JobHeader[];
  sleep?: Sleeper;
  writer?: ArtifactWriter;
}

export interface DownloadSummary {
  processed: number;
  ok: number;
  failed: number;
  upserted: number;
}

export function payloadUrl(config: Pick<AppConfig, "apiBaseUrl" | "payloadEndpoint">, jobId: string): string {
  return joinUrl(config.apiBaseUrl, config.payloadEndpoint, jobId);
}

export async function downloadJob(item: SyncWorkItem, deps: DownloaderDeps): Promise<JobDownloadResult> {
  const { config, logger, metrics } = deps;
  const url = payloadUrl(config, item.jobId);
  logger.info("download_item_start", { jobId: item.jobId, url });

  const outcome = await executeFetch(
    { url, headers: bearerHeaders(deps.apiKey), jobId: item.jobId },
    deps.policy,
    { transport: deps.transport, sleep: deps.sleep, logger, metrics, timer: "payload_fetch_ms" },
  );

  if (outcome.status !== "success") {
    metrics.incrementCounter("downloads_failed");
    logger.warn("download_item_failed", {
      jobId: item.jobId,
      url,
      statusCode: outcome.statusCode,
      category: outcome.category,
      attempts: outcome.attempts,
    });
    return {
      jobId: item.jobId,
      url,
      status: "download_failed",
      statusCode: outcome.statusCode,
      attempts: outcome.attempts,
      artifacts: [],
      error: `${outcome.category}: ${CATEGORY_HINTS[outcome.category]}`,
      downloadedAt: new Date().toISOString(),
    };
  }

  const artifacts = await deriveArtifacts(
    outcome.body,
    artifactTargetsFor(item.jobId, config.outputDirs.payloads, config.artifacts),
    { writer: deps.writer, logger, jobId: item.jobId },
  );
  for (const artifact of artifacts) {
    if (artifact.status === "written") {
      metrics.incrementCounter("artifacts_written");
    } else if (artifact.status === "skipped") {
      metrics.incrementCounter("artifacts_skipped");
    } else {
      metrics.incrementCounter("artifacts_failed");
    }
  }

  const violation = artifacts.find((artifact) => artifact.status === "failed" && artifact.contractViolation);
  if (violation && violation.status === "failed") {
    metrics.incrementCounter("downloads_failed");
    logger.error("download_item_payload_invalid", { jobId: item.jobId, url, artifact: violation.kind, error: violation.error });
    return {
      jobId: item.jobId,
      url,
      status: "payload_invalid",
      statusCode: outcome.statusCode,
      attempts: outcome.attempts,
      artifacts,
      error: violation.error,
      downloadedAt: new Date().toISOString(),
    };
  }

  metrics.incrementCounter("downloads_ok");
  const upsert = await upsertJobHeader(deps.store, deps.candidates, item.jobId, logger);
  if (upsert.status === "applied") {
    metrics.incrementCounter("upserts_applied");
  } else if (upsert.status !== "not_applicable") {
    metrics.incrementCounter("upserts_failed");
  }
  logger.info("download_item_ok", { jobId: item.jobId, url, attempts: outcome.attempts, upsert: upsert.status });

  return {
    jobId: item.jobId,
    url,
    status: "downloaded_ok",
    statusCode: outcome.statusCode,
    attempts: outcome.attempts,
    artifacts,
    upsert: upsert.status,
    downloadedAt: new Date().toISOString(),
  };
}

export async function runDownloader(items: readonly SyncWorkItem[], deps: DownloaderDeps): Promise<DownloadSummary> {
  const wait = deps.sleep ?? defaultSleep;
  const pacingMs = Math.max(0, deps.config.pacingDelaySeconds) * 1000;
  const summary: DownloadSummary = { processed: 0, ok: 0, failed: 0, upserted: 0 };

  for (const [index, item] of items.entries()) {
    if (index > 0) {
      deps.logger.debug("download_pacing_wait", { jobId: item.jobId, delayMs: pacingMs });
      await wait(pacingMs);
    }

    const result = await downloadJob(item, deps);
    await deps.sink.publishDownloadResult([result]);

    summary.processed += 1;
    if (result.status === "downloaded_ok") {
      summary.ok += 1;
    } else {
      summary.failed += 1;
    }
    if (result.upsert === "applied") {
      summary.upserted += 1;
    }
  }

  return summary;
}
