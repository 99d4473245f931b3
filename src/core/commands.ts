import { AppConfig, resolveApiKey } from "../config";
import { runDownloader, DownloadSummary } from "../download/downloader";
import { FetchOutcome, FetchPolicy, Sleeper, Transport } from "../fetch";
import { computeWork, fetchJobHeaders, selectWorkItems } from "../headers";
import { Logger, MetricsRegistry } from "../observability";
import { ArtifactWriter } from "../payload";
import { Sink } from "../sink";
import { HeaderStore, StoreStats } from "../store";
import { JobHeader, SyncWorkItem } from "../types";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  store: HeaderStore;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: Sink;
  transport: Transport;
  sleep?: Sleeper;
  writer?: ArtifactWriter;
}

export type SyncPlan =
  | { status: "ok"; headers: JobHeader[]; work: SyncWorkItem[]; apiKey: string }
  | { status: "failed"; outcome: FetchOutcome };

export type SyncSummary =
  | ({ status: "completed"; queued: number } & DownloadSummary)
  | { status: "headers_failed"; outcome: FetchOutcome };

export function fetchPolicyFromConfig(config: Pick<AppConfig, "maxAttempts" | "defaultDelaySeconds">): FetchPolicy {
  return { maxAttempts: config.maxAttempts, defaultDelaySeconds: config.defaultDelaySeconds };
}

type RemoteHeaders =
  | { status: "ok"; headers: JobHeader[]; apiKey: string }
  | { status: "failed"; outcome: FetchOutcome };

async function loadRemoteHeaders(ctx: CommandContext): Promise<RemoteHeaders> {
  const apiKey = resolveApiKey(ctx.config);
  const fetched = await fetchJobHeaders({
    config: ctx.config,
    policy: fetchPolicyFromConfig(ctx.config),
    apiKey,
    transport: ctx.transport,
    logger: ctx.logger,
    metrics: ctx.metrics,
    sleep: ctx.sleep,
  });
  if (fetched.status === "failed") {
    return { status: "failed", outcome: fetched.outcome };
  }
  return { status: "ok", headers: fetched.headers, apiKey };
}

export async function planSync(ctx: CommandContext, maxJobs?: number): Promise<SyncPlan> {
  const fetched = await loadRemoteHeaders(ctx);
  if (fetched.status === "failed") {
    return fetched;
  }

  const stored = await ctx.store.listEntries();
  const workSet = computeWork(fetched.headers, stored);
  const work = selectWorkItems(fetched.headers, workSet, maxJobs);
  ctx.metrics.incrementCounter("jobs_queued", work.length);
  ctx.logger.info("sync_plan_ready", {
    remote: fetched.headers.length,
    stored: stored.length,
    outOfSync: workSet.size,
    queued: work.length,
  });
  return { status: "ok", headers: fetched.headers, work, apiKey: fetched.apiKey };
}

export async function runSync(ctx: CommandContext, maxJobs?: number): Promise<SyncSummary> {
  ctx.logger.info("sync_start", { maxJobs });
  const plan = await planSync(ctx, maxJobs);
  if (plan.status === "failed") {
    ctx.logger.error("sync_aborted_headers_failed", { url: plan.outcome.url, status: plan.outcome.status });
    return { status: "headers_failed", outcome: plan.outcome };
  }

  const summary = await runDownloader(plan.work, {
    config: ctx.config,
    policy: fetchPolicyFromConfig(ctx.config),
    apiKey: plan.apiKey,
    transport: ctx.transport,
    logger: ctx.logger,
    metrics: ctx.metrics,
    store: ctx.store,
    sink: ctx.sink,
    candidates: plan.headers,
    sleep: ctx.sleep,
    writer: ctx.writer,
  });
  ctx.logger.info("sync_complete", { queued: plan.work.length, ...summary });
  return { status: "completed", queued: plan.work.length, ...summary };
}

export async function runPlan(ctx: CommandContext, maxJobs?: number): Promise<SyncPlan> {
  const plan = await planSync(ctx, maxJobs);
  if (plan.status === "ok") {
    for (const item of plan.work) {
      ctx.logger.info("sync_plan_item", {
        jobId: item.jobId,
        modifiedUtc: item.header.modifiedUtc?.toISOString() ?? null,
      });
    }
  }
  return plan;
}

export async function runDownloadOne(ctx: CommandContext, jobId: string): Promise<SyncSummary> {
  const plan = await loadRemoteHeaders(ctx);
  if (plan.status === "failed") {
    return { status: "headers_failed", outcome: plan.outcome };
  }

  const header = plan.headers.find((candidate) => candidate.jobId === jobId);
  const item: SyncWorkItem = {
    jobId,
    header: header ?? { jobId, modifiedUtc: null, attributes: {} },
  };
  if (!header) {
    ctx.logger.warn("download_job_not_in_headers", { jobId });
  }

  const summary = await runDownloader([item], {
    config: ctx.config,
    policy: fetchPolicyFromConfig(ctx.config),
    apiKey: plan.apiKey,
    transport: ctx.transport,
    logger: ctx.logger,
    metrics: ctx.metrics,
    store: ctx.store,
    sink: ctx.sink,
    candidates: plan.headers,
    sleep: ctx.sleep,
    writer: ctx.writer,
  });
  return { status: "completed", queued: 1, ...summary };
}

export async function runStatus(ctx: CommandContext): Promise<StoreStats> {
  const stats = await ctx.store.getStats();
  ctx.logger.info("status", { ...stats, storePath: ctx.config.storePath, table: ctx.config.tableName });
  return stats;
}
