import { z } from "zod";
import type { AppConfig } from "../config";
import { bearerHeaders } from "../config/apiKey";
import { HeaderShapeError } from "../core/errors";
import { joinUrl } from "../core/fetch";
import { parseUtcTimestamp, toIsoOrNull } from "../core/time";
import { FetchOutcome, FetchPolicy, Sleeper, Transport, executeFetch } from "../fetch";
import { Logger, MetricsRegistry } from "../observability";
import { AttributeValue, JobHeader } from "../types";

export const EXPECTED_HEADER_KEYS: ReadonlySet<string> = new Set([
  "api",
  "assetGroup",
  "bottomholeLatitude",
  "bottomholeLongitude",
  "county",
  "fleet",
  "fluidSystem",
  "formation",
  "fracSystem",
  "jobId",
  "jobStartDate",
  "jobType",
  "lateralLength",
  "lateralLengthUnitText",
  "legalDescription",
  "measuredDepth",
  "measuredDepthUnitText",
  "modifiedUtc",
  "operator",
  "padName",
  "plannedStages",
  "serviceCompany",
  "stageCount",
  "state",
  "surfaceLatitude",
  "surfaceLongitude",
  "verticalDepth",
  "verticalDepthUnitText",
  "wellId",
  "wellName",
]);

const AttributeValueSchema: z.ZodType<AttributeValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(AttributeValueSchema), z.record(AttributeValueSchema)]),
);

const RawJobHeaderSchema = z
  .object({
    jobId: z.string().min(1),
    modifiedUtc: z.string().nullable().optional(),
  })
  .catchall(AttributeValueSchema);

const RawJobHeaderListSchema = z.array(RawJobHeaderSchema);

export type RawJobHeader = z.infer<typeof RawJobHeaderSchema>;

export function toSnakeCase(key: string): string {
  return key.replace(/([a-z0-9])([A-Z])/g, "$1_$2").toLowerCase();
}

export function parseJobHeaderList(body: string): RawJobHeader[] {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new HeaderShapeError(`response is not valid JSON (${error instanceof Error ? error.message : String(error)})`);
  }

  const result = RawJobHeaderListSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? issue.path.join(".") || "<root>" : "<root>";
    throw new HeaderShapeError(`${where}: ${issue?.message ?? "invalid"}`);
  }
  return result.data;
}

export function normalizeJobHeader(raw: RawJobHeader): JobHeader {
  const attributes: Record<string, AttributeValue> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (key === "jobId" || key === "modifiedUtc" || value === undefined) {
      continue;
    }
    attributes[toSnakeCase(key)] = value;
  }

  const startDate = attributes.job_start_date;
  if (startDate !== undefined) {
    attributes.job_start_date = toIsoOrNull(parseUtcTimestamp(typeof startDate === "string" ? startDate : null));
  }

  const legal = attributes.legal_description;
  if (typeof legal === "string") {
    attributes.legal_description = legal.replace(/"/g, "");
  }

  return {
    jobId: raw.jobId,
    modifiedUtc: parseUtcTimestamp(raw.modifiedUtc),
    attributes,
  };
}

export function diffHeaderKeys(raw: readonly RawJobHeader[]): { missing: string[]; unexpected: string[] } {
  const seen = new Set<string>();
  for (const record of raw) {
    for (const key of Object.keys(record)) {
      seen.add(key);
    }
  }
  if (raw.length === 0) {
    return { missing: [], unexpected: [] };
  }
  const missing = [...EXPECTED_HEADER_KEYS].filter((key) => !seen.has(key)).sort();
  const unexpected = [...seen].filter((key) => !EXPECTED_HEADER_KEYS.has(key)).sort();
  return { missing, unexpected };
}

export interface HeaderFetchDeps {
  config: Pick<AppConfig, "apiBaseUrl" | "headersEndpoint">;
  policy: FetchPolicy;
  apiKey: string;
  transport: Transport;
  logger: Logger;
  metrics?: MetricsRegistry;
  sleep?: Sleeper;
}

export type HeaderFetchResult =
  | { status: "ok"; headers: JobHeader[]; outcome: FetchOutcome }
  | { status: "failed"; outcome: FetchOutcome };

export async function fetchJobHeaders(deps: HeaderFetchDeps): Promise<HeaderFetchResult> {
  const url = joinUrl(deps.config.apiBaseUrl, deps.config.headersEndpoint);
  const outcome = await executeFetch(
    { url, headers: bearerHeaders(deps.apiKey) },
    deps.policy,
    {
      transport: deps.transport,
      sleep: deps.sleep,
      logger: deps.logger,
      metrics: deps.metrics,
      timer: "header_fetch_ms",
    },
  );

  if (outcome.status !== "success") {
    deps.logger.error("headers_fetch_failed", {
      url,
      status: outcome.status,
      category: outcome.category,
      statusCode: outcome.statusCode,
      attempts: outcome.attempts,
    });
    return { status: "failed", outcome };
  }

  const raw = parseJobHeaderList(outcome.body);
  const keyDiff = diffHeaderKeys(raw);
  if (keyDiff.missing.length > 0 || keyDiff.unexpected.length > 0) {
    deps.logger.warn("headers_unexpected_keys", { url, ...keyDiff });
  }

  const headers = raw.map(normalizeJobHeader);
  deps.metrics?.incrementCounter("headers_fetched", headers.length);
  deps.logger.info("headers_fetched", { url, count: headers.length });
  if (headers.length === 0) {
    deps.logger.warn("headers_empty", { url });
  }
  return { status: "ok", headers, outcome };
}
