import { InvalidFetchPolicyError, errorMessage } from "../core/errors";
import { Logger, MetricsRegistry, MetricTimerName } from "../observability";
import {
  CATEGORY_HINTS,
  RetryableCategory,
  StatusCategory,
  TerminalCategory,
  classifyStatus,
  isRetryableCategory,
  retryDelaySeconds,
} from "./classify";
import { AttemptingState, INITIAL_STATE, SettledState, afterAttempt, afterWait } from "./retryMachine";

export interface FetchPolicy {
  maxAttempts: number;
  defaultDelaySeconds: number;
}

export interface ApiRequest {
  url: string;
  headers?: Record<string, string>;
  jobId?: string;
}

export interface TransportResponse {
  status: number;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
}

export type Transport = (request: ApiRequest) => Promise<TransportResponse>;
export type Sleeper = (ms: number) => Promise<void>;

export interface ExecutorDeps {
  transport: Transport;
  sleep?: Sleeper;
  logger?: Logger;
  metrics?: MetricsRegistry;
  timer?: MetricTimerName;
}

interface OutcomeBase {
  url: string;
  jobId?: string;
  attempts: number;
}

export type FetchOutcome =
  | (OutcomeBase & { status: "success"; statusCode: 200; body: string })
  | (OutcomeBase & { status: "terminal_failure"; category: TerminalCategory; statusCode: number })
  | (OutcomeBase & {
      status: "retryable";
      category: RetryableCategory;
      statusCode?: number;
      retryAfterSeconds: number;
      error?: string;
    });

interface AttemptResult {
  category: StatusCategory;
  statusCode?: number;
  body?: string;
  retryAfterHeader?: string | null;
  error?: string;
}

const BODY_SNIPPET_CHARS = 2000;

const MAX_TIMER_MS = 2_147_483_647;

// setTimeout fires at once for delays past a signed 32-bit millisecond count.
export async function sleep(ms: number): Promise<void> {
  let remaining = Math.max(0, ms);
  do {
    const chunk = Math.min(remaining, MAX_TIMER_MS);
    await new Promise<void>((resolve) => setTimeout(resolve, chunk));
    remaining -= chunk;
  } while (remaining > 0);
}

export function validateFetchPolicy(policy: FetchPolicy): void {
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts <= 0) {
    throw new InvalidFetchPolicyError(`maxAttempts must be a positive integer, got ${String(policy.maxAttempts)}`);
  }
  if (!Number.isFinite(policy.defaultDelaySeconds) || policy.defaultDelaySeconds < 0) {
    throw new InvalidFetchPolicyError(
      `defaultDelaySeconds must be a non-negative number, got ${String(policy.defaultDelaySeconds)}`,
    );
  }
}

async function performAttempt(request: ApiRequest, transport: Transport): Promise<AttemptResult> {
  let response: TransportResponse;
  try {
    response = await transport(request);
  } catch (error) {
    return { category: "transport_error", error: errorMessage(error) };
  }

  const category = classifyStatus(response.status);
  if (category === "success") {
    try {
      return { category, statusCode: response.status, body: await response.text() };
    } catch (error) {
      return { category: "transport_error", statusCode: response.status, error: errorMessage(error) };
    }
  }

  if (category === "unknown_status") {
    const snippet = await response
      .text()
      .then((text) => text.slice(0, BODY_SNIPPET_CHARS))
      .catch((error: unknown) => `<unreadable body: ${errorMessage(error)}>`);
    return { category, statusCode: response.status, error: snippet };
  }

  return { category, statusCode: response.status, retryAfterHeader: response.headers.get("retry-after") };
}

function toOutcome(state: SettledState, last: AttemptResult, request: ApiRequest, delaySeconds: number): FetchOutcome {
  const base: OutcomeBase = { url: request.url, jobId: request.jobId, attempts: state.attemptsMade };
  switch (state.phase) {
    case "succeeded":
      return { ...base, status: "success", statusCode: 200, body: last.body ?? "" };
    case "failed_terminal":
      return { ...base, status: "terminal_failure", category: state.category, statusCode: last.statusCode ?? 0 };
    case "failed_exhausted":
      return {
        ...base,
        status: "retryable",
        category: state.category,
        statusCode: last.statusCode,
        retryAfterSeconds: delaySeconds,
        error: last.error,
      };
  }
}

export async function executeFetch(request: ApiRequest, policy: FetchPolicy, deps: ExecutorDeps): Promise<FetchOutcome> {
  validateFetchPolicy(policy);
  const wait = deps.sleep ?? sleep;
  const logger = deps.logger;

  let state: AttemptingState = INITIAL_STATE;
  for (;;) {
    const fields = { jobId: request.jobId, url: request.url, attempt: state.attempt };
    logger?.debug("fetch_attempt_start", fields);
    const stopTimer = deps.metrics && deps.timer ? deps.metrics.startTimer(deps.timer) : undefined;
    const result = await performAttempt(request, deps.transport);
    const durationMs = stopTimer?.();

    const delaySeconds = isRetryableCategory(result.category)
      ? retryDelaySeconds(result.category, result.retryAfterHeader, policy.defaultDelaySeconds)
      : 0;
    const next = afterAttempt(state, result.category, policy.maxAttempts, delaySeconds);
    const context = {
      ...fields,
      statusCode: result.statusCode,
      category: result.category,
      hint: CATEGORY_HINTS[result.category],
      durationMs,
    };

    if (next.phase === "waiting") {
      logger?.warn("fetch_attempt_retry", {
        ...context,
        delaySeconds: next.delaySeconds,
        retryAfter: result.retryAfterHeader ?? undefined,
        error: result.error,
      });
      deps.metrics?.incrementCounter("fetch_retries");
      await wait(next.delaySeconds * 1000);
      state = afterWait(next);
      continue;
    }

    switch (next.phase) {
      case "succeeded":
        logger?.info("fetch_ok", context);
        break;
      case "failed_terminal":
        logger?.error("fetch_failed_terminal", context);
        break;
      case "failed_exhausted":
        logger?.error("fetch_failed_exhausted", { ...context, maxAttempts: policy.maxAttempts, error: result.error });
        break;
    }
    return toOutcome(next, result, request, delaySeconds);
  }
}
