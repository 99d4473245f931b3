export type TerminalCategory = "bad_request" | "unauthorized" | "forbidden" | "not_found";
export type RetryableCategory = "rate_limited" | "unknown_status" | "transport_error";
export type StatusCategory = "success" | TerminalCategory | RetryableCategory;

const TERMINAL_BY_STATUS: ReadonlyMap<number, TerminalCategory> = new Map([
  [400, "bad_request"],
  [401, "unauthorized"],
  [403, "forbidden"],
  [404, "not_found"],
]);

export const CATEGORY_HINTS: Record<StatusCategory, string> = {
  success: "Request succeeded",
  bad_request: "Bad request; the API rejected the request or could not process the job",
  unauthorized: "Authentication token is invalid; check the Authorization header and API key",
  forbidden: "A valid token was received but it lacks permission for this endpoint",
  not_found: "No data found matching the request",
  rate_limited: "API throttled the request",
  unknown_status: "Unhandled HTTP status code",
  transport_error: "Request failed before a response was received",
};

export function classifyStatus(statusCode: number): StatusCategory {
  if (statusCode === 200) {
    return "success";
  }
  const terminal = TERMINAL_BY_STATUS.get(statusCode);
  if (terminal) {
    return terminal;
  }
  if (statusCode === 429) {
    return "rate_limited";
  }
  return "unknown_status";
}

export function isTerminalCategory(category: StatusCategory): category is TerminalCategory {
  return category === "bad_request" || category === "unauthorized" || category === "forbidden" || category === "not_found";
}

export function isRetryableCategory(category: StatusCategory): category is RetryableCategory {
  return category === "rate_limited" || category === "unknown_status" || category === "transport_error";
}

export function parseRetryAfterSeconds(value: string | null | undefined): number | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    return undefined;
  }
  const seconds = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(seconds) ? seconds : undefined;
}

export function retryDelaySeconds(
  category: RetryableCategory,
  retryAfterHeader: string | null | undefined,
  defaultDelaySeconds: number,
): number {
  if (category === "rate_limited") {
    return parseRetryAfterSeconds(retryAfterHeader) ?? defaultDelaySeconds;
  }
  return defaultDelaySeconds;
}
