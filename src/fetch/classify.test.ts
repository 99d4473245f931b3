import { describe, expect, it } from "vitest";
import { classifyStatus, isRetryableCategory, isTerminalCategory, parseRetryAfterSeconds, retryDelaySeconds } from "./classify";

describe("classifyStatus", () => {
  it("treats only 200 as success", () => {
    expect(classifyStatus(200)).toBe("success");
    expect(classifyStatus(204)).toBe("unknown_status");
  });

  it("maps the terminal client errors", () => {
    expect(classifyStatus(400)).toBe("bad_request");
    expect(classifyStatus(401)).toBe("unauthorized");
    expect(classifyStatus(403)).toBe("forbidden");
    expect(classifyStatus(404)).toBe("not_found");
  });

  it("retries throttling and everything unrecognized", () => {
    expect(classifyStatus(429)).toBe("rate_limited");
    expect(classifyStatus(500)).toBe("unknown_status");
    expect(classifyStatus(503)).toBe("unknown_status");
    expect(classifyStatus(418)).toBe("unknown_status");
  });

  it("splits categories into terminal and retryable", () => {
    expect(isTerminalCategory("not_found")).toBe(true);
    expect(isTerminalCategory("rate_limited")).toBe(false);
    expect(isRetryableCategory("transport_error")).toBe(true);
    expect(isRetryableCategory("success")).toBe(false);
  });
});

describe("parseRetryAfterSeconds", () => {
  it("accepts whole seconds", () => {
    expect(parseRetryAfterSeconds("30")).toBe(30);
    expect(parseRetryAfterSeconds(" 5 ")).toBe(5);
    expect(parseRetryAfterSeconds("0")).toBe(0);
  });

  it("ignores anything else", () => {
    expect(parseRetryAfterSeconds(null)).toBeUndefined();
    expect(parseRetryAfterSeconds(undefined)).toBeUndefined();
    expect(parseRetryAfterSeconds("")).toBeUndefined();
    expect(parseRetryAfterSeconds("-3")).toBeUndefined();
    expect(parseRetryAfterSeconds("1.5")).toBeUndefined();
    expect(parseRetryAfterSeconds("Wed, 21 Oct 2015 07:28:00 GMT")).toBeUndefined();
  });
});

describe("retryDelaySeconds", () => {
  it("honours the hint only for rate limiting", () => {
    expect(retryDelaySeconds("rate_limited", "12", 70)).toBe(12);
    expect(retryDelaySeconds("rate_limited", "soon", 70)).toBe(70);
    expect(retryDelaySeconds("rate_limited", null, 70)).toBe(70);
    expect(retryDelaySeconds("unknown_status", "12", 70)).toBe(70);
    expect(retryDelaySeconds("transport_error", "12", 70)).toBe(70);
  });
});
