import { afterEach, describe, expect, it, vi } from "vitest";
import { InvalidFetchPolicyError } from "../core/errors";
import { MetricsRegistry } from "../observability";
import { quietLogger, recordingSleeper, scriptedTransport } from "../testing/fakes";
import { retryDelaySeconds } from "./classify";
import { executeFetch, sleep } from "./executor";

const URL = "https://api.test/persecdata/job-1";
const POLICY = { maxAttempts: 3, defaultDelaySeconds: 5 };

describe("executeFetch", () => {
  it("returns the body on the first 200", async () => {
    const { transport, calls } = scriptedTransport([{ status: 200, body: "a,b\n1,2\n" }]);
    const { sleep, sleeps } = recordingSleeper();

    const outcome = await executeFetch({ url: URL, jobId: "job-1" }, POLICY, { transport, sleep });

    expect(outcome).toEqual({ url: URL, jobId: "job-1", attempts: 1, status: "success", statusCode: 200, body: "a,b\n1,2\n" });
    expect(calls).toHaveLength(1);
    expect(sleeps).toEqual([]);
  });

  it("makes exactly maxAttempts calls when every response is throttled", async () => {
    const { transport, calls } = scriptedTransport([{ status: 429 }]);
    const { sleep, sleeps } = recordingSleeper();

    const outcome = await executeFetch({ url: URL }, POLICY, { transport, sleep, logger: quietLogger() });

    expect(calls).toHaveLength(3);
    expect(sleeps).toEqual([5000, 5000]);
    expect(outcome).toEqual({
      url: URL,
      jobId: undefined,
      attempts: 3,
      status: "retryable",
      category: "rate_limited",
      statusCode: 429,
      retryAfterSeconds: 5,
      error: undefined,
    });
  });

  it("succeeds after a retryable response", async () => {
    const { transport } = scriptedTransport([{ status: 503, body: "maintenance" }, { status: 200, body: "ok" }]);
    const { sleep, sleeps } = recordingSleeper();
    const metrics = new MetricsRegistry();

    const outcome = await executeFetch({ url: URL }, POLICY, { transport, sleep, metrics, logger: quietLogger() });

    expect(outcome.status).toBe("success");
    expect(outcome.attempts).toBe(2);
    expect(sleeps).toEqual([5000]);
    expect(metrics.getCounter("fetch_retries")).toBe(1);
  });

  it.each([400, 401, 403, 404])("stops after one attempt on %i", async (status) => {
    const { transport, calls } = scriptedTransport([{ status }, { status: 200, body: "never" }]);
    const { sleep, sleeps } = recordingSleeper();

    const outcome = await executeFetch({ url: URL, jobId: "job-1" }, POLICY, { transport, sleep, logger: quietLogger() });

    expect(calls).toHaveLength(1);
    expect(sleeps).toEqual([]);
    expect(outcome.status).toBe("terminal_failure");
    expect(outcome.statusCode).toBe(status);
    expect(outcome.url).toBe(URL);
  });

  it("reports the category of a 404", async () => {
    const { transport } = scriptedTransport([{ status: 404 }]);

    const outcome = await executeFetch({ url: URL, jobId: "job-1" }, POLICY, { transport, logger: quietLogger() });

    expect(outcome).toEqual({
      url: URL,
      jobId: "job-1",
      attempts: 1,
      status: "terminal_failure",
      category: "not_found",
      statusCode: 404,
    });
  });

  it("waits for the server's Retry-After hint", async () => {
    const { transport } = scriptedTransport([
      { status: 429, headers: { "Retry-After": "12" } },
      { status: 200, body: "ok" },
    ]);
    const { sleep, sleeps } = recordingSleeper();

    await executeFetch({ url: URL }, POLICY, { transport, sleep, logger: quietLogger() });

    expect(sleeps).toEqual([12000]);
  });

  it("falls back to the default delay for an unusable hint", async () => {
    const { transport } = scriptedTransport([
      { status: 429, headers: { "retry-after": "soon" } },
      { status: 503, headers: { "retry-after": "30" } },
      { status: 200, body: "ok" },
    ]);
    const { sleep, sleeps } = recordingSleeper();

    await executeFetch({ url: URL }, POLICY, { transport, sleep, logger: quietLogger() });

    expect(sleeps).toEqual([5000, 5000]);
  });

  it("retries transport errors", async () => {
    const { transport, calls } = scriptedTransport([new Error("socket hang up"), { status: 200, body: "ok" }]);
    const { sleep, sleeps } = recordingSleeper();

    const outcome = await executeFetch({ url: URL }, POLICY, { transport, sleep, logger: quietLogger() });

    expect(calls).toHaveLength(2);
    expect(sleeps).toEqual([5000]);
    expect(outcome.status).toBe("success");
  });

  it("carries the last transport error once the budget is spent", async () => {
    const { transport } = scriptedTransport([new Error("connect ECONNREFUSED")]);
    const { sleep } = recordingSleeper();

    const outcome = await executeFetch({ url: URL }, { maxAttempts: 2, defaultDelaySeconds: 1 }, {
      transport,
      sleep,
      logger: quietLogger(),
    });

    expect(outcome).toEqual({
      url: URL,
      jobId: undefined,
      attempts: 2,
      status: "retryable",
      category: "transport_error",
      statusCode: undefined,
      retryAfterSeconds: 1,
      error: "connect ECONNREFUSED",
    });
  });

  it("never hands out a body that failed to read", async () => {
    let calls = 0;
    const { sleep } = recordingSleeper();
    const outcome = await executeFetch({ url: URL }, { maxAttempts: 1, defaultDelaySeconds: 0 }, {
      transport: async () => {
        calls += 1;
        return {
          status: 200,
          headers: { get: () => null },
          text: async () => {
            throw new Error("terminated");
          },
        };
      },
      sleep,
      logger: quietLogger(),
    });

    expect(calls).toBe(1);
    expect(outcome.status).toBe("retryable");
    if (outcome.status === "retryable") {
      expect(outcome.category).toBe("transport_error");
      expect(outcome.error).toBe("terminated");
    }
  });

  it("keeps a snippet of an unrecognized response body", async () => {
    const { transport } = scriptedTransport([{ status: 502, body: "x".repeat(2500) }]);

    const outcome = await executeFetch({ url: URL }, { maxAttempts: 1, defaultDelaySeconds: 0 }, {
      transport,
      logger: quietLogger(),
    });

    expect(outcome.status).toBe("retryable");
    if (outcome.status === "retryable") {
      expect(outcome.error).toBe("x".repeat(2000));
    }
  });

  it("rejects an invalid policy before any request", async () => {
    const { transport, calls } = scriptedTransport([{ status: 200, body: "ok" }]);

    await expect(executeFetch({ url: URL }, { maxAttempts: 0, defaultDelaySeconds: 5 }, { transport })).rejects.toThrow(
      InvalidFetchPolicyError,
    );
    await expect(executeFetch({ url: URL }, { maxAttempts: 2.5, defaultDelaySeconds: 5 }, { transport })).rejects.toThrow(
      InvalidFetchPolicyError,
    );
    await expect(executeFetch({ url: URL }, { maxAttempts: 3, defaultDelaySeconds: -1 }, { transport })).rejects.toThrow(
      "Invalid fetch policy: defaultDelaySeconds must be a non-negative number, got -1",
    );
    expect(calls).toHaveLength(0);
  });
});

describe("sleep", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("waits out delays longer than a single timer allows", async () => {
    vi.useFakeTimers();
    const delayMs = retryDelaySeconds("rate_limited", "3000000", 70) * 1000;
    let resolved = false;
    const pending = sleep(delayMs).then(() => {
      resolved = true;
    });

    await vi.advanceTimersByTimeAsync(2_147_483_647);
    expect(resolved).toBe(false);

    await vi.advanceTimersByTimeAsync(delayMs - 2_147_483_647);
    await pending;
    expect(resolved).toBe(true);
  });

  it("resolves a zero delay", async () => {
    vi.useFakeTimers();
    const pending = sleep(0);
    await vi.advanceTimersByTimeAsync(1);
    await expect(pending).resolves.toBeUndefined();
  });
});
