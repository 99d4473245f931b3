import { describe, expect, it } from "vitest";
import { HeaderShapeError } from "../core/errors";
import { quietLogger, scriptedTransport } from "../testing/fakes";
import { diffHeaderKeys, fetchJobHeaders, normalizeJobHeader, parseJobHeaderList, toSnakeCase } from "./jobHeaders";

describe("toSnakeCase", () => {
  it("splits camel case words", () => {
    expect(toSnakeCase("jobId")).toBe("job_id");
    expect(toSnakeCase("lateralLengthUnitText")).toBe("lateral_length_unit_text");
    expect(toSnakeCase("api")).toBe("api");
  });
});

describe("parseJobHeaderList", () => {
  it("rejects a body that is not JSON", () => {
    expect(() => parseJobHeaderList("<html>")).toThrow(HeaderShapeError);
  });

  it("rejects a body that is not a list", () => {
    expect(() => parseJobHeaderList('{"jobId":"A"}')).toThrow("Unexpected job header shape: <root>: Expected array, received object");
  });

  it("rejects a record without a job id", () => {
    expect(() => parseJobHeaderList('[{"jobId":"A"},{"wellName":"W"}]')).toThrow("Unexpected job header shape: 1.jobId: Required");
  });
});

describe("normalizeJobHeader", () => {
  it("snake-cases attributes and cleans known fields", () => {
    const [raw] = parseJobHeaderList(
      JSON.stringify([
        {
          jobId: "job-7",
          modifiedUtc: "2017-06-20T15:09:06",
          jobStartDate: "2015-01-01T12:00:00",
          legalDescription: 'Sec 1 "North" Unit',
          stageCount: 40,
          wellName: null,
        },
      ]),
    );
    if (!raw) {
      throw new Error("expected one header");
    }

    const header = normalizeJobHeader(raw);

    expect(header.jobId).toBe("job-7");
    expect(header.modifiedUtc?.toISOString()).toBe("2017-06-20T15:09:06.000Z");
    expect(header.attributes).toEqual({
      job_start_date: "2015-01-01T12:00:00.000Z",
      legal_description: "Sec 1 North Unit",
      stage_count: 40,
      well_name: null,
    });
  });

  it("keeps nested attribute values as they are", () => {
    const [raw] = parseJobHeaderList(
      JSON.stringify([{ jobId: "A", modifiedUtc: null, perforations: [{ top: 100, bottom: 120 }], crew: { lead: "Sam" } }]),
    );
    if (!raw) {
      throw new Error("expected one header");
    }

    expect(normalizeJobHeader(raw).attributes).toEqual({
      perforations: [{ top: 100, bottom: 120 }],
      crew: { lead: "Sam" },
    });
  });

  it("keeps an unparseable modification time as null", () => {
    expect(normalizeJobHeader({ jobId: "A", modifiedUtc: "yesterday" }).modifiedUtc).toBeNull();
    expect(normalizeJobHeader({ jobId: "A", modifiedUtc: null }).modifiedUtc).toBeNull();
  });
});

describe("diffHeaderKeys", () => {
  it("reports unexpected keys", () => {
    const diff = diffHeaderKeys([{ jobId: "A", modifiedUtc: null, extraField: 1 }]);
    expect(diff.unexpected).toEqual(["extraField"]);
    expect(diff.missing).toContain("wellName");
    expect(diff.missing).not.toContain("jobId");
  });
});

describe("fetchJobHeaders", () => {
  const config = { apiBaseUrl: "https://api.test/", headersEndpoint: "jobheaders" };
  const policy = { maxAttempts: 1, defaultDelaySeconds: 0 };

  it("sends the bearer key and returns normalized headers", async () => {
    const { transport, calls } = scriptedTransport([
      { status: 200, body: JSON.stringify([{ jobId: "A", modifiedUtc: "2018-06-02T00:00:00Z" }]) },
    ]);

    const result = await fetchJobHeaders({ config, policy, apiKey: "test-secret", transport, logger: quietLogger() });

    expect(calls[0]).toEqual({ url: "https://api.test/jobheaders", headers: { authorization: "Bearer test-secret" } });
    expect(result.status).toBe("ok");
    if (result.status === "ok") {
      expect(result.headers).toEqual([{ jobId: "A", modifiedUtc: new Date("2018-06-02T00:00:00Z"), attributes: {} }]);
    }
  });

  it("reports a failed fetch without parsing", async () => {
    const { transport } = scriptedTransport([{ status: 401, body: "not json" }]);

    const result = await fetchJobHeaders({ config, policy, apiKey: "test-secret", transport, logger: quietLogger() });

    expect(result.status).toBe("failed");
    expect(result.outcome.statusCode).toBe(401);
  });
});
