import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { JobDownloadResult } from "../types";
import { createSink, LocalJsonlSink, NoopSink } from "./index";

let dir: string | undefined;

afterEach(() => {
  if (dir) {
    fs.rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  }
});

const RESULT: JobDownloadResult = {
  jobId: "A",
  url: "https://api.test/persecdata/A",
  status: "download_failed",
  statusCode: 404,
  attempts: 1,
  artifacts: [],
  error: "not_found: No data found matching the request",
  downloadedAt: "2018-06-02T00:00:00.000Z",
};

describe("LocalJsonlSink", () => {
  it("appends one line per result tagged with the run id", async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "sink-"));
    const manifests = path.join(dir, "manifests");
    const sink = new LocalJsonlSink({ outputDirs: { payloads: path.join(dir, "persec"), manifests } }, "run_test");

    await sink.publishDownloadResult([RESULT]);
    await sink.publishDownloadResult([]);
    await sink.publishDownloadResult([{ ...RESULT, jobId: "B", url: "https://api.test/persecdata/B" }]);

    const lines = fs.readFileSync(path.join(manifests, "downloads.jsonl"), "utf-8").trimEnd().split("\n");
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0] ?? "")).toEqual({ runId: "run_test", ...RESULT });
    expect(JSON.parse(lines[1] ?? "")).toMatchObject({ runId: "run_test", jobId: "B" });
  });
});

describe("createSink", () => {
  it("builds the configured sink", () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "sink-"));
    const outputDirs = { payloads: path.join(dir, "persec"), manifests: path.join(dir, "manifests") };

    expect(createSink({ sinkType: "none", outputDirs }, "run_test")).toBeInstanceOf(NoopSink);
    expect(createSink({ sinkType: "local_jsonl", outputDirs }, "run_test")).toBeInstanceOf(LocalJsonlSink);
  });
});
