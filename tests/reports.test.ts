import { describe, expect, it } from "vitest";
import { ReportLog, sinceMillis } from "../src/reports/ReportLog.js";
import { StreamReportSink, reportFields } from "../src/reports/StreamReportSink.js";
import { createReport, type WorkflowReportInput } from "../src/reports/WorkflowReport.js";
import { LocalTransport } from "../src/transport/LocalTransport.js";
import { COMMIT_A } from "./helpers/fakes.js";

const base: WorkflowReportInput = {
  repository: "github.com/acme/widgets",
  host: "github.com",
  owner: "acme",
  name: "widgets",
  state: "FAILED",
  outcome: "FAILED",
  attempts: 3,
  durationMs: 1500,
  changedPathCount: 0,
  full: false,
  watermark: null,
  errorKind: "NetworkError",
  errorMessage: "connection reset",
  credential: { tag: "deploy-key", expiresAt: "2026-06-01T00:00:00.000Z" },
  reanalysis: "skipped",
  startedAt: "2026-01-01T09:59:58.500Z",
  timestamp: "2026-01-01T10:00:00.000Z",
};

describe("createReport", () => {
  it("assigns an id and freezes the report", () => {
    const report = createReport(base);
    expect(report.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(Object.isFrozen(report)).toBe(true);
  });
});

describe("sinceMillis", () => {
  it("accepts dates, numbers and ISO strings", () => {
    expect(sinceMillis(new Date(5))).toBe(5);
    expect(sinceMillis(7)).toBe(7);
    expect(sinceMillis("1970-01-01T00:00:01.000Z")).toBe(1000);
    expect(() => sinceMillis("later")).toThrow("Invalid timestamp 'later'");
  });
});

describe("ReportLog", () => {
  it("filters by timestamp and restarts on every iteration", async () => {
    const log = new ReportLog();
    const a = createReport(base);
    const b = createReport({ ...base, timestamp: "2026-01-01T12:00:00.000Z" });
    await log.append(a);
    await log.append(b);

    const view = log.since("2026-01-01T11:00:00.000Z");
    expect(Array.from(view)).toEqual([b]);
    expect(Array.from(view)).toEqual([b]);
    expect(log.size).toBe(2);
  });
});

describe("StreamReportSink", () => {
  it("flattens a failed report", () => {
    const report = createReport(base);
    expect(reportFields(report)).toEqual({
      report_id: report.id,
      repository: "github.com/acme/widgets",
      state: "FAILED",
      outcome: "FAILED",
      attempts: "3",
      duration_ms: "1500",
      changed_path_count: "0",
      full: "0",
      watermark: "",
      reanalysis: "skipped",
      started_at: "2026-01-01T09:59:58.500Z",
      ts: "2026-01-01T10:00:00.000Z",
      error_kind: "NetworkError",
      error: "connection reset",
      credential: '{"tag":"deploy-key","expiresAt":"2026-06-01T00:00:00.000Z"}',
    });
  });

  it("omits error fields for a successful report", () => {
    const fields = reportFields(
      createReport({ ...base, state: "REPORTED", errorKind: null, errorMessage: null, watermark: COMMIT_A, full: true }),
    );
    expect(fields.error_kind).toBeUndefined();
    expect(fields.watermark).toBe(COMMIT_A);
    expect(fields.full).toBe("1");
  });

  it("appends to the report stream", async () => {
    const transport = new LocalTransport();
    const report = createReport(base);
    await new StreamReportSink(transport, "repo.reports").append(report);

    expect(await transport.xLen("repo.reports")).toBe(1);
    const read = await transport.xRead({ key: "repo.reports", id: "0" });
    expect(read?.["repo.reports"].messages[0].fields.report_id).toBe(report.id);
  });
});
