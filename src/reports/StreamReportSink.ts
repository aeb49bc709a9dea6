/**
 * Report Stream Publisher
 *
 * Flattens a WorkflowReport into stream fields and appends it to the report
 * stream. Works over both Redis and LocalTransport via MessageTransport.
 */

import type { MessageTransport } from "../transport/MessageTransport.js";
import type { ReportSink } from "./ReportLog.js";
import type { WorkflowReport } from "./WorkflowReport.js";

export function reportFields(report: WorkflowReport): Record<string, string> {
  const fields: Record<string, string> = {
    report_id: report.id,
    repository: report.repository,
    state: report.state,
    outcome: report.outcome,
    attempts: String(report.attempts),
    duration_ms: String(report.durationMs),
    changed_path_count: String(report.changedPathCount),
    full: report.full ? "1" : "0",
    watermark: report.watermark ?? "",
    reanalysis: report.reanalysis,
    started_at: report.startedAt,
    ts: report.timestamp,
  };

  if (report.errorKind) {
    fields.error_kind = report.errorKind;
    fields.error = report.errorMessage ?? "";
  }

  if (report.credential) {
    fields.credential = JSON.stringify(report.credential);
  }

  return fields;
}

export class StreamReportSink implements ReportSink {
  readonly name = "stream";

  constructor(private readonly transport: MessageTransport, private readonly stream: string) {}

  async append(report: WorkflowReport): Promise<void> {
    await this.transport.xAdd(this.stream, "*", reportFields(report));
  }
}
