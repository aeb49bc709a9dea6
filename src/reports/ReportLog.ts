import { reportTime, type WorkflowReport } from "./WorkflowReport.js";

export interface ReportSink {
  readonly name: string;
  append(report: WorkflowReport): Promise<void>;
}

export type Since = Date | number | string;

export function sinceMillis(since: Since): number {
  if (since instanceof Date) return since.getTime();
  if (typeof since === "number") return since;
  const parsed = Date.parse(since);
  if (Number.isNaN(parsed)) throw new RangeError(`Invalid timestamp '${since}'`);
  return parsed;
}

/**
 * Append-only, in-process report history. Reports are kept in append order,
 * which is also timestamp order because every report is cut when it is
 * appended.
 */
export class ReportLog implements ReportSink {
  readonly name = "memory";
  private readonly entries: WorkflowReport[] = [];

  async append(report: WorkflowReport): Promise<void> {
    this.entries.push(report);
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Lazy view over reports with `timestamp >= since`. The view is bounded by
   * the log length when it was requested, so iteration always ends; calling
   * it again (with any timestamp) starts a fresh pass.
   */
  since(since: Since): Iterable<WorkflowReport> {
    const from = sinceMillis(since);
    const entries = this.entries;
    const end = entries.length;
    return {
      *[Symbol.iterator]() {
        for (let i = 0; i < end; i++) {
          const report = entries[i];
          if (reportTime(report) >= from) yield report;
        }
      },
    };
  }
}
