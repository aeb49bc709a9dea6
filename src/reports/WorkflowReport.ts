import { randomUUID } from "crypto";
import type { CredentialSummary } from "../credentials/CredentialHandle.js";
import type { ErrorKind } from "../errors.js";
import type { JobState } from "../jobs/JobState.js";

export type ReanalysisOutcome = "queued" | "skipped" | "failed";

export interface WorkflowReport {
  readonly id: string;
  readonly repository: string;
  readonly host: string;
  readonly owner: string;
  readonly name: string;
  /** REPORTED for completed or interrupted passes, FAILED for terminal failures. */
  readonly state: "REPORTED" | "FAILED";
  /** Last state the job held before the report was cut. */
  readonly outcome: JobState;
  readonly attempts: number;
  readonly durationMs: number;
  readonly changedPathCount: number;
  readonly full: boolean;
  readonly watermark: string | null;
  readonly errorKind: ErrorKind | null;
  readonly errorMessage: string | null;
  readonly credential: Pick<CredentialSummary, "tag" | "expiresAt"> | null;
  readonly reanalysis: ReanalysisOutcome;
  readonly startedAt: string;
  readonly timestamp: string;
}

export type WorkflowReportInput = Omit<WorkflowReport, "id">;

export function createReport(input: WorkflowReportInput): WorkflowReport {
  return Object.freeze({ id: randomUUID(), ...input });
}

export function reportTime(report: WorkflowReport): number {
  return Date.parse(report.timestamp);
}
