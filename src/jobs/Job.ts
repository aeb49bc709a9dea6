import type { CredentialMethod } from "../credentials/CredentialHandle.js";
import type { ErrorKind } from "../errors.js";
import { repoKey, type RepositoryRef } from "../repos/RepositoryRef.js";
import type { SyncResult } from "../sync/types.js";
import {
  ACTIVE_STATES,
  InvalidTransitionError,
  canTransition,
  type JobState,
} from "./JobState.js";

export interface JobError {
  kind: ErrorKind;
  message: string;
  at: string;
}

export interface JobTransition {
  from: JobState;
  to: JobState;
  at: string;
  reason?: string;
}

const HISTORY_LIMIT = 50;

export class Job {
  readonly key: string;
  private current: JobState = "PENDING";
  private attempts = 0;
  private error: JobError | null = null;
  private readonly results: SyncResult[] = [];
  private log: JobTransition[] = [];
  private passes = 0;
  private started: Date | null = null;
  credentialPreference: CredentialMethod[] | null = null;

  constructor(readonly repo: RepositoryRef, private readonly now: () => Date = () => new Date()) {
    this.key = repoKey(repo);
  }

  get state(): JobState {
    return this.current;
  }

  get attempt(): number {
    return this.attempts;
  }

  get lastError(): JobError | null {
    return this.error;
  }

  get history(): readonly SyncResult[] {
    return this.results;
  }

  get lastResult(): SyncResult | null {
    return this.results.length ? this.results[this.results.length - 1] : null;
  }

  /** Transitions of the current (or most recent) pass. */
  get transitions(): readonly JobTransition[] {
    return this.log;
  }

  get passCount(): number {
    return this.passes;
  }

  get passStartedAt(): Date | null {
    return this.started;
  }

  get isActive(): boolean {
    return ACTIVE_STATES.has(this.current);
  }

  transition(to: JobState, reason?: string): void {
    const from = this.current;
    if (!canTransition(from, to)) throw new InvalidTransitionError(from, to, this.key);
    this.current = to;
    this.log.push({ from, to, at: this.now().toISOString(), ...(reason ? { reason } : {}) });
  }

  /** Opens a new pass; only legal while the job is idle in PENDING. */
  beginPass(): void {
    if (this.current !== "PENDING") throw new InvalidTransitionError(this.current, "RESOLVING_CREDENTIAL", this.key);
    this.log = [];
    this.attempts = 0;
    this.error = null;
    this.passes++;
    this.started = this.now();
    this.transition("RESOLVING_CREDENTIAL", "dispatched");
  }

  countAttempt(): number {
    this.attempts++;
    return this.attempts;
  }

  recordError(kind: ErrorKind, message: string): void {
    this.error = { kind, message, at: this.now().toISOString() };
  }

  recordResult(result: SyncResult): void {
    this.results.push(result);
    if (this.results.length > HISTORY_LIMIT) this.results.splice(0, this.results.length - HISTORY_LIMIT);
  }

  snapshot() {
    const last = this.lastResult;
    return {
      repository: this.key,
      state: this.current,
      attempt: this.attempts,
      passes: this.passes,
      lastError: this.error,
      watermark: last ? last.after : null,
      passStartedAt: this.started ? this.started.toISOString() : null,
    };
  }
}
