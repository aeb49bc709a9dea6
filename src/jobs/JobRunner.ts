import {
  DEFAULT_CREDENTIAL_PREFERENCE,
  type CredentialHandle,
  type CredentialMethod,
} from "../credentials/CredentialHandle.js";
import type { ResolveOptions } from "../credentials/CredentialResolver.js";
import {
  AbortedError,
  NetworkError,
  NoUsableCredentialError,
  errorMessage,
  isOrchestratorError,
  type OrchestratorError,
} from "../errors.js";
import { redactSecrets } from "../git/redact.js";
import { logger } from "../logger.js";
import type { ReanalysisTrigger } from "../reanalysis/ReanalysisTrigger.js";
import { createReport, type ReanalysisOutcome, type WorkflowReport } from "../reports/WorkflowReport.js";
import type { RepositoryRef } from "../repos/RepositoryRef.js";
import type { WatermarkStore } from "../store/WatermarkStore.js";
import type { SyncResult, Syncer } from "../sync/types.js";
import { SleepAbortedError, calculateBackoffDelay, sleep } from "../util/retry.js";
import type { Job } from "./Job.js";
import type { JobState } from "./JobState.js";

export interface CredentialSource {
  resolve(
    repo: RepositoryRef,
    candidates?: readonly CredentialMethod[],
    options?: ResolveOptions,
  ): Promise<CredentialHandle>;
}

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  maxJitterMs: number;
  random?: () => number;
}

export interface JobRunnerDeps {
  credentials: CredentialSource;
  syncer: Syncer;
  watermarks: WatermarkStore;
  reanalysis: ReanalysisTrigger;
  retry: RetryPolicy;
  /** Base preference; a job's discovery hint is moved in front of it. */
  preference?: readonly CredentialMethod[];
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => Date;
}

/** Raised inside a pass to stop it with a terminal error. */
class PassFailure extends Error {
  constructor(readonly error: OrchestratorError) {
    super(error.message);
  }
}

function toOrchestratorError(error: unknown): OrchestratorError {
  if (isOrchestratorError(error)) return error;
  if (error instanceof SleepAbortedError) return new AbortedError("backoff interrupted by shutdown");
  return new NetworkError(redactSecrets(errorMessage(error)), { cause: error });
}

interface PassContext {
  job: Job;
  signal?: AbortSignal;
  credential: CredentialHandle | null;
  rejected: CredentialMethod[];
  authRetried: boolean;
  corruptRetried: boolean;
  forceFull: boolean;
  lastError: OrchestratorError | null;
}

/**
 * Drives one Job through a single pass of the state machine: credential
 * resolution, sync with bounded retries, watermark persistence, re-analysis
 * hand-off and the report. Always resolves with the pass report.
 */
export class JobRunner {
  private readonly preference: readonly CredentialMethod[];
  private readonly wait: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly now: () => Date;

  constructor(private readonly deps: JobRunnerDeps) {
    this.preference = deps.preference ?? DEFAULT_CREDENTIAL_PREFERENCE;
    this.wait = deps.sleep ?? sleep;
    this.now = deps.now ?? (() => new Date());
  }

  candidatesFor(job: Job): readonly CredentialMethod[] {
    return job.credentialPreference ?? this.preference;
  }

  async runPass(job: Job, signal?: AbortSignal): Promise<WorkflowReport> {
    job.beginPass();
    const ctx: PassContext = {
      job,
      signal,
      credential: null,
      rejected: [],
      authRetried: false,
      corruptRetried: false,
      forceFull: false,
      lastError: null,
    };

    let result: SyncResult;
    try {
      result = await this.syncWithRetries(ctx);
    } catch (e) {
      const error = e instanceof PassFailure ? e.error : toOrchestratorError(e);
      return error.kind === "Aborted" ? this.interrupted(ctx, error) : this.failed(ctx, error);
    }

    try {
      await this.deps.watermarks.set(job.repo, result.after);
    } catch (e) {
      return this.failed(ctx, toOrchestratorError(e));
    }
    job.recordResult(result);
    job.transition("AWAITING_REANALYSIS_ACK", result.mode);

    const reanalysis = await this.handOff(job, result);
    const report = this.report(ctx, { state: "REPORTED", outcome: job.state, result, reanalysis, error: null });
    job.transition("REPORTED");
    job.transition("PENDING");
    return report;
  }

  private async syncWithRetries(ctx: PassContext): Promise<SyncResult> {
    const { job } = ctx;
    const { maxAttempts } = this.deps.retry;

    for (;;) {
      if (job.state === "RESOLVING_CREDENTIAL") {
        ctx.credential = await this.resolveCredential(ctx);
        job.transition("SYNCING", ctx.credential.tag);
      }
      const credential = ctx.credential;
      if (!credential) throw new Error(`no credential held while syncing ${job.key}`);
      if (ctx.signal?.aborted) throw new AbortedError("pass aborted before sync");

      const attempt = job.countAttempt();
      try {
        return await this.deps.syncer.sync({
          repo: job.repo,
          credential,
          previousWatermark: await this.deps.watermarks.get(job.repo),
          forceFull: ctx.forceFull,
          signal: ctx.signal,
        });
      } catch (e) {
        const error = toOrchestratorError(e);
        if (error.kind === "Aborted") throw error;

        ctx.lastError = error;
        job.recordError(error.kind, redactSecrets(error.message));
        logger.warn("sync attempt failed", {
          repository: job.key,
          attempt,
          maxAttempts,
          kind: error.kind,
          credential: credential.toJSON(),
          error: error.message,
        });

        if (attempt >= maxAttempts) throw new PassFailure(error);

        switch (error.kind) {
          case "NetworkError": {
            const delay = calculateBackoffDelay(attempt - 1, {
              initialDelayMs: this.deps.retry.initialDelayMs,
              maxDelayMs: this.deps.retry.maxDelayMs,
              maxJitterMs: this.deps.retry.maxJitterMs,
              random: this.deps.retry.random,
            });
            job.transition("RETRY_SCHEDULED", `backoff ${delay}ms`);
            await this.wait(delay, ctx.signal);
            job.transition("SYNCING", "retry");
            break;
          }
          case "AuthError": {
            if (ctx.authRetried) throw new PassFailure(error);
            ctx.authRetried = true;
            ctx.rejected.push(credential.tag);
            job.transition("RETRY_SCHEDULED", `${credential.tag} rejected`);
            job.transition("RESOLVING_CREDENTIAL", "re-resolve");
            break;
          }
          case "CorruptWorkspace": {
            if (ctx.corruptRetried) throw new PassFailure(error);
            ctx.corruptRetried = true;
            ctx.forceFull = true;
            job.transition("RETRY_SCHEDULED", "workspace corrupt");
            job.transition("SYNCING", "forced re-clone");
            break;
          }
          default:
            throw new PassFailure(error);
        }
      }
    }
  }

  private async resolveCredential(ctx: PassContext): Promise<CredentialHandle> {
    if (ctx.signal?.aborted) throw new AbortedError("pass aborted before credential resolution");
    try {
      return await this.deps.credentials.resolve(ctx.job.repo, this.candidatesFor(ctx.job), {
        exclude: ctx.rejected,
      });
    } catch (e) {
      // with nothing left to try after a rejection, the rejection is the failure
      if (e instanceof NoUsableCredentialError && ctx.lastError?.kind === "AuthError") {
        throw new PassFailure(ctx.lastError);
      }
      throw e instanceof NoUsableCredentialError ? new PassFailure(e) : e;
    }
  }

  private async handOff(job: Job, result: SyncResult): Promise<ReanalysisOutcome> {
    if (result.mode === "noop") return "skipped";
    try {
      await this.deps.reanalysis.enqueue({
        repo: job.repo,
        watermark: result.after,
        changedPaths: result.changedPaths,
        full: result.full,
      });
      return "queued";
    } catch (e) {
      logger.error("reanalysis hand-off failed", { repository: job.key, error: e });
      return "failed";
    }
  }

  private failed(ctx: PassContext, error: OrchestratorError): WorkflowReport {
    const { job } = ctx;
    job.recordError(error.kind, redactSecrets(error.message));
    job.transition("FAILED", error.kind);
    logger.error("job failed", { repository: job.key, kind: error.kind, attempts: job.attempt, error: error.message });
    const report = this.report(ctx, { state: "FAILED", outcome: job.state, result: null, reanalysis: "skipped", error });
    job.transition("REPORTED");
    job.transition("PENDING");
    return report;
  }

  private interrupted(ctx: PassContext, error: OrchestratorError): WorkflowReport {
    const { job } = ctx;
    const outcome = job.state;
    job.recordError(error.kind, error.message);
    job.transition("REPORTED", "shutdown");
    logger.info("job interrupted", { repository: job.key, during: outcome });
    const report = this.report(ctx, { state: "REPORTED", outcome, result: null, reanalysis: "skipped", error });
    job.transition("PENDING");
    return report;
  }

  private report(
    ctx: PassContext,
    fields: {
      state: "REPORTED" | "FAILED";
      outcome: JobState;
      result: SyncResult | null;
      reanalysis: ReanalysisOutcome;
      error: OrchestratorError | null;
    },
  ): WorkflowReport {
    const { job, credential } = ctx;
    const now = this.now();
    const startedAt = job.passStartedAt ?? now;
    const { result, error } = fields;
    return createReport({
      repository: job.key,
      host: job.repo.host,
      owner: job.repo.owner,
      name: job.repo.name,
      state: fields.state,
      outcome: fields.outcome,
      attempts: job.attempt,
      durationMs: now.getTime() - startedAt.getTime(),
      changedPathCount: result ? result.changedPaths.length : 0,
      full: result ? result.full : false,
      watermark: result ? result.after.commit : null,
      errorKind: error ? error.kind : null,
      errorMessage: error ? redactSecrets(error.message) : null,
      credential: credential ? { tag: credential.tag, expiresAt: credential.toJSON().expiresAt } : null,
      reanalysis: fields.reanalysis,
      startedAt: startedAt.toISOString(),
      timestamp: now.toISOString(),
    });
  }
}
