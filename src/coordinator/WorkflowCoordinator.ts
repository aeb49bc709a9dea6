import {
  DEFAULT_CREDENTIAL_PREFERENCE,
  preferenceFor,
  type CredentialMethod,
} from "../credentials/CredentialHandle.js";
import type { ChangeDetector } from "../detect/ChangeDetector.js";
import { Job } from "../jobs/Job.js";
import { logger } from "../logger.js";
import { ReportLog, type ReportSink, type Since } from "../reports/ReportLog.js";
import type { WorkflowReport } from "../reports/WorkflowReport.js";
import { repoKey, type RepositoryRef } from "../repos/RepositoryRef.js";

export type EnqueueOutcome = "queued" | "already-pending" | "rerun-scheduled" | "shutting-down";

export interface EnqueueOptions {
  /** Access method the discovery source says should work; tried first. */
  accessHint?: CredentialMethod | null;
}

export interface PassRunner {
  runPass(job: Job, signal?: AbortSignal): Promise<WorkflowReport>;
}

export interface WorkflowCoordinatorOptions {
  runner: PassRunner;
  concurrency: number;
  detector?: ChangeDetector | null;
  tickMs?: number;
  sinks?: readonly ReportSink[];
  reportLog?: ReportLog;
  preference?: readonly CredentialMethod[];
  now?: () => Date;
}

interface JobSlot {
  job: Job;
  queued: boolean;
  running: boolean;
  rerun: boolean;
}

export interface JobStatus extends ReturnType<Job["snapshot"]> {
  queued: boolean;
  running: boolean;
  rerun: boolean;
}

/**
 * Owns one Job per repository and a bounded pool of worker slots. A
 * repository is either waiting, running, or idle; requests that arrive
 * while it runs collapse into a single follow-up pass.
 */
export class WorkflowCoordinator {
  private readonly slots = new Map<string, JobSlot>();
  private readonly waiting: string[] = [];
  private readonly inFlight = new Map<string, Promise<void>>();
  private readonly controller = new AbortController();
  private readonly runner: PassRunner;
  private readonly concurrency: number;
  private readonly detector: ChangeDetector | null;
  private readonly tickMs: number;
  private readonly sinks: readonly ReportSink[];
  private readonly preference: readonly CredentialMethod[];
  private readonly now: () => Date;
  readonly reportLog: ReportLog;
  private timer: NodeJS.Timeout | null = null;
  private ticking = false;
  private stopping = false;

  constructor(options: WorkflowCoordinatorOptions) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${options.concurrency}`);
    }
    this.runner = options.runner;
    this.concurrency = options.concurrency;
    this.detector = options.detector ?? null;
    this.tickMs = options.tickMs ?? 1000;
    this.sinks = options.sinks ?? [];
    this.reportLog = options.reportLog ?? new ReportLog();
    this.preference = options.preference ?? DEFAULT_CREDENTIAL_PREFERENCE;
    this.now = options.now ?? (() => new Date());
  }

  get isShuttingDown(): boolean {
    return this.stopping;
  }

  get runningCount(): number {
    return this.inFlight.size;
  }

  /** Registers a repository for change detection without starting a pass. */
  track(repo: RepositoryRef, options: EnqueueOptions = {}): Job {
    const key = repoKey(repo);
    let slot = this.slots.get(key);
    if (!slot) {
      slot = { job: new Job(repo, this.now), queued: false, running: false, rerun: false };
      this.slots.set(key, slot);
      logger.debug("repository tracked", { repository: key });
    }
    if (options.accessHint) {
      slot.job.credentialPreference = preferenceFor(options.accessHint, this.preference);
    }
    return slot.job;
  }

  isTracked(repo: RepositoryRef): boolean {
    return this.slots.has(repoKey(repo));
  }

  jobFor(repo: RepositoryRef): Job | undefined {
    return this.slots.get(repoKey(repo))?.job;
  }

  jobs(): Job[] {
    return Array.from(this.slots.values(), (slot) => slot.job);
  }

  status(): JobStatus[] {
    return Array.from(this.slots.values(), (slot) => ({
      ...slot.job.snapshot(),
      queued: slot.queued,
      running: slot.running,
      rerun: slot.rerun,
    }));
  }

  enqueue(repo: RepositoryRef, options: EnqueueOptions = {}): EnqueueOutcome {
    if (this.stopping) return "shutting-down";

    const job = this.track(repo, options);
    const slot = this.slots.get(job.key);
    if (!slot) throw new Error(`slot missing for ${job.key}`);

    if (slot.queued) return "already-pending";
    if (slot.running) {
      slot.rerun = true;
      return "rerun-scheduled";
    }

    slot.queued = true;
    this.waiting.push(job.key);
    this.pump();
    return "queued";
  }

  /** Asks the detector about every tracked repository and enqueues the ones that changed. */
  async tick(): Promise<number> {
    if (!this.detector || this.ticking || this.stopping) return 0;
    this.ticking = true;
    let enqueued = 0;
    try {
      for (const slot of Array.from(this.slots.values())) {
        let changed = false;
        try {
          changed = await this.detector.shouldSync(slot.job.repo);
        } catch (e) {
          logger.warn("change detector failed", { repository: slot.job.key, detector: this.detector.name, error: e });
        }
        if (changed && this.enqueue(slot.job.repo) !== "shutting-down") enqueued++;
      }
    } finally {
      this.ticking = false;
    }
    return enqueued;
  }

  start(): void {
    if (this.timer || !this.detector) return;
    this.timer = setInterval(() => {
      this.tick().catch((e) => logger.error("detector tick failed", { error: e }));
    }, this.tickMs);
    logger.info("change detection started", { detector: this.detector.name, tickMs: this.tickMs });
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** Resolves once no pass is running and none is waiting for a slot. */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled(Array.from(this.inFlight.values()));
    }
  }

  async shutdown(): Promise<void> {
    if (this.stopping) return this.idle();
    this.stopping = true;
    this.stop();

    for (const key of this.waiting.splice(0)) {
      const slot = this.slots.get(key);
      if (slot) slot.queued = false;
    }
    for (const slot of this.slots.values()) slot.rerun = false;

    logger.info("coordinator shutting down", { running: this.inFlight.size });
    this.controller.abort();
    await this.idle();
  }

  reportsSince(since: Since): Iterable<WorkflowReport> {
    return this.reportLog.since(since);
  }

  private pump(): void {
    while (!this.stopping && this.inFlight.size < this.concurrency && this.waiting.length > 0) {
      const key = this.waiting.shift();
      const slot = key ? this.slots.get(key) : undefined;
      if (!key || !slot) continue;

      slot.queued = false;
      slot.running = true;
      this.inFlight.set(key, Promise.resolve().then(() => this.runSlot(slot)));
    }
  }

  private async runSlot(slot: JobSlot): Promise<void> {
    const { job } = slot;
    try {
      const report = await this.runner.runPass(job, this.controller.signal);
      await this.publish(report);
    } catch (e) {
      logger.error("pass ended without a report", { repository: job.key, state: job.state, error: e });
    } finally {
      this.inFlight.delete(job.key);
      slot.running = false;
      if (slot.rerun && !this.stopping) {
        slot.rerun = false;
        slot.queued = true;
        this.waiting.push(job.key);
      }
      this.pump();
    }
  }

  private async publish(report: WorkflowReport): Promise<void> {
    await this.reportLog.append(report);
    logger.info("workflow report", {
      repository: report.repository,
      state: report.state,
      outcome: report.outcome,
      attempts: report.attempts,
      changed: report.changedPathCount,
      full: report.full,
      errorKind: report.errorKind,
    });

    await Promise.all(
      this.sinks.map(async (sink) => {
        try {
          await sink.append(report);
        } catch (e) {
          logger.error("report sink failed", { sink: sink.name, repository: report.repository, error: e });
        }
      }),
    );
  }
}
