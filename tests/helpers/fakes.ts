import { CredentialResolver } from "../../src/credentials/CredentialResolver.js";
import { MemorySecretStore } from "../../src/credentials/SecretStore.js";
import { JobRunner, type JobRunnerDeps } from "../../src/jobs/JobRunner.js";
import type { ReanalysisRequest, ReanalysisTrigger } from "../../src/reanalysis/ReanalysisTrigger.js";
import { MemoryWatermarkStore } from "../../src/store/WatermarkStore.js";
import type { SyncRequest, SyncResult, Syncer, Watermark } from "../../src/sync/types.js";

export const COMMIT_A = "a".repeat(40);
export const COMMIT_B = "b".repeat(40);
export const SYNCED_AT = "2026-01-01T00:00:00.000Z";

export function watermark(commit: string = COMMIT_A): Watermark {
  return { commit, syncedAt: SYNCED_AT };
}

export function fullResult(commit: string = COMMIT_A, paths: string[] = ["README.md", "src/index.ts"]): SyncResult {
  return { before: null, after: watermark(commit), changedPaths: paths, full: true, mode: "initial", durationMs: 1 };
}

export function noopResult(previous: Watermark): SyncResult {
  return { before: previous, after: previous, changedPaths: [], full: false, mode: "noop", durationMs: 1 };
}

type Behaviour = (request: SyncRequest, call: number) => Promise<SyncResult>;

export class FakeSyncer implements Syncer {
  readonly calls: SyncRequest[] = [];

  constructor(private readonly behaviour: Behaviour = async () => fullResult()) {}

  async sync(request: SyncRequest): Promise<SyncResult> {
    this.calls.push(request);
    return this.behaviour(request, this.calls.length);
  }
}

export class RecordingTrigger implements ReanalysisTrigger {
  readonly requests: ReanalysisRequest[] = [];
  failWith: Error | null = null;

  async enqueue(request: ReanalysisRequest): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.requests.push(request);
  }
}

/** A promise plus the function that settles it. */
export function gate() {
  let open: () => void = () => {};
  const opened = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { opened, open };
}

export function patStore() {
  return new MemorySecretStore().set("pat", { secret: "test-secret" });
}

export function makeRunner(overrides: Partial<JobRunnerDeps> & { syncer: Syncer }) {
  const watermarks = new MemoryWatermarkStore();
  const reanalysis = new RecordingTrigger();
  const deps: JobRunnerDeps = {
    credentials: new CredentialResolver(patStore()),
    watermarks,
    reanalysis,
    retry: { maxAttempts: 3, initialDelayMs: 100, maxDelayMs: 1000, maxJitterMs: 0 },
    sleep: async () => {},
    ...overrides,
  };
  return { runner: new JobRunner(deps), deps, watermarks, reanalysis };
}
