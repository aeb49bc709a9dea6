import type { CredentialHandle } from "../credentials/CredentialHandle.js";
import type { RepositoryRef } from "../repos/RepositoryRef.js";

export interface Watermark {
  /** Full commit id the workspace was synchronized to. */
  readonly commit: string;
  /** ISO-8601 instant of that synchronization. */
  readonly syncedAt: string;
}

export type SyncMode = "initial" | "incremental" | "noop" | "diverged" | "forced";

export interface SyncResult {
  readonly before: Watermark | null;
  readonly after: Watermark;
  /** Sorted, de-duplicated. For full results this is every tracked file. */
  readonly changedPaths: readonly string[];
  /** True when downstream consumers should treat the whole tree as changed. */
  readonly full: boolean;
  readonly mode: SyncMode;
  readonly durationMs: number;
}

export interface SyncRequest {
  repo: RepositoryRef;
  credential: CredentialHandle;
  previousWatermark: Watermark | null;
  forceFull?: boolean;
  signal?: AbortSignal;
}

export interface Syncer {
  sync(request: SyncRequest): Promise<SyncResult>;
}

export type RemoteUrlResolver = (repo: RepositoryRef, credential: CredentialHandle) => string;
