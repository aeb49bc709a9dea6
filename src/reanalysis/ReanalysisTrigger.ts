import type { RepositoryRef } from "../repos/RepositoryRef.js";
import type { Watermark } from "../sync/types.js";

export interface ReanalysisRequest {
  repo: RepositoryRef;
  watermark: Watermark;
  changedPaths: readonly string[];
  /** Consumers should re-analyze the whole tree. */
  full: boolean;
}

/** Downstream hand-off; resolving means the request was accepted for processing. */
export interface ReanalysisTrigger {
  enqueue(request: ReanalysisRequest): Promise<void>;
}

export class NoopReanalysisTrigger implements ReanalysisTrigger {
  async enqueue(): Promise<void> {}
}
