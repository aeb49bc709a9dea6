import { repoKey } from "../repos/RepositoryRef.js";
import type { MessageTransport } from "../transport/MessageTransport.js";
import type { ReanalysisRequest, ReanalysisTrigger } from "./ReanalysisTrigger.js";

export function reanalysisFields(request: ReanalysisRequest): Record<string, string> {
  return {
    repository: repoKey(request.repo),
    commit: request.watermark.commit,
    synced_at: request.watermark.syncedAt,
    full: request.full ? "1" : "0",
    changed_paths: JSON.stringify(request.changedPaths),
    ts: new Date().toISOString(),
  };
}

export class StreamReanalysisTrigger implements ReanalysisTrigger {
  constructor(private readonly transport: MessageTransport, private readonly stream: string) {}

  async enqueue(request: ReanalysisRequest): Promise<void> {
    await this.transport.xAdd(this.stream, "*", reanalysisFields(request));
  }
}
