import { logger } from "../logger.js";
import { repoKey, type RepositoryRef } from "../repos/RepositoryRef.js";
import type { WatermarkStore } from "../store/WatermarkStore.js";
import type { RemoteTipQuery } from "../sync/remote.js";
import type { ChangeDetector } from "./ChangeDetector.js";

export interface PollingOptions {
  intervalMs: number;
  now?: () => number;
}

/**
 * Compares the remote default-branch tip with the stored watermark, querying
 * each repository at most once per interval.
 */
export class PollingChangeDetector implements ChangeDetector {
  readonly name = "polling";
  private readonly lastPolled = new Map<string, number>();
  private readonly intervalMs: number;
  private readonly now: () => number;

  constructor(
    private readonly remote: RemoteTipQuery,
    private readonly watermarks: WatermarkStore,
    options: PollingOptions,
  ) {
    this.intervalMs = options.intervalMs;
    this.now = options.now ?? Date.now;
  }

  async shouldSync(repo: RepositoryRef): Promise<boolean> {
    const key = repoKey(repo);
    const now = this.now();
    const last = this.lastPolled.get(key);
    if (last !== undefined && now - last < this.intervalMs) return false;
    this.lastPolled.set(key, now);

    const watermark = await this.watermarks.get(repo);
    if (!watermark) return true;

    let tip: string | null;
    try {
      tip = await this.remote.tip(repo);
    } catch (e) {
      logger.warn("remote tip query failed", { repository: key, error: e });
      return false;
    }
    if (!tip) return false;

    const changed = tip !== watermark.commit;
    if (changed) logger.debug("remote moved", { repository: key, from: watermark.commit, to: tip });
    return changed;
  }
}
