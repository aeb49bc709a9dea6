import { logger } from "../logger.js";
import { repoKey, type RepositoryRef } from "../repos/RepositoryRef.js";
import type { ChangeDetector } from "./ChangeDetector.js";

export interface PushEvent {
  repo: RepositoryRef;
  /** Commit the push moved the branch to, when the sender knows it. */
  tip?: string | null;
}

interface DebounceWindow {
  openedAt: number;
  events: number;
  tip: string | null;
}

/**
 * Collapses push events into one pending sync per repository. The window is
 * anchored at the first event; later events inside it only bump the count.
 */
export class EventChangeDetector implements ChangeDetector {
  readonly name = "events";
  private readonly windows = new Map<string, DebounceWindow>();
  private readonly windowMs: number;
  private readonly now: () => number;

  constructor(options: { windowMs: number; now?: () => number }) {
    this.windowMs = options.windowMs;
    this.now = options.now ?? Date.now;
  }

  notify(event: PushEvent): void {
    const key = repoKey(event.repo);
    const current = this.windows.get(key);
    if (current) {
      current.events++;
      current.tip = event.tip ?? current.tip;
      return;
    }
    this.windows.set(key, { openedAt: this.now(), events: 1, tip: event.tip ?? null });
  }

  pendingFor(repo: RepositoryRef): number {
    return this.windows.get(repoKey(repo))?.events ?? 0;
  }

  async shouldSync(repo: RepositoryRef): Promise<boolean> {
    const key = repoKey(repo);
    const window = this.windows.get(key);
    if (!window || this.now() - window.openedAt < this.windowMs) return false;
    this.windows.delete(key);
    logger.debug("push window closed", { repository: key, events: window.events, tip: window.tip });
    return true;
  }
}
