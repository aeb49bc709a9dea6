import type { CredentialMethod } from "../credentials/CredentialHandle.js";
import type { EnqueueOutcome } from "../coordinator/WorkflowCoordinator.js";
import { logger } from "../logger.js";
import { parseRepositoryUrl, repoKey, type RepositoryRef } from "../repos/RepositoryRef.js";
import { DiscoverySchema } from "../schema.js";
import {
  isBusyGroupError,
  isNoGroupError,
  type MessageTransport,
  type ReadResult,
} from "../transport/MessageTransport.js";

export interface DiscoveryTarget {
  enqueue(repo: RepositoryRef, options: { accessHint?: CredentialMethod | null }): EnqueueOutcome;
}

export interface DiscoveryConsumerOptions {
  stream: string;
  group: string;
  consumer: string;
  blockMs?: number;
}

/**
 * Reads discovery messages from a stream consumer group, enqueues each
 * repository and acknowledges the entry. Malformed entries are acknowledged
 * and dropped.
 */
export class DiscoveryConsumer {
  private readonly blockMs: number;
  private stopped = false;
  private loop: Promise<void> | null = null;

  constructor(
    private readonly transport: MessageTransport,
    private readonly target: DiscoveryTarget,
    private readonly options: DiscoveryConsumerOptions,
  ) {
    this.blockMs = options.blockMs ?? 1000;
  }

  async ensureGroup(): Promise<void> {
    try {
      // start from '0' so entries written before the first start are not missed
      await this.transport.xGroupCreate(this.options.stream, this.options.group, "0", { MKSTREAM: true });
      logger.debug("created consumer group", { stream: this.options.stream, group: this.options.group });
    } catch (e) {
      if (!isBusyGroupError(e)) throw e;
    }
  }

  /** Reads and handles at most one batch; returns the number of entries seen. */
  async readOnce(): Promise<number> {
    const { stream, group, consumer } = this.options;
    let res: ReadResult | null;
    try {
      res = await this.transport.xReadGroup(group, consumer, { key: stream, id: ">" }, { COUNT: 10, BLOCK: this.blockMs });
    } catch (e) {
      if (!isNoGroupError(e)) throw e;
      logger.info("consumer group missing, recreating", { stream, group });
      await this.ensureGroup();
      return 0;
    }
    if (!res) return 0;

    let seen = 0;
    for (const entry of Object.values(res)) {
      for (const msg of entry.messages) {
        seen++;
        this.handle(msg.id, msg.fields);
        await this.transport.xAck(stream, group, msg.id);
      }
    }
    return seen;
  }

  start(): void {
    if (this.loop) return;
    this.stopped = false;
    this.loop = this.run();
  }

  async stop(): Promise<void> {
    this.stopped = true;
    const loop = this.loop;
    this.loop = null;
    if (loop) await loop;
  }

  private async run(): Promise<void> {
    let ready = false;
    while (!this.stopped) {
      try {
        if (!ready) {
          await this.ensureGroup();
          ready = true;
          logger.info("discovery consumer ready", { stream: this.options.stream, group: this.options.group });
        }
        await this.readOnce();
      } catch (e) {
        logger.error("discovery read failed", { stream: this.options.stream, error: e });
        await new Promise((resolve) => setTimeout(resolve, this.blockMs));
      }
    }
  }

  private handle(entryId: string, fields: Record<string, string>): void {
    const parsed = DiscoverySchema.safeParse(fields);
    if (!parsed.success) {
      logger.warn("dropping malformed discovery message", { entryId, issues: parsed.error.issues.map((i) => i.message) });
      return;
    }

    let repo: RepositoryRef;
    try {
      repo = parseRepositoryUrl(parsed.data.repo, parsed.data.protocol);
    } catch (e) {
      logger.warn("dropping discovery message with invalid repository", { entryId, error: e });
      return;
    }

    const outcome = this.target.enqueue(repo, { accessHint: parsed.data.access_hint ?? null });
    logger.info("repository discovered", { entryId, repository: repoKey(repo), outcome });
  }
}
