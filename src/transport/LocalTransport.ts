import { EventEmitter } from 'events';
import type {
  CreateGroupOptions,
  Message,
  MessageTransport,
  ReadOptions,
  ReadResult,
  StreamCursor,
} from './MessageTransport.js';

interface StoredMessage {
  id: string;
  fields: Record<string, string>;
  timestamp: number;
}

interface ConsumerGroupState {
  name: string;
  lastDeliveredId: string;
  consumers: Map<string, Set<string>>;
}

/**
 * In-process stand-in for Redis streams with consumer groups. Used for
 * single-process deployments and by the tests.
 */
export class LocalTransport implements MessageTransport {
  private emitter: EventEmitter;
  private streams: Map<string, StoredMessage[]>;
  private groups: Map<string, Map<string, ConsumerGroupState>>;
  private messageIdCounter: number = 0;

  constructor() {
    this.emitter = new EventEmitter();
    this.emitter.setMaxListeners(100);
    this.streams = new Map();
    this.groups = new Map();
  }

  async connect(): Promise<void> {}

  async disconnect(): Promise<void> {
    this.emitter.removeAllListeners();
  }

  private generateId(): string {
    const timestamp = Date.now();
    const sequence = this.messageIdCounter++;
    return `${timestamp}-${sequence}`;
  }

  private compareIds(a: string, b: string): number {
    if (a === b) return 0;

    const [aTime, aSeq = 0] = a.split('-').map(Number);
    const [bTime, bSeq = 0] = b.split('-').map(Number);

    if (aTime !== bTime) return aTime < bTime ? -1 : 1;
    return aSeq < bSeq ? -1 : 1;
  }

  private streamFor(stream: string): StoredMessage[] {
    let messages = this.streams.get(stream);
    if (!messages) {
      messages = [];
      this.streams.set(stream, messages);
    }
    return messages;
  }

  async xAdd(stream: string, id: string, fields: Record<string, string>): Promise<string> {
    const messageId = id === '*' ? this.generateId() : id;
    const message: StoredMessage = {
      id: messageId,
      fields: { ...fields },
      timestamp: Date.now(),
    };

    this.streamFor(stream).push(message);
    this.emitter.emit(`stream:${stream}`, message);

    return messageId;
  }

  async xGroupCreate(
    stream: string,
    group: string,
    startId: string,
    options?: CreateGroupOptions,
  ): Promise<void> {
    if (options?.MKSTREAM) this.streamFor(stream);

    if (!this.streams.has(stream)) {
      throw new Error(`ERR no such key`);
    }

    let streamGroups = this.groups.get(stream);
    if (!streamGroups) {
      streamGroups = new Map();
      this.groups.set(stream, streamGroups);
    }
    if (streamGroups.has(group)) {
      throw new Error(`BUSYGROUP Consumer Group name already exists`);
    }

    const stored = this.streams.get(stream) ?? [];
    streamGroups.set(group, {
      name: group,
      lastDeliveredId: startId === '$' ? (stored[stored.length - 1]?.id ?? '0') : startId,
      consumers: new Map(),
    });
  }

  async xReadGroup(
    group: string,
    consumer: string,
    streams: StreamCursor | StreamCursor[],
    options?: ReadOptions,
  ): Promise<ReadResult | null> {
    const streamArray = Array.isArray(streams) ? streams : [streams];
    const count = options?.COUNT ?? 10;
    const blockMs = options?.BLOCK ?? 0;

    const result: ReadResult = {};
    let hasMessages = false;

    for (const { key: streamKey, id: startId } of streamArray) {
      const streamMessages = this.streams.get(streamKey);
      if (!streamMessages) continue;

      const groupState = this.groups.get(streamKey)?.get(group);
      if (!groupState) {
        throw new Error(`NOGROUP No such consumer group '${group}' for stream '${streamKey}'`);
      }

      let pending = groupState.consumers.get(consumer);
      if (!pending) {
        pending = new Set();
        groupState.consumers.set(consumer, pending);
      }

      const messages: Message[] = [];

      if (startId === '>') {
        for (const msg of streamMessages) {
          if (this.compareIds(msg.id, groupState.lastDeliveredId) > 0) {
            messages.push({ id: msg.id, fields: { ...msg.fields } });
            pending.add(msg.id);
            groupState.lastDeliveredId = msg.id;
            if (messages.length >= count) break;
          }
        }
      } else {
        // explicit id: redeliver this consumer's pending entries after it
        for (const msg of streamMessages) {
          if (pending.has(msg.id) && this.compareIds(msg.id, startId) > 0) {
            messages.push({ id: msg.id, fields: { ...msg.fields } });
            if (messages.length >= count) break;
          }
        }
      }

      if (messages.length > 0) {
        result[streamKey] = { messages };
        hasMessages = true;
      }
    }

    if (!hasMessages && blockMs > 0) {
      const arrived = await this.waitForMessages(streamArray, blockMs);
      if (arrived) {
        return this.xReadGroup(group, consumer, streams, { ...options, BLOCK: 0 });
      }
    }

    return hasMessages ? result : null;
  }

  async xRead(streams: StreamCursor | StreamCursor[], options?: ReadOptions): Promise<ReadResult | null> {
    const streamArray = Array.isArray(streams) ? streams : [streams];
    const count = options?.COUNT ?? 10;
    const blockMs = options?.BLOCK ?? 0;

    const result: ReadResult = {};
    let hasMessages = false;

    for (const { key: streamKey, id: startId } of streamArray) {
      const streamMessages = this.streams.get(streamKey);
      if (!streamMessages || startId === '$') continue;

      const messages: Message[] = [];
      for (const msg of streamMessages) {
        if (this.compareIds(msg.id, startId) > 0) {
          messages.push({ id: msg.id, fields: { ...msg.fields } });
          if (messages.length >= count) break;
        }
      }

      if (messages.length > 0) {
        result[streamKey] = { messages };
        hasMessages = true;
      }
    }

    if (!hasMessages && blockMs > 0) {
      const arrived = await this.waitForMessages(streamArray, blockMs);
      if (arrived) {
        return this.xRead(streams, { ...options, BLOCK: 0 });
      }
    }

    return hasMessages ? result : null;
  }

  private waitForMessages(streams: StreamCursor[], timeoutMs: number): Promise<boolean> {
    return new Promise((resolve) => {
      const finish = (arrived: boolean) => {
        clearTimeout(timer);
        for (const { key } of streams) {
          this.emitter.removeListener(`stream:${key}`, onMessage);
        }
        resolve(arrived);
      };
      const onMessage = () => finish(true);

      for (const { key } of streams) {
        this.emitter.once(`stream:${key}`, onMessage);
      }
      const timer = setTimeout(() => finish(false), timeoutMs);
    });
  }

  async xAck(stream: string, group: string, id: string): Promise<number> {
    const groupState = this.groups.get(stream)?.get(group);
    if (!groupState) return 0;

    let acked = 0;
    for (const pending of groupState.consumers.values()) {
      if (pending.delete(id)) acked++;
    }
    return acked;
  }

  async xLen(stream: string): Promise<number> {
    return this.streams.get(stream)?.length ?? 0;
  }
}
