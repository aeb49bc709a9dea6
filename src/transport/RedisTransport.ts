import { createClient } from 'redis';
import { logger } from '../logger.js';
import type {
  CreateGroupOptions,
  MessageTransport,
  ReadOptions,
  ReadResult,
  StreamCursor,
} from './MessageTransport.js';

type RedisClient = ReturnType<typeof createClient>;

type ReplyValue = string | Buffer;

type RedisStreamReply = Array<{
  name: ReplyValue;
  messages: Array<{ id: ReplyValue; message: Record<string, ReplyValue> }>;
}> | null;

function toFields(message: Record<string, ReplyValue>): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const [key, value] of Object.entries(message)) fields[key] = value.toString();
  return fields;
}

function toReadResult(reply: RedisStreamReply): ReadResult | null {
  if (!reply || reply.length === 0) return null;
  const result: ReadResult = {};
  for (const stream of reply) {
    result[stream.name.toString()] = {
      messages: stream.messages.map((m) => ({ id: m.id.toString(), fields: toFields(m.message) })),
    };
  }
  return result;
}

export class RedisTransport implements MessageTransport {
  private client: RedisClient | null = null;
  private url: string;
  private password?: string;

  constructor(url: string, password?: string) {
    this.url = url;
    this.password = password;
  }

  async connect(): Promise<void> {
    if (this.client) {
      return;
    }

    const client = createClient({
      url: this.url,
      password: this.password,
    });
    client.on('error', (error: unknown) => {
      logger.warn('redis client error', { error });
    });
    await client.connect();
    this.client = client;
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      await this.client.quit();
      this.client = null;
    }
  }

  private ensureConnected(): RedisClient {
    if (!this.client) {
      throw new Error('Redis transport not connected. Call connect() first.');
    }
    return this.client;
  }

  async xAdd(stream: string, id: string, fields: Record<string, string>): Promise<string> {
    const client = this.ensureConnected();
    return (await client.xAdd(stream, id, fields)).toString();
  }

  async xGroupCreate(
    stream: string,
    group: string,
    startId: string,
    options?: CreateGroupOptions,
  ): Promise<void> {
    const client = this.ensureConnected();
    await client.xGroupCreate(stream, group, startId, { MKSTREAM: options?.MKSTREAM ? true : undefined });
  }

  async xReadGroup(
    group: string,
    consumer: string,
    streams: StreamCursor | StreamCursor[],
    options?: ReadOptions,
  ): Promise<ReadResult | null> {
    const client = this.ensureConnected();
    return toReadResult(await client.xReadGroup(group, consumer, streams, options));
  }

  async xRead(streams: StreamCursor | StreamCursor[], options?: ReadOptions): Promise<ReadResult | null> {
    const client = this.ensureConnected();
    return toReadResult(await client.xRead(streams, options));
  }

  async xAck(stream: string, group: string, id: string): Promise<number> {
    const client = this.ensureConnected();
    return await client.xAck(stream, group, id);
  }

  async xLen(stream: string): Promise<number> {
    const client = this.ensureConnected();
    return await client.xLen(stream);
  }
}
