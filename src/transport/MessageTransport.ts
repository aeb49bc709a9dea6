export interface Message {
  id: string;
  fields: Record<string, string>;
}

export interface StreamMessage {
  messages: Message[];
}

export interface ReadResult {
  [streamKey: string]: StreamMessage;
}

export interface CreateGroupOptions {
  MKSTREAM?: boolean;
}

export interface ReadOptions {
  COUNT?: number;
  BLOCK?: number;
}

export type StreamCursor = { key: string; id: string };

/** Subset of Redis stream commands the orchestrator relies on. */
export interface MessageTransport {
  connect(): Promise<void>;

  disconnect(): Promise<void>;

  xAdd(stream: string, id: string, fields: Record<string, string>): Promise<string>;

  xGroupCreate(
    stream: string,
    group: string,
    startId: string,
    options?: CreateGroupOptions,
  ): Promise<void>;

  xReadGroup(
    group: string,
    consumer: string,
    streams: StreamCursor | StreamCursor[],
    options?: ReadOptions,
  ): Promise<ReadResult | null>;

  xRead(streams: StreamCursor | StreamCursor[], options?: ReadOptions): Promise<ReadResult | null>;

  xAck(stream: string, group: string, id: string): Promise<number>;

  xLen(stream: string): Promise<number>;
}

export function isBusyGroupError(error: unknown): boolean {
  const message = error instanceof Error ? error.message : String(error);
  return message.includes("BUSYGROUP") || message.includes("already exists");
}

export function isNoGroupError(error: unknown): boolean {
  const message = error instanceof Error ? error.message : String(error);
  return message.includes("NOGROUP");
}
