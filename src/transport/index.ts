import type { MessageTransport } from './MessageTransport.js';
import { RedisTransport } from './RedisTransport.js';
import { LocalTransport } from './LocalTransport.js';
import { cfg } from '../config.js';

export type { MessageTransport } from './MessageTransport.js';

export type TransportType = 'redis' | 'local';

export function createTransport(type: TransportType = cfg.transportType): MessageTransport {
  switch (type) {
    case 'redis':
      return new RedisTransport(cfg.redisUrl, cfg.redisPassword);

    case 'local':
      return new LocalTransport();

    default:
      throw new Error(`Unknown transport type: ${String(type)}. Supported types: redis, local`);
  }
}
