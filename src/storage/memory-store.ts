/**
 * In-process KeyValueStore. Expiry is checked on read; publish fans out
 * synchronously to the handlers subscribed at the time of the call.
 */
import type { Logger } from '@/observability/logger.js';
import type { ChannelHandler, KeyValueStore } from './types.js';

interface StoredValue {
  value: string;
  expiresAt?: number;
}

interface MemoryStoreDeps {
  logger: Logger;
  /** Clock, overridable in tests. Default: Date.now. */
  now?: () => number;
}

export function createMemoryStore(deps: MemoryStoreDeps): KeyValueStore {
  const { logger } = deps;
  const now = deps.now ?? Date.now;
  const data = new Map<string, StoredValue>();
  const channels = new Map<string, Set<ChannelHandler>>();

  function live(key: string): StoredValue | undefined {
    const entry = data.get(key);
    if (entry?.expiresAt !== undefined && entry.expiresAt <= now()) {
      data.delete(key);
      return undefined;
    }
    return entry;
  }

  return {
    get(key) {
      return Promise.resolve(live(key)?.value ?? null);
    },

    set(key, value, expireSeconds) {
      data.set(key, {
        value,
        expiresAt: expireSeconds !== undefined ? now() + expireSeconds * 1000 : undefined,
      });
      return Promise.resolve();
    },

    delete(key) {
      const existed = live(key) !== undefined;
      data.delete(key);
      return Promise.resolve(existed ? 1 : 0);
    },

    exists(key) {
      return Promise.resolve(live(key) !== undefined);
    },

    publish(channel, message) {
      const handlers = [...(channels.get(channel) ?? [])];
      for (const handler of handlers) {
        try {
          handler(message);
        } catch (error) {
          logger.error('Channel handler threw', {
            component: 'memory-store',
            channel,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      }
      return Promise.resolve(handlers.length);
    },

    subscribe(channel, handler) {
      let handlers = channels.get(channel);
      if (!handlers) {
        handlers = new Set();
        channels.set(channel, handlers);
      }
      handlers.add(handler);

      return Promise.resolve(() => {
        const current = channels.get(channel);
        current?.delete(handler);
        if (current?.size === 0) channels.delete(channel);
        return Promise.resolve();
      });
    },

    ping() {
      return Promise.resolve(true);
    },

    close() {
      data.clear();
      channels.clear();
      return Promise.resolve();
    },
  };
}
