/**
 * Redis-backed KeyValueStore (ioredis).
 *
 * Redis puts a connection into subscriber mode once it subscribes, so
 * commands and subscriptions use two separate clients. One `message`
 * listener on the subscriber fans out to the handlers of each channel.
 */
import { Redis } from 'ioredis';
import type { Logger } from '@/observability/logger.js';
import type { ChannelHandler, KeyValueStore } from './types.js';

interface RedisStoreDeps {
  client: Redis;
  subscriber: Redis;
  logger: Logger;
}

export function createRedisStore(deps: RedisStoreDeps): KeyValueStore {
  const { client, subscriber, logger } = deps;
  const handlers = new Map<string, Set<ChannelHandler>>();

  subscriber.on('message', (channel: string, message: string) => {
    for (const handler of [...(handlers.get(channel) ?? [])]) {
      try {
        handler(message);
      } catch (error) {
        logger.error('Channel handler threw', {
          component: 'redis-store',
          channel,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  });

  return {
    async get(key) {
      return client.get(key);
    },

    async set(key, value, expireSeconds) {
      if (expireSeconds !== undefined) {
        await client.set(key, value, 'EX', expireSeconds);
      } else {
        await client.set(key, value);
      }
    },

    async delete(key) {
      return client.del(key);
    },

    async exists(key) {
      return (await client.exists(key)) > 0;
    },

    async publish(channel, message) {
      return client.publish(channel, message);
    },

    async subscribe(channel, handler) {
      let channelHandlers = handlers.get(channel);
      if (!channelHandlers) {
        channelHandlers = new Set();
        handlers.set(channel, channelHandlers);
        await subscriber.subscribe(channel);
      }
      channelHandlers.add(handler);

      return async () => {
        const current = handlers.get(channel);
        if (!current) return;
        current.delete(handler);
        if (current.size === 0) {
          handlers.delete(channel);
          await subscriber.unsubscribe(channel);
        }
      };
    },

    async ping() {
      try {
        return (await client.ping()) === 'PONG';
      } catch (error) {
        logger.warn('Redis ping failed', {
          component: 'redis-store',
          error: error instanceof Error ? error.message : String(error),
        });
        return false;
      }
    },

    async close() {
      handlers.clear();
      await Promise.all([subscriber.quit(), client.quit()]);
    },
  };
}

/** Open the command and subscriber connections for `url` and wrap them. */
export function connectRedisStore(url: string, logger: Logger): KeyValueStore {
  const client = new Redis(url, { maxRetriesPerRequest: 3 });
  const subscriber = new Redis(url, { maxRetriesPerRequest: null });

  for (const [role, connection] of [
    ['client', client],
    ['subscriber', subscriber],
  ] as const) {
    connection.on('error', (error: Error) => {
      logger.error('Redis connection error', { component: 'redis-store', role, error: error.message });
    });
  }

  return createRedisStore({ client, subscriber, logger });
}
