/**
 * Message Bus — routes A2A messages between agents.
 *
 * Direct delivery goes through each agent's bounded channel. When the
 * receiver has no channel, or its channel is full, the message is published
 * on the receiver's indirect topic `agent:{id}` instead and the send still
 * reports success. Broadcasts reach global listeners, the `a2a_messages`
 * topic and, for frontend notifications, every frontend subscriber.
 */
import type { Logger } from '@/observability/logger.js';
import type { KeyValueStore } from '@/storage/types.js';
import { createBoundedChannel, type BoundedChannel } from './channel.js';
import { encodeMessage } from './messages.js';
import type { A2AMessage, FrontendNotificationMessage } from './types.js';

// ─── Types ──────────────────────────────────────────────────────

export type GlobalListener = (message: A2AMessage) => void | Promise<void>;
export type FrontendSubscriber = (notification: FrontendNotificationMessage) => void | Promise<void>;

export interface MessageBus {
  /** The agent's direct channel, created on first call. */
  listen(agentId: string): BoundedChannel<A2AMessage>;
  /** Drop the agent's direct channel; later sends use the indirect topic. */
  releaseChannel(agentId: string): void;
  sendDirect(agentId: string, message: A2AMessage): Promise<boolean>;
  broadcast(message: A2AMessage): Promise<boolean>;
  registerListener(listenerId: string, listener: GlobalListener): void;
  unregisterListener(listenerId: string): void;
  addFrontendSubscriber(subscriber: FrontendSubscriber): void;
  removeFrontendSubscriber(subscriber: FrontendSubscriber): void;
  frontendSubscriberCount(): number;
}

interface MessageBusDeps {
  store: KeyValueStore;
  logger: Logger;
  /** Direct channel capacity. Default: 100. */
  channelCapacity?: number;
}

export const BROADCAST_TOPIC = 'a2a_messages';
export const agentTopic = (agentId: string): string => `agent:${agentId}`;

// ─── Factory Function ───────────────────────────────────────────

export function createMessageBus(deps: MessageBusDeps): MessageBus {
  const { store, logger } = deps;
  const channelCapacity = deps.channelCapacity ?? 100;
  const channels = new Map<string, BoundedChannel<A2AMessage>>();
  const listeners = new Map<string, GlobalListener>();
  const frontendSubscribers = new Set<FrontendSubscriber>();

  async function forwardToFrontend(message: A2AMessage): Promise<void> {
    if (message.kind !== 'frontend_notification' || frontendSubscribers.size === 0) return;

    for (const subscriber of [...frontendSubscribers]) {
      try {
        await subscriber(message);
      } catch (error) {
        frontendSubscribers.delete(subscriber);
        logger.warn('Removed failing frontend subscriber', {
          component: 'message-bus',
          messageId: message.id,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  return {
    listen(agentId) {
      let channel = channels.get(agentId);
      if (!channel) {
        channel = createBoundedChannel<A2AMessage>(channelCapacity);
        channels.set(agentId, channel);
      }
      return channel;
    },

    releaseChannel(agentId) {
      channels.delete(agentId);
    },

    async sendDirect(agentId, message) {
      try {
        const channel = channels.get(agentId);
        if (channel?.offer(message)) {
          logger.debug('Message delivered to direct channel', {
            component: 'message-bus',
            agentId,
            messageId: message.id,
            kind: message.kind,
          });
        } else {
          if (channel) {
            logger.warn('Direct channel full, falling back to indirect topic', {
              component: 'message-bus',
              agentId,
              messageId: message.id,
              capacity: channel.capacity,
            });
          } else {
            logger.debug('No direct channel, publishing to indirect topic', {
              component: 'message-bus',
              agentId,
              messageId: message.id,
            });
          }
          await store.publish(agentTopic(agentId), encodeMessage(message));
        }

        await forwardToFrontend(message);
        return true;
      } catch (error) {
        logger.error('Direct send failed', {
          component: 'message-bus',
          agentId,
          messageId: message.id,
          error: error instanceof Error ? error.message : String(error),
        });
        return false;
      }
    },

    async broadcast(message) {
      try {
        for (const [listenerId, listener] of [...listeners]) {
          try {
            await listener(message);
          } catch (error) {
            logger.error('Global listener failed', {
              component: 'message-bus',
              listenerId,
              messageId: message.id,
              error: error instanceof Error ? error.message : String(error),
            });
          }
        }

        await store.publish(BROADCAST_TOPIC, encodeMessage(message));
        await forwardToFrontend(message);
        return true;
      } catch (error) {
        logger.error('Broadcast failed', {
          component: 'message-bus',
          messageId: message.id,
          error: error instanceof Error ? error.message : String(error),
        });
        return false;
      }
    },

    registerListener(listenerId, listener) {
      listeners.set(listenerId, listener);
    },

    unregisterListener(listenerId) {
      listeners.delete(listenerId);
    },

    addFrontendSubscriber(subscriber) {
      frontendSubscribers.add(subscriber);
      logger.debug('Frontend subscriber added', {
        component: 'message-bus',
        subscribers: frontendSubscribers.size,
      });
    },

    removeFrontendSubscriber(subscriber) {
      frontendSubscribers.delete(subscriber);
      logger.debug('Frontend subscriber removed', {
        component: 'message-bus',
        subscribers: frontendSubscribers.size,
      });
    },

    frontendSubscriberCount: () => frontendSubscribers.size,
  };
}
