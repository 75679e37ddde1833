/**
 * Agent Runtime — lifecycle, processing loop and reliable send for an agent.
 *
 * Agents are built from an `AgentDefinition` (identity plus optional kind
 * handlers). The runtime owns everything around the handlers:
 *
 *   - registration with the Coordinator and the agent's channels
 *     (direct bounded channel and indirect `agent:{id}` topic)
 *   - acknowledging messages that require it, then dispatching by kind
 *   - transport retries with exponential backoff when the bus fails
 *   - the ack-timeout protocol: a timer per ack-requiring message, resending
 *     the same message on expiry and surfacing a delivery failure once the
 *     ack-layer retries are spent
 */
import { DeliveryError } from '@/core/errors.js';
import type { Logger } from '@/observability/logger.js';
import type { KeyValueStore } from '@/storage/types.js';
import { ReceiveAbortedError, type BoundedChannel } from './channel.js';
import type { Coordinator } from './coordinator.js';
import { agentTopic, type MessageBus } from './message-bus.js';
import {
  createAck,
  createFrontendNotification,
  createRequest,
  createResponse,
  createSystemMessage,
  decodeMessage,
  type ResponseSpec,
} from './messages.js';
import type {
  A2AMessage,
  AckMessage,
  FrontendNotificationMessage,
  NotificationType,
  RequestMessage,
  RequestSpec,
  ResponseMessage,
  SystemMessage,
} from './types.js';

// ─── Types ──────────────────────────────────────────────────────

/** Handlers return `false` to report that a message could not be handled. */
export interface AgentDefinition {
  id: string;
  type: string;
  /** Display name used in frontend notifications. Defaults to `id`. */
  name?: string;
  capabilities: string[];
  handleRequest?(message: RequestMessage, agent: Agent): Promise<boolean>;
  handleResponse?(message: ResponseMessage, agent: Agent): Promise<boolean>;
  handleNotification?(
    message: SystemMessage | FrontendNotificationMessage,
    agent: Agent,
  ): Promise<boolean>;
  /** Called when an ack-requiring non-response message exhausts its retries. */
  onDeliveryFailure?(message: A2AMessage, error: DeliveryError, agent: Agent): void | Promise<void>;
}

export interface SendRequestOptions {
  conversationId?: string;
  /** Use this id for the request message, so callers can track it before sending. */
  requestId?: string;
  metadata?: Record<string, unknown>;
}

export interface Agent {
  readonly id: string;
  readonly type: string;
  readonly name: string;
  readonly capabilities: readonly string[];
  start(): Promise<void>;
  stop(): Promise<void>;
  isRunning(): boolean;
  /** Stamp the sender and deliver with transport retries. */
  send(receiver: string, message: A2AMessage): Promise<boolean>;
  sendRequest(receiver: string, spec: RequestSpec, options?: SendRequestOptions): Promise<boolean>;
  sendResponse(
    receiver: string,
    spec: ResponseSpec,
    options?: { conversationId?: string; requiresAck?: boolean },
  ): Promise<boolean>;
  broadcastMessage(message: A2AMessage): Promise<boolean>;
  notifyFrontend(
    receiver: string,
    notificationType: NotificationType,
    content: string,
    conversationId?: string,
  ): Promise<boolean>;
  /** Ack-requiring messages still waiting for their acknowledgment. */
  pendingAckCount(): number;
}

export interface AgentRuntimeDeps {
  coordinator: Coordinator;
  bus: MessageBus;
  store: KeyValueStore;
  logger: Logger;
  /** Retries per layer (transport and ack). Default: 3. */
  maxRetries?: number;
  /** Transport backoff unit; attempt n waits 2^n times this. Default: 1000. */
  retryBaseDelayMs?: number;
  /** Default: 30000. */
  ackTimeoutMs?: number;
}

interface PendingDelivery {
  message: A2AMessage;
  receiver: string;
  retries: number;
  timer?: ReturnType<typeof setTimeout>;
  settled: boolean;
}

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ─── Factory Function ───────────────────────────────────────────

export function createAgent(definition: AgentDefinition, deps: AgentRuntimeDeps): Agent {
  const { coordinator, bus, store } = deps;
  const maxRetries = deps.maxRetries ?? 3;
  const retryBaseDelayMs = deps.retryBaseDelayMs ?? 1000;
  const ackTimeoutMs = deps.ackTimeoutMs ?? 30_000;
  const logger = deps.logger.child({ agentId: definition.id });
  const log = { component: 'agent-runtime', agentId: definition.id };

  const pending = new Map<string, PendingDelivery>();
  let running = false;
  let abort: AbortController | undefined;
  let loop: Promise<void> | undefined;
  let unsubscribeIndirect: (() => Promise<void>) | undefined;

  // ─── Delivery ───────────────────────────────────────────────

  async function transmit(receiver: string, message: A2AMessage): Promise<boolean> {
    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        if (await bus.sendDirect(receiver, message)) return true;
        logger.warn('Bus refused message', { ...log, receiver, messageId: message.id, attempt: attempt + 1 });
      } catch (error) {
        logger.error('Bus threw while sending', {
          ...log,
          receiver,
          messageId: message.id,
          attempt: attempt + 1,
          error: describeError(error),
        });
      }
      if (attempt < maxRetries) {
        await sleep(2 ** (attempt + 1) * retryBaseDelayMs);
      }
    }

    logger.error('Giving up on message after transport retries', {
      ...log,
      receiver,
      messageId: message.id,
      maxRetries,
    });
    return false;
  }

  function armAckTimer(delivery: PendingDelivery): void {
    delivery.timer = setTimeout(() => {
      onAckTimeout(delivery).catch((error: unknown) => {
        logger.error('Ack timeout handling failed', {
          ...log,
          messageId: delivery.message.id,
          error: describeError(error),
        });
      });
    }, ackTimeoutMs);
  }

  function settle(delivery: PendingDelivery): void {
    delivery.settled = true;
    if (delivery.timer !== undefined) clearTimeout(delivery.timer);
    delivery.timer = undefined;
    pending.delete(delivery.message.id);
  }

  async function onAckTimeout(delivery: PendingDelivery): Promise<void> {
    delivery.timer = undefined;
    if (delivery.settled) return;

    const { message, receiver } = delivery;
    logger.warn('Timed out waiting for acknowledgment', {
      ...log,
      messageId: message.id,
      receiver,
      retries: delivery.retries,
    });

    if (delivery.retries >= maxRetries) {
      settle(delivery);
      await failDelivery(message, new DeliveryError(message.id, receiver, 'no acknowledgment'));
      return;
    }

    delivery.retries += 1;
    logger.info('Resending unacknowledged message', {
      ...log,
      messageId: message.id,
      receiver,
      retry: delivery.retries,
    });

    const delivered = await transmit(receiver, message);
    if (delivery.settled) return;
    if (!delivered) {
      settle(delivery);
      await failDelivery(message, new DeliveryError(message.id, receiver, 'transport retries exhausted'));
      return;
    }
    armAckTimer(delivery);
  }

  async function failDelivery(message: A2AMessage, error: DeliveryError): Promise<void> {
    logger.error(error.message, {
      ...log,
      code: error.code,
      messageId: message.id,
      kind: message.kind,
      receiver: message.receiver,
    });

    if (message.kind === 'response') {
      const notice = createSystemMessage(
        'error',
        { sender: definition.id, receiver: message.receiver, conversationId: message.conversationId },
        { error: 'delivery_failed', messageId: message.id, requestId: message.requestId },
      );
      await agent.send(message.receiver, notice);
      return;
    }

    await definition.onDeliveryFailure?.(message, error, agent);
  }

  function resolveAck(ack: AckMessage): void {
    const delivery = pending.get(ack.ackForMessageId);
    if (!delivery) {
      logger.debug('Ack for unknown or settled message', { ...log, ackFor: ack.ackForMessageId });
      return;
    }
    settle(delivery);
    if (!ack.success) {
      logger.warn('Receiver acknowledged with failure', {
        ...log,
        messageId: ack.ackForMessageId,
        error: ack.error,
      });
    }
  }

  // ─── Processing ─────────────────────────────────────────────

  async function dispatch(message: A2AMessage): Promise<boolean> {
    switch (message.kind) {
      case 'request':
        if (!definition.handleRequest) {
          logger.warn('No request handler', { ...log, requestType: message.requestType });
          return false;
        }
        return definition.handleRequest(message, agent);
      case 'response':
        return definition.handleResponse ? definition.handleResponse(message, agent) : true;
      case 'ack':
        resolveAck(message);
        return true;
      case 'error':
        logger.error('Received error message', {
          ...log,
          sender: message.sender,
          content: message.content,
        });
        return definition.handleNotification ? definition.handleNotification(message, agent) : true;
      case 'notification':
      case 'heartbeat':
      case 'register':
      case 'deregister':
      case 'frontend_notification':
        if (definition.handleNotification) return definition.handleNotification(message, agent);
        logger.debug('Received message', { ...log, kind: message.kind, sender: message.sender });
        return true;
      default: {
        const unhandled: never = message;
        logger.warn('Unknown message kind', { ...log, message: unhandled });
        return false;
      }
    }
  }

  async function processMessage(message: A2AMessage): Promise<void> {
    try {
      if (message.requiresAck) {
        const ack = createAck(
          { sender: definition.id, receiver: message.sender, conversationId: message.conversationId },
          message.id,
        );
        await agent.send(message.sender, ack);
      }

      const handled = await dispatch(message);
      if (!handled) {
        logger.warn('Handler reported failure', { ...log, messageId: message.id, kind: message.kind });
      }
    } catch (error) {
      logger.error('Error processing message', {
        ...log,
        messageId: message.id,
        kind: message.kind,
        error: describeError(error),
      });
    }
  }

  async function runLoop(channel: BoundedChannel<A2AMessage>, signal: AbortSignal): Promise<void> {
    while (running) {
      let message: A2AMessage;
      try {
        message = await channel.receive(signal);
      } catch (error) {
        if (error instanceof ReceiveAbortedError) return;
        throw error;
      }
      await processMessage(message);
    }
  }

  function onIndirect(raw: string): void {
    const decoded = decodeMessage(raw);
    if (!decoded.ok) {
      logger.warn('Dropping undecodable message from indirect topic', {
        ...log,
        error: decoded.error.message,
      });
      return;
    }
    processMessage(decoded.value).catch((error: unknown) => {
      logger.error('Indirect message processing failed', { ...log, error: describeError(error) });
    });
  }

  // ─── Agent ──────────────────────────────────────────────────

  const agent: Agent = {
    id: definition.id,
    type: definition.type,
    name: definition.name ?? definition.id,
    capabilities: [...definition.capabilities],

    async start() {
      if (running) return;

      await coordinator.register({
        agentId: definition.id,
        agentType: definition.type,
        capabilities: definition.capabilities,
      });
      const channel = bus.listen(definition.id);
      unsubscribeIndirect = await store.subscribe(agentTopic(definition.id), onIndirect);

      running = true;
      abort = new AbortController();
      loop = runLoop(channel, abort.signal).catch((error: unknown) => {
        running = false;
        logger.fatal('Processing loop crashed', { ...log, error: describeError(error) });
      });

      logger.info('Agent started', { ...log, agentType: definition.type });
    },

    async stop() {
      if (!running) return;
      running = false;

      abort?.abort();
      await loop;

      for (const delivery of [...pending.values()]) settle(delivery);

      await unsubscribeIndirect?.();
      unsubscribeIndirect = undefined;
      bus.releaseChannel(definition.id);
      await coordinator.deregister(definition.id);

      logger.info('Agent stopped', log);
    },

    isRunning: () => running,

    async send(receiver, message) {
      const outgoing: A2AMessage = { ...message, sender: definition.id };

      let delivery: PendingDelivery | undefined;
      if (outgoing.requiresAck) {
        delivery = { message: outgoing, receiver, retries: 0, settled: false };
        pending.set(outgoing.id, delivery);
      }

      const delivered = await transmit(receiver, outgoing);
      if (!delivery) return delivered;

      if (!delivered) {
        settle(delivery);
        return false;
      }
      if (!delivery.settled) armAckTimer(delivery);
      return true;
    },

    async sendRequest(receiver, spec, options = {}) {
      const request = createRequest(
        {
          sender: definition.id,
          receiver,
          conversationId: options.conversationId,
          metadata: options.metadata,
        },
        spec,
      );
      return agent.send(receiver, { ...request, id: options.requestId ?? request.id });
    },

    async sendResponse(receiver, spec, options = {}) {
      const response = createResponse(
        {
          sender: definition.id,
          receiver,
          conversationId: options.conversationId,
          requiresAck: options.requiresAck,
        },
        spec,
      );
      return agent.send(receiver, response);
    },

    async broadcastMessage(message) {
      return bus.broadcast({ ...message, sender: definition.id });
    },

    async notifyFrontend(receiver, notificationType, content, conversationId) {
      const notification = createFrontendNotification(
        { sender: definition.id, receiver, conversationId },
        { notificationType, agentName: definition.name ?? definition.id, agentId: definition.id, content },
      );
      return agent.send(receiver, notification);
    },

    pendingAckCount: () => pending.size,
  };

  return agent;
}
