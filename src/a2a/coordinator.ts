/**
 * Coordinator — the agent registry.
 *
 * Holds one registration per agent id and an ordered index of agent ids per
 * type, so `findByType` returns the earliest still-registered agent.
 * Registrations are mirrored to the KeyValueStore for external observers;
 * the mirror is best-effort and never read back.
 */
import type { Logger } from '@/observability/logger.js';
import type { KeyValueStore } from '@/storage/types.js';
import type { AgentRegistration, AgentStatus } from './types.js';

// ─── Types ──────────────────────────────────────────────────────

export interface RegistrationInput {
  agentId: string;
  agentType: string;
  capabilities: string[];
  status?: AgentStatus;
}

export interface Coordinator {
  /** Upsert. `false` only for an empty id or type. */
  register(input: RegistrationInput): Promise<boolean>;
  /** `false` when the agent was not registered. */
  deregister(agentId: string): Promise<boolean>;
  get(agentId: string): AgentRegistration | null;
  findByType(agentType: string): AgentRegistration | null;
  listAgents(): AgentRegistration[];
  /** Agent ids per type, in registration order. */
  listTypes(): Record<string, string[]>;
}

interface CoordinatorDeps {
  store: KeyValueStore;
  logger: Logger;
  now?: () => Date;
}

export const registrationKey = (agentId: string): string => `a2a:agent:${agentId}`;

// ─── Factory Function ───────────────────────────────────────────

export function createCoordinator(deps: CoordinatorDeps): Coordinator {
  const { store, logger } = deps;
  const now = deps.now ?? (() => new Date());
  const agents = new Map<string, AgentRegistration>();
  const byType = new Map<string, string[]>();

  function unindex(agentId: string, agentType: string): void {
    const ids = byType.get(agentType);
    if (!ids) return;
    const remaining = ids.filter((id) => id !== agentId);
    if (remaining.length === 0) {
      byType.delete(agentType);
    } else {
      byType.set(agentType, remaining);
    }
  }

  async function mirror(operation: 'set' | 'delete', registration: AgentRegistration): Promise<void> {
    try {
      if (operation === 'set') {
        await store.set(registrationKey(registration.agentId), JSON.stringify(registration));
      } else {
        await store.delete(registrationKey(registration.agentId));
      }
    } catch (error) {
      logger.warn('Failed to mirror agent registration', {
        component: 'coordinator',
        agentId: registration.agentId,
        operation,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return {
    async register(input) {
      if (input.agentId === '' || input.agentType === '') {
        logger.warn('Rejected registration with empty id or type', {
          component: 'coordinator',
          agentId: input.agentId,
          agentType: input.agentType,
        });
        return false;
      }

      const previous = agents.get(input.agentId);
      if (previous && previous.agentType !== input.agentType) {
        unindex(input.agentId, previous.agentType);
      }

      const registration: AgentRegistration = {
        agentId: input.agentId,
        agentType: input.agentType,
        capabilities: [...input.capabilities],
        status: input.status ?? 'active',
        registeredAt: now(),
      };
      agents.set(input.agentId, registration);

      const ids = byType.get(input.agentType) ?? [];
      if (!ids.includes(input.agentId)) {
        byType.set(input.agentType, [...ids, input.agentId]);
      }

      await mirror('set', registration);

      logger.info('Agent registered', {
        component: 'coordinator',
        agentId: input.agentId,
        agentType: input.agentType,
        replaced: previous !== undefined,
      });
      return true;
    },

    async deregister(agentId) {
      const registration = agents.get(agentId);
      if (!registration) return false;

      agents.delete(agentId);
      unindex(agentId, registration.agentType);
      await mirror('delete', registration);

      logger.info('Agent deregistered', { component: 'coordinator', agentId });
      return true;
    },

    get(agentId) {
      return agents.get(agentId) ?? null;
    },

    findByType(agentType) {
      for (const agentId of byType.get(agentType) ?? []) {
        const registration = agents.get(agentId);
        if (registration) return registration;
      }
      return null;
    },

    listAgents() {
      return [...agents.values()].map((registration) => ({
        ...registration,
        capabilities: [...registration.capabilities],
      }));
    },

    listTypes() {
      return Object.fromEntries([...byType.entries()].map(([type, ids]) => [type, [...ids]]));
    },
  };
}
