/**
 * Agent Manager — starts and stops a fixed set of agents together.
 */
import type { Agent } from '@/a2a/agent-runtime.js';
import type { Logger } from '@/observability/logger.js';

export interface AgentStatusReport {
  running: boolean;
  total_agents: number;
  agents: Array<{
    agent_id: string;
    agent_type: string;
    capabilities: string[];
    is_running: boolean;
  }>;
}

export interface AgentManager {
  /** Start every agent; if one fails, the others are stopped and the error rethrown. */
  startAll(): Promise<void>;
  stopAll(): Promise<void>;
  isRunning(): boolean;
  getById(agentId: string): Agent | null;
  /** First agent of the type, in the order given at creation. */
  getByType(agentType: string): Agent | null;
  getStatus(): AgentStatusReport;
}

interface AgentManagerDeps {
  agents: readonly Agent[];
  logger: Logger;
}

export function createAgentManager(deps: AgentManagerDeps): AgentManager {
  const agents = [...deps.agents];
  const { logger } = deps;
  const log = { component: 'agent-manager' };
  let running = false;

  async function stopEach(): Promise<void> {
    const results = await Promise.allSettled(agents.map((agent) => agent.stop()));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        logger.error('Agent failed to stop', {
          ...log,
          agentId: agents[index]?.id,
          error: result.reason instanceof Error ? result.reason.message : String(result.reason),
        });
      }
    });
  }

  return {
    async startAll() {
      if (running) {
        logger.warn('Agents are already running', log);
        return;
      }

      logger.info('Starting agents', { ...log, agents: agents.map((agent) => agent.id) });
      try {
        await Promise.all(agents.map((agent) => agent.start()));
      } catch (error) {
        logger.error('Agent startup failed, stopping the rest', {
          ...log,
          error: error instanceof Error ? error.message : String(error),
        });
        await stopEach();
        throw error;
      }
      running = true;
      logger.info('All agents started', { ...log, total: agents.length });
    },

    async stopAll() {
      if (!running) {
        logger.warn('Agents are not running', log);
        return;
      }
      await stopEach();
      running = false;
      logger.info('All agents stopped', log);
    },

    isRunning: () => running,

    getById: (agentId) => agents.find((agent) => agent.id === agentId) ?? null,

    getByType: (agentType) => agents.find((agent) => agent.type === agentType) ?? null,

    getStatus: () => ({
      running,
      total_agents: agents.length,
      agents: agents.map((agent) => ({
        agent_id: agent.id,
        agent_type: agent.type,
        capabilities: [...agent.capabilities],
        is_running: agent.isRunning(),
      })),
    }),
  };
}
