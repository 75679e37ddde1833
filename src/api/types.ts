import type { AgentManager } from '@/agents/agent-manager.js';
import type { OrchestratorAgent } from '@/agents/orchestrator.js';
import type { ConnectionGateway } from '@/gateway/connection-gateway.js';
import type { RecoveryManager } from '@/gateway/recovery.js';
import type { Logger } from '@/observability/logger.js';
import type { ConversationMemory } from '@/sessions/conversation-memory.js';
import type { PersonalizationStore } from '@/sessions/personalization.js';
import type { SessionManager } from '@/sessions/session-manager.js';
import type { KeyValueStore } from '@/storage/types.js';

// ─── API Response Envelope ───────────────────────────────────────

export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: ApiError;
}

export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

// ─── Route Dependencies (DI) ───────────────────────────────────

/** Dependencies injected into all route plugins. */
export interface RouteDependencies {
  store: KeyValueStore;
  sessions: SessionManager;
  memory: ConversationMemory;
  personalization: PersonalizationStore;
  gateway: ConnectionGateway;
  recovery: RecoveryManager;
  agentManager: AgentManager;
  orchestrator: OrchestratorAgent;
  logger: Logger;
}
