/**
 * Agent Types
 *
 * Adapters handed to the agent and the status snapshot it reports.
 */

import type { AgentState } from '../core/types.js';
import type { ClipboardMonitor, PhotoLibrary, SmsInbox } from '../adapters/types.js';
import type { OrchestratorStats } from '../sync/orchestrator.js';
import type { DiscoverySession, EndpointOrigin, ResolverState, SourceKind } from '../sync/types.js';

// ═══════════════════════════════════════════════════════════════
// ADAPTERS
// ═══════════════════════════════════════════════════════════════

/** Each supplied adapter gets its own pipeline */
export interface AgentAdapters {
  photos?: PhotoLibrary;
  sms?: SmsInbox;
  clipboard?: ClipboardMonitor;
}

// ═══════════════════════════════════════════════════════════════
// STATUS
// ═══════════════════════════════════════════════════════════════

export interface AgentStatus {
  state: AgentState;
  uptimeMs: number;
  /** Base URL uploads currently go to */
  endpoint: string | null;
  endpointOrigin: EndpointOrigin | null;
  resolverState: ResolverState;
  discovery: DiscoverySession | null;
  dedupEntries: number;
  inFlightUploads: number;
  pipelines: Partial<Record<SourceKind, OrchestratorStats>>;
}
