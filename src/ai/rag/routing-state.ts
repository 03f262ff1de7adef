import type { ClassificationResult } from './classifier/classification.types';
import type { ConversationHistory } from './history/conversation-history';
import type { RetrievedDocument } from './services/retrieval.service';

export enum RoutingState {
  START = 'start',
  CLASSIFIED = 'classified',
  RETRIEVING = 'retrieving',
  CONTEXT_FORMATTED = 'context_formatted',
  GENERATING = 'generating',
  DIRECT_GENERATING = 'direct_generating',
  RESPONDED = 'responded',
  DONE = 'done',
}

/** One routing decision per cycle, dispatched with a switch. */
export type RouteDecision =
  | { kind: 'retrieval' }
  | { kind: 'direct'; prompt: 'greeting' | 'direct_answer' }
  | { kind: 'clarify' };

export interface CycleDiagnostics {
  sessionId: string;
  label: string;
  confidence: number;
  matchedSignals: string[];
  route: RouteDecision['kind'] | null;
  retrievalCount: number;
  retrievalBackend: string | null;
  generationBackend: string | null;
  elapsedMs: number;
  retrievalError: boolean;
  generationError: boolean;
  /** State in which the last recovered failure happened. */
  failedStage: RoutingState | null;
  errors: {
    retrieval?: string;
    generation?: string;
  };
  path: RoutingState[];
}

/**
 * Mutable per-session state threaded through every stage of a cycle.
 * Only the orchestrator touches it while a cycle is running.
 */
export interface ConversationState {
  readonly sessionId: string;
  readonly history: ConversationHistory;
  utterance: string;
  classification: ClassificationResult | null;
  retrievedDocs: RetrievedDocument[];
  context: string;
  response: string;
  diagnostics: CycleDiagnostics;
}

export interface RoutingResult {
  response: string;
  diagnostics: CycleDiagnostics;
}

export function emptyDiagnostics(sessionId: string): CycleDiagnostics {
  return {
    sessionId,
    label: 'none',
    confidence: 0,
    matchedSignals: [],
    route: null,
    retrievalCount: 0,
    retrievalBackend: null,
    generationBackend: null,
    elapsedMs: 0,
    retrievalError: false,
    generationError: false,
    failedStage: null,
    errors: {},
    path: [],
  };
}
