export type RoutingStage = 'retrieval' | 'generation' | 'cycle';

/**
 * Base class for failures raised inside a routing cycle.
 * Retrieval and generation failures are recovered by the orchestrator;
 * only cancellation reaches the caller.
 */
export abstract class RoutingError extends Error {
  abstract readonly stage: RoutingStage;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class RetrievalUnavailableError extends RoutingError {
  readonly stage = 'retrieval';
}

export class GenerationUnavailableError extends RoutingError {
  readonly stage = 'generation';
}

export class GenerationTimeoutError extends RoutingError {
  readonly stage = 'generation';
}

export class CycleCancelledError extends RoutingError {
  readonly stage = 'cycle';

  constructor(sessionId: string, options?: { cause?: unknown }) {
    super(`Routing cycle cancelled for session ${sessionId}`, options);
  }
}
