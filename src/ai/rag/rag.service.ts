import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ConversationService } from './services/conversation.service';
import { RetrievalService } from './services/retrieval.service';
import { FormattingService } from './services/formatting.service';
import { GenerationService } from './services/generation.service';
import { QueryClassifierService } from './classifier/query-classifier.service';
import {
  ClassificationResult,
  QueryLabel,
} from './classifier/classification.types';
import type { Turn } from './history/conversation-history';
import {
  ConversationState,
  CycleDiagnostics,
  RouteDecision,
  RoutingResult,
  RoutingState,
  emptyDiagnostics,
} from './routing-state';
import {
  CycleCancelledError,
  RetrievalUnavailableError,
} from './errors/routing.errors';
import {
  APOLOGY_RESPONSE,
  CANNED_GREETINGS,
  DirectPromptKind,
} from '../prompts';
import type { ChatMessage } from '../llm/ollama.service';
import type { MetadataFilter } from '../vector-store/qdrant.service';
import { DEFAULT_RAG_CONFIG, RagConfig } from '../../config/rag.config';
import { getErrorMessage } from '../../common/utils/error.utils';

export interface HandleOptions {
  signal?: AbortSignal;
  filter?: MetadataFilter;
  /** Clear the session history before this cycle, in the same queue slot. */
  resetHistory?: boolean;
}

/** Per-cycle scratch data that does not outlive one `handle` call. */
interface Cycle {
  state: ConversationState;
  decision: RouteDecision | null;
  options: HandleOptions;
}

export function decideRoute(classification: ClassificationResult): RouteDecision {
  switch (classification.label) {
    case QueryLabel.RAG_REQUIRED:
      return { kind: 'retrieval' };
    case QueryLabel.GREETING:
      return { kind: 'direct', prompt: 'greeting' };
    case QueryLabel.DIRECT_ANSWER:
      return { kind: 'direct', prompt: 'direct_answer' };
    case QueryLabel.UNCLEAR:
      return { kind: 'clarify' };
  }
}

@Injectable()
export class RagService {
  private readonly logger = new Logger(RagService.name);
  private readonly config: RagConfig;

  constructor(
    private readonly conversationService: ConversationService,
    private readonly queryClassifier: QueryClassifierService,
    private readonly retrievalService: RetrievalService,
    private readonly formattingService: FormattingService,
    private readonly generationService: GenerationService,
    private readonly configService: ConfigService,
  ) {
    this.config =
      this.configService.get<RagConfig>('rag') ?? DEFAULT_RAG_CONFIG;
  }

  /**
   * Runs one routing cycle for the session. Cycles of one session are
   * serialised; backend failures come back as a fallback response with
   * diagnostics flags. Only cancellation rejects.
   */
  handle(
    sessionId: string,
    utterance: string,
    options: HandleOptions = {},
  ): Promise<RoutingResult> {
    return this.conversationService.withSession(sessionId, (state) =>
      this.runCycle(state, utterance, options),
    );
  }

  reset(sessionId: string): Promise<void> {
    return this.conversationService.runExclusive(sessionId, () =>
      this.conversationService.reset(sessionId),
    );
  }

  getHistory(sessionId: string): Promise<readonly Turn[]> {
    return this.conversationService.getHistory(sessionId);
  }

  generateSessionId(): string {
    return this.conversationService.generateSessionId();
  }

  private async runCycle(
    state: ConversationState,
    utterance: string,
    options: HandleOptions,
  ): Promise<RoutingResult> {
    const startTime = Date.now();
    const { sessionId } = state;
    if (options.resetHistory) {
      await this.conversationService.reset(sessionId);
    }
    this.begin(state, utterance);

    this.logger.log(`\n${'='.repeat(80)}`);
    this.logger.log(
      `🔵 NEW QUERY: "${this.formattingService.truncate(utterance, 120)}"`,
    );
    this.logger.log(`Session: ${sessionId}`);
    this.logger.log(`${'='.repeat(80)}\n`);

    const cycle: Cycle = { state, decision: null, options };
    let current = RoutingState.START;
    state.diagnostics.path.push(current);

    while (current !== RoutingState.DONE) {
      try {
        current = await this.transition(current, cycle, startTime);
      } catch (error) {
        if (error instanceof CycleCancelledError) {
          this.clearTransient(state);
          this.logger.warn(`⏹ Cycle cancelled during ${current}`);
          throw error;
        }
        if (current === RoutingState.RESPONDED) throw error;

        this.logger.error(
          `❌ Unexpected failure in ${current}: ${getErrorMessage(error)}`,
        );
        this.recordFailure(state, current, error);
        state.response = APOLOGY_RESPONSE;
        current = RoutingState.RESPONDED;
      }
      state.diagnostics.path.push(current);
    }

    this.logger.log(`${'='.repeat(80)}`);
    this.logger.log(`✅ COMPLETED in ${state.diagnostics.elapsedMs}ms`);
    this.logger.log(`${'='.repeat(80)}\n`);

    return {
      response: state.response,
      diagnostics: this.snapshotDiagnostics(state.diagnostics),
    };
  }

  private async transition(
    current: RoutingState,
    cycle: Cycle,
    startTime: number,
  ): Promise<RoutingState> {
    switch (current) {
      case RoutingState.START:
        return this.classify(cycle);
      case RoutingState.CLASSIFIED:
        return this.route(cycle);
      case RoutingState.RETRIEVING:
        return this.retrieve(cycle);
      case RoutingState.CONTEXT_FORMATTED:
        return RoutingState.GENERATING;
      case RoutingState.GENERATING:
        return this.generateGrounded(cycle);
      case RoutingState.DIRECT_GENERATING:
        return this.generateDirect(cycle);
      case RoutingState.RESPONDED:
        return this.finish(cycle, startTime);
      case RoutingState.DONE:
        return RoutingState.DONE;
    }
  }

  // ===== START → CLASSIFIED =====
  private classify({ state }: Cycle): RoutingState {
    const recent = state.history.window(this.config.classifierHistoryWindow);
    const classification = this.queryClassifier.classify(
      state.utterance,
      recent,
    );

    state.classification = classification;
    state.diagnostics.label = classification.label;
    state.diagnostics.confidence = classification.confidence;
    state.diagnostics.matchedSignals = [...classification.matchedSignals];

    this.logger.log(
      `📋 Classification: ${classification.label} (${(classification.confidence * 100).toFixed(1)}%)`,
    );
    return RoutingState.CLASSIFIED;
  }

  // ===== CLASSIFIED → RETRIEVING | DIRECT_GENERATING =====
  private route(cycle: Cycle): RoutingState {
    const { state } = cycle;
    if (!state.classification) {
      throw new Error('Routing requested before classification');
    }

    const decision = decideRoute(state.classification);
    cycle.decision = decision;
    state.diagnostics.route = decision.kind;

    switch (decision.kind) {
      case 'retrieval':
        this.logger.log('🔍 ROUTE: knowledge base');
        return RoutingState.RETRIEVING;
      case 'direct':
        this.logger.log(`⚡ ROUTE: direct (${decision.prompt})`);
        return RoutingState.DIRECT_GENERATING;
      case 'clarify':
        this.logger.log('❓ ROUTE: clarification fallback');
        return RoutingState.DIRECT_GENERATING;
    }
  }

  // ===== RETRIEVING → CONTEXT_FORMATTED =====
  private async retrieve(cycle: Cycle): Promise<RoutingState> {
    const { state, options } = cycle;
    this.throwIfCancelled(cycle);
    state.diagnostics.retrievalBackend = this.retrievalService.getBackendName();

    try {
      state.retrievedDocs = await this.retrievalService.retrieve(
        state.utterance,
        this.config.topK,
        this.config.similarityThreshold,
        { filter: options.filter, signal: options.signal },
      );
    } catch (error) {
      this.throwIfCancelled(cycle, error);
      if (!(error instanceof RetrievalUnavailableError)) throw error;

      this.logger.warn(`⚠ Retrieval unavailable: ${error.message}`);
      state.retrievedDocs = [];
      this.recordFailure(state, RoutingState.RETRIEVING, error);
    }
    this.throwIfCancelled(cycle);

    state.diagnostics.retrievalCount = state.retrievedDocs.length;
    state.context = this.formattingService.formatContext(state.retrievedDocs);
    this.logger.log(
      `├─ Context: ${state.retrievedDocs.length} docs, ${state.context.length} chars`,
    );
    return RoutingState.CONTEXT_FORMATTED;
  }

  // ===== GENERATING → RESPONDED =====
  private async generateGrounded(cycle: Cycle): Promise<RoutingState> {
    const { state } = cycle;
    const messages = this.generationService.buildRagMessages(
      state.utterance,
      state.context,
      this.historyWindow(state),
    );
    await this.runGeneration(cycle, messages, RoutingState.GENERATING);
    return RoutingState.RESPONDED;
  }

  // ===== DIRECT_GENERATING → RESPONDED =====
  private async generateDirect(cycle: Cycle): Promise<RoutingState> {
    const { state, decision } = cycle;
    const prompt: DirectPromptKind =
      decision?.kind === 'direct' ? decision.prompt : 'clarify';
    const greetingKind = state.classification?.greetingKind;

    if (prompt === 'greeting' && this.config.cannedGreetings && greetingKind) {
      state.response = CANNED_GREETINGS[greetingKind];
      state.diagnostics.generationBackend = 'canned';
      return RoutingState.RESPONDED;
    }

    const messages = this.generationService.buildDirectMessages(
      state.utterance,
      prompt,
      this.historyWindow(state),
    );
    await this.runGeneration(cycle, messages, RoutingState.DIRECT_GENERATING);
    return RoutingState.RESPONDED;
  }

  private async runGeneration(
    cycle: Cycle,
    messages: ChatMessage[],
    stage: RoutingState.GENERATING | RoutingState.DIRECT_GENERATING,
  ): Promise<void> {
    const { state, options } = cycle;
    this.throwIfCancelled(cycle);
    state.diagnostics.generationBackend = this.generationService.getBackendName();

    try {
      state.response = await this.generationService.generate(
        messages,
        options.signal,
      );
      this.logger.log(
        `✨ Answer generated: ${this.formattingService.truncate(state.response, 100)}`,
      );
    } catch (error) {
      this.throwIfCancelled(cycle, error);
      this.logger.warn(`⚠ Generation failed: ${getErrorMessage(error)}`);
      state.response = APOLOGY_RESPONSE;
      this.recordFailure(state, stage, error);
    }
    this.throwIfCancelled(cycle);
  }

  // ===== RESPONDED → DONE =====
  private async finish(
    { state }: Cycle,
    startTime: number,
  ): Promise<RoutingState> {
    state.history.appendExchange(state.utterance, state.response);
    await this.conversationService.commit(state);

    state.diagnostics.elapsedMs = Date.now() - startTime;
    this.clearTransient(state);
    this.logger.log(`💾 History updated (${state.history.length} turns)`);
    return RoutingState.DONE;
  }

  /**
   * Flags the failing stage. Retrieval failures get the retrieval flag; any
   * other stage gets the generation flag.
   */
  private recordFailure(
    state: ConversationState,
    stage: RoutingState,
    error: unknown,
  ): void {
    const message = getErrorMessage(error);
    const { diagnostics } = state;
    diagnostics.failedStage = stage;
    if (stage === RoutingState.RETRIEVING) {
      diagnostics.retrievalError = true;
      diagnostics.errors.retrieval = message;
    } else {
      diagnostics.generationError = true;
      diagnostics.errors.generation = message;
    }
  }

  private begin(state: ConversationState, utterance: string): void {
    state.utterance = utterance;
    state.classification = null;
    state.response = '';
    state.diagnostics = emptyDiagnostics(state.sessionId);
    this.clearTransient(state);
  }

  private clearTransient(state: ConversationState): void {
    state.retrievedDocs = [];
    state.context = '';
  }

  private historyWindow(state: ConversationState): readonly Turn[] {
    if (!this.config.enableConversationHistory) return [];
    return state.history.window(this.config.maxHistoryLength * 2);
  }

  private throwIfCancelled({ state, options }: Cycle, cause?: unknown): void {
    if (options.signal?.aborted) {
      throw new CycleCancelledError(state.sessionId, {
        cause: cause ?? options.signal.reason,
      });
    }
  }

  private snapshotDiagnostics(diagnostics: CycleDiagnostics): CycleDiagnostics {
    return {
      ...diagnostics,
      matchedSignals: [...diagnostics.matchedSignals],
      errors: { ...diagnostics.errors },
      path: [...diagnostics.path],
    };
  }
}
