import { Injectable, Logger, Inject } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CACHE_MANAGER } from '@nestjs/cache-manager';
import type { Cache } from 'cache-manager';
import {
  ConversationHistory,
  Turn,
  createTurn,
} from '../history/conversation-history';
import { ConversationState, emptyDiagnostics } from '../routing-state';
import { DEFAULT_RAG_CONFIG, RagConfig } from '../../../config/rag.config';
import { getErrorMessage } from '../../../common/utils/error.utils';

const HISTORY_TTL = 1800000; // 30 minutes

function isTurn(value: unknown): value is Turn {
  if (typeof value !== 'object' || value === null) return false;
  if (!('role' in value) || !('content' in value)) return false;
  return (
    (value.role === 'user' || value.role === 'assistant') &&
    typeof value.content === 'string'
  );
}

/**
 * Owns per-session conversation state. State lives in memory only while a
 * session has queued or running work; between requests the cache snapshot is
 * the only copy, so its TTL ends idle sessions.
 */
@Injectable()
export class ConversationService {
  private readonly logger = new Logger(ConversationService.name);
  private readonly active = new Map<string, ConversationState>();
  private readonly queues = new Map<string, Promise<unknown>>();
  private readonly pending = new Map<string, number>();
  private readonly maxHistoryLength: number;

  constructor(
    @Inject(CACHE_MANAGER) private cacheManager: Cache,
    private readonly configService: ConfigService,
  ) {
    const rag = this.configService.get<RagConfig>('rag') ?? DEFAULT_RAG_CONFIG;
    this.maxHistoryLength = rag.maxHistoryLength;
  }

  /**
   * Runs `task` with the session's state inside the session queue, loading
   * the state from the cache snapshot if no earlier task holds it.
   */
  withSession<T>(
    sessionId: string,
    task: (state: ConversationState) => Promise<T>,
  ): Promise<T> {
    return this.runExclusive(sessionId, async () => {
      let state = this.active.get(sessionId);
      if (!state) {
        state = await this.loadState(sessionId);
        this.active.set(sessionId, state);
      }
      return task(state);
    });
  }

  private async loadState(sessionId: string): Promise<ConversationState> {
    const turns = await this.readSnapshot(sessionId);
    if (turns.length > 0) {
      this.logger.debug(
        `⚡ Rehydrated ${turns.length} turns for session: ${sessionId}`,
      );
    } else {
      this.logger.debug(`🆕 Creating new conversation session: ${sessionId}`);
    }

    return {
      sessionId,
      history: new ConversationHistory(this.maxHistoryLength, turns),
      utterance: '',
      classification: null,
      retrievedDocs: [],
      context: '',
      response: '',
      diagnostics: emptyDiagnostics(sessionId),
    };
  }

  async getHistory(sessionId: string): Promise<readonly Turn[]> {
    const state = this.active.get(sessionId);
    if (state) return state.history.all();
    return Object.freeze(await this.readSnapshot(sessionId));
  }

  /**
   * Mirrors the committed turn log into the cache.
   */
  async commit(state: ConversationState): Promise<void> {
    const cacheKey = `history:${state.sessionId}`;
    try {
      await this.cacheManager.set(cacheKey, state.history.all(), HISTORY_TTL);
      this.logger.debug(
        `💾 Cached conversation history for session: ${state.sessionId}`,
      );
    } catch (error) {
      this.logger.warn(
        `Failed to cache history update: ${getErrorMessage(error)}`,
      );
    }
  }

  async reset(sessionId: string): Promise<void> {
    const state = this.active.get(sessionId);
    if (state) {
      state.history.reset();
      state.retrievedDocs = [];
      state.context = '';
      state.response = '';
      state.classification = null;
    }

    try {
      await this.cacheManager.del(`history:${sessionId}`);
    } catch (error) {
      this.logger.warn(`Failed to drop cached history: ${getErrorMessage(error)}`);
    }
    this.logger.log(`🧹 Conversation reset for session: ${sessionId}`);
  }

  /**
   * Runs `task` after every earlier task queued for the same session has
   * settled. Different sessions never wait on each other. When the last
   * queued task settles the session is dropped from memory.
   */
  runExclusive<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(sessionId) ?? Promise.resolve();
    this.pending.set(sessionId, (this.pending.get(sessionId) ?? 0) + 1);

    const run = previous
      .then(task, task)
      .finally(() => this.release(sessionId));
    this.queues.set(
      sessionId,
      run.then(
        () => undefined,
        () => undefined,
      ),
    );
    return run;
  }

  generateSessionId(): string {
    return `session_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
  }

  private release(sessionId: string): void {
    const remaining = (this.pending.get(sessionId) ?? 1) - 1;
    if (remaining > 0) {
      this.pending.set(sessionId, remaining);
      return;
    }
    this.pending.delete(sessionId);
    this.queues.delete(sessionId);
    this.active.delete(sessionId);
  }

  private async readSnapshot(sessionId: string): Promise<Turn[]> {
    try {
      const cached = await this.cacheManager.get<unknown>(
        `history:${sessionId}`,
      );
      if (!Array.isArray(cached)) return [];
      return cached
        .filter(isTurn)
        .map((turn) => createTurn(turn.role, turn.content));
    } catch (error) {
      this.logger.warn(`Failed to get cached history: ${getErrorMessage(error)}`);
      return [];
    }
  }
}
