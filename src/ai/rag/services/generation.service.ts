import { Injectable, Logger } from '@nestjs/common';
import { ChatMessage, OllamaService } from '../../llm/ollama.service';
import type { Turn } from '../history/conversation-history';
import {
  GenerationTimeoutError,
  GenerationUnavailableError,
} from '../errors/routing.errors';
import {
  DIRECT_SYSTEM_PROMPTS,
  DirectPromptKind,
  RAG_SYSTEM_PROMPT,
  buildContextMessage,
  buildQuestionMessage,
} from '../../prompts';
import {
  getErrorMessage,
  isAxiosError,
  isTimeoutError,
} from '../../../common/utils/error.utils';

function toMessages(history: readonly Turn[]): ChatMessage[] {
  return history.map((turn) => ({ role: turn.role, content: turn.content }));
}

@Injectable()
export class GenerationService {
  private readonly logger = new Logger(GenerationService.name);

  constructor(private readonly ollamaService: OllamaService) {}

  /**
   * system instruction, context block, prior turns, then the question
   */
  buildRagMessages(
    query: string,
    context: string,
    history: readonly Turn[],
  ): ChatMessage[] {
    return [
      { role: 'system', content: RAG_SYSTEM_PROMPT },
      { role: 'user', content: buildContextMessage(context) },
      ...toMessages(history),
      { role: 'user', content: buildQuestionMessage(query) },
    ];
  }

  buildDirectMessages(
    query: string,
    kind: DirectPromptKind,
    history: readonly Turn[],
  ): ChatMessage[] {
    return [
      { role: 'system', content: DIRECT_SYSTEM_PROMPTS[kind] },
      ...toMessages(history),
      { role: 'user', content: query },
    ];
  }

  async generate(
    messages: ChatMessage[],
    signal?: AbortSignal,
  ): Promise<string> {
    this.logger.debug(
      `🤖 Generating answer from ${messages.length} messages (${messages.reduce(
        (sum, m) => sum + m.content.length,
        0,
      )} chars)`,
    );

    try {
      return await this.ollamaService.chat(messages, { signal });
    } catch (error) {
      if (isAxiosError(error) && error.code === 'ERR_CANCELED') {
        throw error;
      }
      if (isTimeoutError(error)) {
        throw new GenerationTimeoutError(
          `Chat completion timed out: ${getErrorMessage(error)}`,
          { cause: error },
        );
      }
      throw new GenerationUnavailableError(
        `Chat completion failed: ${getErrorMessage(error)}`,
        { cause: error },
      );
    }
  }

  getBackendName(): string {
    return this.ollamaService.getChatBackend();
  }
}
