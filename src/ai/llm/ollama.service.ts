import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { firstValueFrom } from 'rxjs';
import { CanceledError } from 'axios';
import { OllamaConfig } from '../../config/ollama.config';
import {
  getErrorMessage,
  isAxiosError,
} from '../../common/utils/error.utils';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatOptions {
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

interface OllamaTagsResponse {
  models?: Array<{ name: string; size: number; modified_at: string }>;
}

interface OllamaVersionResponse {
  version?: string;
}

interface OllamaEmbedResponse {
  embeddings?: number[][];
}

interface OllamaChatResponse {
  model?: string;
  message?: { role: string; content: string };
  done?: boolean;
}

interface OpenAIChatResponse {
  choices?: Array<{ message?: { content?: string } }>;
}

@Injectable()
export class OllamaService implements OnModuleInit {
  private readonly logger = new Logger(OllamaService.name);
  private readonly config: OllamaConfig;

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
  ) {
    const config = this.configService.get<OllamaConfig>('ollama');
    if (!config) {
      throw new Error('Ollama configuration namespace "ollama" is not loaded');
    }
    this.config = config;

    if (this.config.useOpenAI) {
      this.logger.log('🔵 OpenAI mode enabled - using GPT for completions');
      if (!this.config.openAIApiKey) {
        this.logger.warn('⚠ USE_OPENAI=1 but OPENAI_API_KEY is not set!');
      }
    }
  }

  /**
   * Check Ollama health and required models on module startup
   */
  async onModuleInit() {
    const isHealthy = await this.checkHealth();
    if (isHealthy) {
      await this.validateRequiredModels();
    }
  }

  /**
   * Check if Ollama service is running
   */
  async checkHealth(): Promise<boolean> {
    try {
      this.logger.debug(
        `🔍 Checking Ollama health at ${this.config.baseUrl}...`,
      );

      const response = await firstValueFrom(
        this.httpService.get<OllamaVersionResponse>(
          `${this.config.baseUrl}/api/version`,
          { timeout: 5000 },
        ),
      );

      this.logger.log(
        `✓ Ollama service is healthy (version: ${response.data.version || 'unknown'})`,
      );
      return true;
    } catch (error) {
      this.logger.error(
        `✗ Ollama service is not accessible: ${getErrorMessage(error)}`,
      );

      if (process.env.NODE_ENV === 'development') {
        this.logger.warn('⚠ Make sure Ollama is running: ollama serve');
      }

      return false;
    }
  }

  /**
   * List all available models
   */
  async listModels(): Promise<string[]> {
    try {
      const response = await firstValueFrom(
        this.httpService.get<OllamaTagsResponse>(
          `${this.config.baseUrl}/api/tags`,
          { timeout: 10000 },
        ),
      );

      const modelNames = (response.data.models || []).map(
        (model) => model.name,
      );

      this.logger.log(
        `Found ${modelNames.length} models: ${modelNames.join(', ')}`,
      );

      return modelNames;
    } catch (error) {
      this.logger.error(`Failed to list models: ${getErrorMessage(error)}`);
      return [];
    }
  }

  private async validateRequiredModels(): Promise<void> {
    const models = await this.listModels();

    const requiredModels = [this.config.embeddingModel];
    if (!this.config.useOpenAI) requiredModels.push(this.config.chatModel);

    const missingModels = requiredModels.filter(
      (model) => !models.some((m) => m.includes(model.split(':')[0])),
    );

    if (missingModels.length > 0) {
      this.logger.warn(
        `⚠ Missing required models: ${missingModels.join(', ')}. ` +
          `Pull them with: ollama pull ${missingModels.join(' && ollama pull ')}`,
      );
    } else {
      this.logger.log(`✓ All required models are available`);
    }
  }

  /**
   * Generate embedding for a single text
   */
  async generateEmbedding(text: string, signal?: AbortSignal): Promise<number[]> {
    const model = this.config.embeddingModel;

    try {
      this.logger.debug(
        `Generating embedding for text (${text.length} chars) with model ${model}`,
      );

      const response = await this.retryRequest(
        () =>
          firstValueFrom(
            this.httpService.post<OllamaEmbedResponse>(
              `${this.config.baseUrl}/api/embed`,
              { model, input: text },
              { timeout: this.config.embeddingTimeout, signal },
            ),
          ),
        this.config.maxRetries,
        signal,
      );

      const embedding = response.data.embeddings?.[0];

      if (!embedding || !Array.isArray(embedding)) {
        throw new Error('Invalid embedding response format');
      }

      this.logger.debug(
        `✓ Generated embedding with ${embedding.length} dimensions`,
      );

      return embedding;
    } catch (error) {
      this.logger.error(`Failed to generate embedding: ${getErrorMessage(error)}`);

      if (isAxiosError(error) && error.response?.status === 404) {
        throw new Error(
          `Model "${model}" not found. Pull it with: ollama pull ${model}`,
          { cause: error },
        );
      }

      throw error;
    }
  }

  /**
   * Send a role-tagged message sequence to the chat endpoint
   */
  async chat(messages: ChatMessage[], options?: ChatOptions): Promise<string> {
    if (messages.length === 0) {
      throw new Error('Messages list cannot be empty');
    }

    if (this.config.useOpenAI) {
      return this.chatOpenAI(messages, options);
    }

    const model = this.config.chatModel;

    try {
      this.logger.debug(
        `Generating chat completion with model ${model} (${messages.length} messages)`,
      );

      const response = await this.retryRequest(
        () =>
          firstValueFrom(
            this.httpService.post<OllamaChatResponse>(
              `${this.config.baseUrl}/api/chat`,
              {
                model,
                messages,
                stream: false,
                options: {
                  temperature: options?.temperature ?? 0.7,
                  num_predict: options?.maxTokens ?? 1000,
                },
              },
              { timeout: this.config.timeout, signal: options?.signal },
            ),
          ),
        this.config.maxRetries,
        options?.signal,
      );

      const completion = response.data.message?.content?.trim();

      if (!completion) {
        throw new Error('Empty response from Ollama chat API');
      }

      this.logger.debug(`✓ Generated completion (${completion.length} chars)`);

      return completion;
    } catch (error) {
      this.logger.error(`Failed to generate completion: ${getErrorMessage(error)}`);

      if (isAxiosError(error) && error.response?.status === 404) {
        throw new Error(
          `Model "${model}" not found. Pull it with: ollama pull ${model}`,
          { cause: error },
        );
      }

      throw error;
    }
  }

  // ===== OPENAI COMPLETION METHODS =====

  private async chatOpenAI(
    messages: ChatMessage[],
    options?: ChatOptions,
  ): Promise<string> {
    try {
      this.logger.debug(
        `Generating completion with OpenAI model ${this.config.openAIModel}`,
      );

      const response = await this.retryRequest(
        () =>
          firstValueFrom(
            this.httpService.post<OpenAIChatResponse>(
              `${this.config.openAIBaseUrl}/chat/completions`,
              {
                model: this.config.openAIModel,
                messages,
                temperature: options?.temperature ?? 0.7,
                max_tokens: options?.maxTokens ?? 500,
                stream: false,
              },
              {
                timeout: this.config.timeout,
                signal: options?.signal,
                headers: {
                  Authorization: `Bearer ${this.config.openAIApiKey}`,
                  'Content-Type': 'application/json',
                },
              },
            ),
          ),
        this.config.maxRetries,
        options?.signal,
      );

      const completion = response.data.choices?.[0]?.message?.content?.trim();

      if (!completion) {
        throw new Error('Invalid OpenAI completion response format');
      }

      this.logger.debug(
        `✓ Generated OpenAI completion (${completion.length} chars)`,
      );

      return completion;
    } catch (error) {
      this.logger.error(
        `Failed to generate OpenAI completion: ${getErrorMessage(error)}`,
      );

      if (isAxiosError(error) && error.response?.status === 401) {
        throw new Error(
          'Invalid OpenAI API key. Please check your OPENAI_API_KEY.',
          { cause: error },
        );
      }

      throw error;
    }
  }

  /**
   * Retry a request with exponential backoff
   */
  private async retryRequest<T>(
    requestFn: () => Promise<T>,
    maxRetries: number,
    signal?: AbortSignal,
  ): Promise<T> {
    let lastError: unknown;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        return await requestFn();
      } catch (error) {
        lastError = error;

        // Don't retry on 404 (model not found), 400 (bad request) or cancellation
        if (
          isAxiosError(error) &&
          (error.code === 'ERR_CANCELED' ||
            (error.response && [404, 400].includes(error.response.status)))
        ) {
          throw error;
        }

        if (attempt < maxRetries) {
          const delay = Math.pow(2, attempt) * 1000; // Exponential backoff
          this.logger.warn(
            `Request failed (attempt ${attempt + 1}/${maxRetries + 1}), ` +
              `retrying in ${delay}ms...`,
          );
          await this.delay(delay, signal);
        }
      }
    }

    throw lastError;
  }

  /**
   * Backoff sleep that rejects with a cancellation as soon as `signal` aborts
   */
  private delay(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new CanceledError('Request aborted during retry backoff'));
        return;
      }

      const onAbort = () => {
        clearTimeout(timer);
        reject(new CanceledError('Request aborted during retry backoff'));
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Backend identifier reported in cycle diagnostics
   */
  getChatBackend(): string {
    return this.config.useOpenAI
      ? `openai:${this.config.openAIModel}`
      : `ollama:${this.config.chatModel}`;
  }
}
