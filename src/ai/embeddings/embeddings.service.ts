import { Injectable, Logger } from '@nestjs/common';
import { OllamaService } from '../llm/ollama.service';
import * as crypto from 'crypto';

@Injectable()
export class EmbeddingsService {
  private readonly logger = new Logger(EmbeddingsService.name);
  private readonly maxTextLength: number = 8000;
  private readonly maxCacheEntries: number = 500;

  // Simple in-memory LRU of query embeddings
  private embeddingCache: Map<string, number[]> = new Map();

  constructor(private readonly ollamaService: OllamaService) {}

  /**
   * Generate embedding for a single text
   */
  async generateEmbedding(
    text: string,
    signal?: AbortSignal,
  ): Promise<number[]> {
    const processedText = this.preprocessText(text);
    const cacheKey = this.generateCacheKey(processedText);

    const cached = this.embeddingCache.get(cacheKey);
    if (cached) {
      // Refresh recency
      this.embeddingCache.delete(cacheKey);
      this.embeddingCache.set(cacheKey, cached);
      this.logger.debug('✅ Using cached embedding');
      return cached;
    }

    this.logger.debug(
      `🔢 Generating embedding for text: "${processedText.substring(0, 50)}..."`,
    );
    const embedding = await this.ollamaService.generateEmbedding(
      processedText,
      signal,
    );

    if (!this.validateEmbedding(embedding)) {
      throw new Error('Generated embedding failed validation');
    }

    this.cacheEmbedding(cacheKey, embedding);
    return embedding;
  }

  /**
   * Preprocess text before embedding generation
   */
  preprocessText(text: string): string {
    let processed = text.trim().replace(/\s+/g, ' ').normalize('NFC');

    if (processed.length > this.maxTextLength) {
      this.logger.warn(
        `Text exceeds max length (${processed.length} > ${this.maxTextLength}), truncating...`,
      );
      processed = processed.substring(0, this.maxTextLength);
    }

    // Strip control characters
    return processed.replace(/[\x00-\x08\x0B-\x0C\x0E-\x1F\x7F]/g, '');
  }

  validateEmbedding(embedding: number[]): boolean {
    if (!Array.isArray(embedding) || embedding.length === 0) {
      this.logger.error('Embedding is empty or not an array');
      return false;
    }

    if (embedding.some((val) => !Number.isFinite(val))) {
      this.logger.error('Embedding contains NaN or infinity values');
      return false;
    }

    if (embedding.every((val) => val === 0)) {
      this.logger.error('Embedding is all zeros (invalid)');
      return false;
    }

    return true;
  }

  private generateCacheKey(text: string): string {
    return crypto.createHash('md5').update(text).digest('hex');
  }

  private cacheEmbedding(cacheKey: string, embedding: number[]): void {
    this.embeddingCache.set(cacheKey, embedding);
    if (this.embeddingCache.size > this.maxCacheEntries) {
      const oldest = this.embeddingCache.keys().next();
      if (!oldest.done) this.embeddingCache.delete(oldest.value);
    }
  }
}
