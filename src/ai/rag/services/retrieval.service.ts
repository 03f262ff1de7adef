import { Injectable, Logger } from '@nestjs/common';
import { EmbeddingsService } from '../../embeddings/embeddings.service';
import {
  MetadataFilter,
  QdrantService,
  SearchResult,
} from '../../vector-store/qdrant.service';
import { RetrievalUnavailableError } from '../errors/routing.errors';
import { getErrorMessage } from '../../../common/utils/error.utils';

export interface RetrievedDocument {
  id: string;
  text: string;
  metadata: Record<string, unknown>;
  /** Similarity normalised into [0, 1]. */
  score: number;
}

export interface RetrieveOptions {
  filter?: MetadataFilter;
  signal?: AbortSignal;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Maps a cosine similarity in [-1, 1] onto [0, 1].
 */
export function normalizeScore(cosine: number): number {
  if (!Number.isFinite(cosine)) return 0;
  return Math.min(1, Math.max(0, (1 + cosine) / 2));
}

@Injectable()
export class RetrievalService {
  private readonly logger = new Logger(RetrievalService.name);

  constructor(
    private readonly embeddingsService: EmbeddingsService,
    private readonly qdrantService: QdrantService,
  ) {}

  /**
   * One similarity search per call. Returns at most `topK` documents at or
   * above `similarityFloor`, best first; an empty store yields [].
   */
  async retrieve(
    query: string,
    topK: number,
    similarityFloor: number,
    options: RetrieveOptions = {},
  ): Promise<RetrievedDocument[]> {
    this.logger.debug(
      `🔍 Retrieving top ${topK} for: "${query.substring(0, 50)}" (floor=${similarityFloor})`,
    );

    let results: SearchResult[];
    try {
      const embedding = await this.embeddingsService.generateEmbedding(
        query,
        options.signal,
      );
      results = await this.qdrantService.searchVectors(
        embedding,
        topK,
        options.filter,
      );
    } catch (error) {
      throw new RetrievalUnavailableError(
        `Knowledge base search failed: ${getErrorMessage(error)}`,
        { cause: error },
      );
    }

    const documents = results
      .map((result) => this.toDocument(result))
      .filter((doc) => doc.text.length > 0 && doc.score >= similarityFloor)
      .sort((a, b) => b.score - a.score)
      .slice(0, Math.max(0, topK));

    documents.forEach((doc, i) =>
      this.logger.debug(
        `│  ${i + 1}. ${doc.text.substring(0, 60)}... (score: ${doc.score.toFixed(4)})`,
      ),
    );
    this.logger.log(
      `├─ Retrieved ${documents.length}/${results.length} documents above floor`,
    );

    return documents;
  }

  getBackendName(): string {
    return `qdrant:${this.qdrantService.getCollectionName()}`;
  }

  private toDocument(result: SearchResult): RetrievedDocument {
    const { text, document, metadata, ...rest } = result.payload;
    const body =
      typeof text === 'string'
        ? text
        : typeof document === 'string'
          ? document
          : '';

    return {
      id: result.id,
      text: body,
      metadata: isRecord(metadata) ? metadata : rest,
      score: normalizeScore(result.score),
    };
  }
}
