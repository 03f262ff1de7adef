import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { QdrantClient } from '@qdrant/js-client-rest';
import { QdrantConfig } from '../../config/qdrant.config';
import { getErrorMessage } from '../../common/utils/error.utils';

export type MetadataFilter = Record<string, string | number | boolean>;

export interface SearchResult {
  id: string;
  score: number;
  payload: Record<string, unknown>;
}

export interface CollectionInfo {
  exists: boolean;
  vectorCount?: number;
  vectorSize?: number;
  distance?: string;
}

@Injectable()
export class QdrantService implements OnModuleInit {
  private readonly logger = new Logger(QdrantService.name);
  private client: QdrantClient;
  private config: QdrantConfig;

  constructor(private configService: ConfigService) {
    const config = this.configService.get<QdrantConfig>('qdrant');
    if (!config) {
      throw new Error('Qdrant configuration namespace "qdrant" is not loaded');
    }
    this.config = config;

    this.client = new QdrantClient({
      url: `${this.config.https ? 'https' : 'http'}://${this.config.host}:${this.config.port}`,
      apiKey: this.config.apiKey,
      timeout: this.config.timeout,
    });
  }

  /**
   * Initialize connection on module startup
   */
  async onModuleInit() {
    await this.initialize();
  }

  /**
   * Test connection to Qdrant and log collection status.
   * The knowledge base is populated out of band, so a missing collection
   * only degrades retrieval.
   */
  async initialize(): Promise<void> {
    try {
      this.logger.log('Connecting to Qdrant...');

      await this.client.getCollections();

      this.logger.log(
        `✓ Connected to Qdrant at ${this.config.host}:${this.config.port}`,
      );

      const collectionInfo = await this.getCollection(
        this.config.collectionName,
      );
      if (collectionInfo.exists) {
        this.logger.log(
          `✓ Collection "${this.config.collectionName}" found (${collectionInfo.vectorCount ?? 0} vectors)`,
        );
      } else {
        this.logger.warn(
          `⚠ Collection "${this.config.collectionName}" does not exist. Knowledge-base answers will report no information found.`,
        );
      }
    } catch (error) {
      this.logger.error(
        `✗ Failed to connect to Qdrant: ${getErrorMessage(error)}`,
      );
      this.logger.warn(
        '⚠ Retrieval will be unavailable until Qdrant is accessible',
      );
    }
  }

  async checkHealth(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch (error) {
      this.logger.warn(`Qdrant health check failed: ${getErrorMessage(error)}`);
      return false;
    }
  }

  /**
   * Check if a collection exists
   */
  async collectionExists(collectionName: string): Promise<boolean> {
    try {
      const collections = await this.client.getCollections();
      return collections.collections.some((col) => col.name === collectionName);
    } catch (error) {
      this.logger.error(
        `Failed to check collection existence: ${getErrorMessage(error)}`,
      );
      return false;
    }
  }

  /**
   * Get collection information
   */
  async getCollection(collectionName: string): Promise<CollectionInfo> {
    try {
      const exists = await this.collectionExists(collectionName);

      if (!exists) {
        return { exists: false };
      }

      const info = await this.client.getCollection(collectionName);

      let vectorSize: number | undefined;
      let distance: string | undefined;

      const vectors = info.config.params.vectors;
      if (vectors && 'size' in vectors && typeof vectors.size === 'number') {
        vectorSize = vectors.size;
        distance = String(vectors.distance);
      }

      return {
        exists: true,
        vectorCount: info.points_count ?? undefined,
        vectorSize,
        distance,
      };
    } catch (error) {
      this.logger.error(
        `Failed to get collection info: ${getErrorMessage(error)}`,
      );
      return { exists: false };
    }
  }

  /**
   * Search the knowledge-base collection for the nearest vectors.
   * Scores are the raw cosine similarities reported by Qdrant.
   */
  async searchVectors(
    queryVector: number[],
    limit: number = 10,
    filter?: MetadataFilter,
  ): Promise<SearchResult[]> {
    if (queryVector.length !== this.config.vectorSize) {
      throw new Error(
        `Query vector dimension mismatch: expected ${this.config.vectorSize}, got ${queryVector.length}`,
      );
    }

    const must = Object.entries(filter ?? {}).map(([key, value]) => ({
      key: key.startsWith('metadata.') ? key : `metadata.${key}`,
      match: { value },
    }));

    try {
      const results = await this.client.search(this.config.collectionName, {
        vector: queryVector,
        limit,
        with_payload: true,
        ...(must.length > 0 ? { filter: { must } } : {}),
      });

      return results.map((result) => ({
        id: result.id.toString(),
        score: result.score,
        payload: result.payload ?? {},
      }));
    } catch (error) {
      this.logger.error(`Search failed: ${getErrorMessage(error)}`);
      throw error;
    }
  }

  getCollectionName(): string {
    return this.config.collectionName;
  }
}
