import { Module } from '@nestjs/common';
import { CacheModule } from '@nestjs/cache-manager';
import { RagService } from './rag.service';
import { EmbeddingsModule } from '../embeddings/embeddings.module';
import { QdrantModule } from '../vector-store/qdrant.module';
import { OllamaModule } from '../llm/ollama.module';
import { ConversationService } from './services/conversation.service';
import { RetrievalService } from './services/retrieval.service';
import { FormattingService } from './services/formatting.service';
import { GenerationService } from './services/generation.service';
import { QueryClassifierService } from './classifier/query-classifier.service';

@Module({
  imports: [
    EmbeddingsModule,
    QdrantModule,
    OllamaModule,
    // Session history snapshots; ConversationService sets its own TTL
    CacheModule.register({
      ttl: 1800000, // 30 minutes
      max: 1000,
    }),
  ],
  providers: [
    RagService,
    QueryClassifierService,
    FormattingService,
    ConversationService,
    RetrievalService,
    GenerationService,
  ],
  exports: [RagService],
})
export class RagModule {}
