import { Module } from '@nestjs/common';
import { QdrantModule } from './vector-store/qdrant.module';
import { OllamaModule } from './llm/ollama.module';
import { EmbeddingsModule } from './embeddings/embeddings.module';
import { RagModule } from './rag/rag.module';
import { AiController } from './ai.controller';

@Module({
  imports: [QdrantModule, OllamaModule, EmbeddingsModule, RagModule],
  controllers: [AiController],
  exports: [RagModule],
})
export class AiModule {}
