import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AiModule } from './ai/ai.module';
import ollamaConfig from './config/ollama.config';
import qdrantConfig from './config/qdrant.config';
import ragConfig from './config/rag.config';

@Module({
  imports: [
    // Global config
    ConfigModule.forRoot({
      isGlobal: true,
      load: [ollamaConfig, qdrantConfig, ragConfig],
      envFilePath: '.env',
    }),

    // Routing pipeline and HTTP surface
    AiModule,
  ],
})
export class AppModule {}
