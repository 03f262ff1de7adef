import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { OllamaService } from './ollama.service';
import { OllamaConfig } from '../../config/ollama.config';

@Module({
  imports: [
    HttpModule.registerAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        timeout: config.get<OllamaConfig>('ollama')?.timeout ?? 30000,
        maxRedirects: 5,
      }),
    }),
  ],
  providers: [OllamaService],
  exports: [OllamaService],
})
export class OllamaModule {}
