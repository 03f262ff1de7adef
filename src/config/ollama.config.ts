import { registerAs } from '@nestjs/config';

export interface OllamaConfig {
  baseUrl: string;
  chatModel: string;
  embeddingModel: string;
  timeout: number;
  embeddingTimeout: number;
  maxRetries: number;
  useOpenAI: boolean;
  openAIApiKey: string;
  openAIBaseUrl: string;
  openAIModel: string;
}

export default registerAs(
  'ollama',
  (): OllamaConfig => ({
    baseUrl: process.env.OLLAMA_API_URL || 'http://localhost:11434',
    chatModel: process.env.OLLAMA_CHAT_MODEL || 'llama3.2',
    embeddingModel: process.env.OLLAMA_EMBEDDING_MODEL || 'all-minilm',
    timeout: parseInt(process.env.OLLAMA_TIMEOUT || '30000', 10),
    embeddingTimeout: parseInt(process.env.OLLAMA_EMBEDDING_TIMEOUT || '15000', 10),
    maxRetries: parseInt(process.env.OLLAMA_MAX_RETRIES || '1', 10),
    useOpenAI: process.env.USE_OPENAI === '1',
    openAIApiKey: process.env.OPENAI_API_KEY || '',
    openAIBaseUrl: process.env.OPENAI_BASE_URL || 'https://api.openai.com/v1',
    openAIModel: process.env.OPENAI_MODEL || 'gpt-4o-mini',
  }),
);
