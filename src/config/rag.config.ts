import { registerAs } from '@nestjs/config';

export interface RagConfig {
  topK: number;
  similarityThreshold: number;
  maxContextLength: number;
  /** Remembered exchanges; the turn log holds twice as many turns. */
  maxHistoryLength: number;
  enableConversationHistory: boolean;
  classifierHistoryWindow: number;
  cannedGreetings: boolean;
}

export const DEFAULT_RAG_CONFIG: RagConfig = {
  topK: 3,
  similarityThreshold: 0,
  maxContextLength: 2000,
  maxHistoryLength: 5,
  enableConversationHistory: true,
  classifierHistoryWindow: 2,
  cannedGreetings: false,
};

export default registerAs(
  'rag',
  (): RagConfig => ({
    topK: Math.max(
      1,
      parseInt(process.env.RETRIEVAL_TOP_K || `${DEFAULT_RAG_CONFIG.topK}`, 10),
    ),
    similarityThreshold: Math.min(
      1,
      Math.max(0, parseFloat(process.env.SIMILARITY_THRESHOLD || '0')),
    ),
    maxContextLength: Math.max(
      100,
      parseInt(process.env.MAX_CONTEXT_LENGTH || '2000', 10),
    ),
    maxHistoryLength: Math.max(
      1,
      parseInt(process.env.MAX_HISTORY_LENGTH || '5', 10),
    ),
    enableConversationHistory:
      (process.env.ENABLE_CONVERSATION_HISTORY || 'true').toLowerCase() ===
      'true',
    classifierHistoryWindow: Math.max(
      0,
      parseInt(process.env.CLASSIFIER_HISTORY_WINDOW || '2', 10),
    ),
    cannedGreetings: process.env.CANNED_GREETINGS === 'true',
  }),
);
