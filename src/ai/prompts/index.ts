export * from './rag-answer.prompt';
export * from './direct-answer.prompt';
export * from './fallback.prompt';
