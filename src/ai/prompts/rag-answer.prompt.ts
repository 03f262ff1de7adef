/**
 * Knowledge-base answer prompt
 * Grounds the answer in the retrieved context block
 */
export const RAG_SYSTEM_PROMPT = `You are a helpful payment support assistant.
Answer questions based ONLY on the provided context from the knowledge base.
If the context doesn't contain the answer to the user's question, politely say that you don't have that information available.
Be concise, accurate, and friendly in your responses.`;

export function buildContextMessage(context: string): string {
  return `Context from knowledge base:

${context}

---

Answer the user's next question using the context above. If the context doesn't contain the answer, say "I don't have that information in my knowledge base."`;
}

export function buildQuestionMessage(query: string): string {
  return `Question: ${query}`;
}
