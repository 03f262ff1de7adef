import type { GreetingKind } from '../rag/classifier/classification.types';

/** Returned in place of an answer when the generation backend fails. */
export const APOLOGY_RESPONSE =
  "I'm sorry, I'm having trouble answering right now. Please try again in a moment.";

export const CANNED_GREETINGS: Record<GreetingKind, string> = {
  hello:
    "Hello! I'm your payment support assistant. Ask me about cards, limits, transfers, fees or your account.",
  farewell: 'Goodbye! Feel free to come back anytime you need help.',
  thanks: "You're welcome! Let me know if there's anything else I can help with.",
};
