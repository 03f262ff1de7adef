import type { Turn } from '../history/conversation-history';

export enum QueryLabel {
  RAG_REQUIRED = 'rag_required',
  DIRECT_ANSWER = 'direct_answer',
  GREETING = 'greeting',
  UNCLEAR = 'unclear',
}

/** Highest priority first; decides between labels with equal weight. */
export const LABEL_PRIORITY: readonly QueryLabel[] = [
  QueryLabel.GREETING,
  QueryLabel.RAG_REQUIRED,
  QueryLabel.DIRECT_ANSWER,
  QueryLabel.UNCLEAR,
];

export type GreetingKind = 'hello' | 'farewell' | 'thanks';

export interface ClassificationResult {
  readonly label: QueryLabel;
  readonly confidence: number;
  readonly matchedSignals: ReadonlySet<string>;
  readonly greetingKind?: GreetingKind;
}

export interface ClassificationVote {
  label: QueryLabel;
  weight: number;
  signal: string;
  greetingKind?: GreetingKind;
}

export interface DetectorInput {
  raw: string;
  normalized: string;
  tokens: readonly string[];
  history: readonly Turn[];
}

export interface SignalDetector {
  name: string;
  detect(
    input: DetectorInput,
    votes: readonly ClassificationVote[],
  ): ClassificationVote | null;
}
