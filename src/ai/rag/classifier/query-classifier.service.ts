import { Injectable, Logger } from '@nestjs/common';
import type { Turn } from '../history/conversation-history';
import {
  ClassificationResult,
  ClassificationVote,
  LABEL_PRIORITY,
  QueryLabel,
  SignalDetector,
} from './classification.types';
import { DEFAULT_DETECTORS, toDetectorInput } from './signal-detectors';

/** Confidence reported when no detector fires at all. */
export const CONFIDENCE_FLOOR = 0.3;

/**
 * Sums detector votes per label and picks the heaviest one.
 * Equal weights fall back to LABEL_PRIORITY.
 */
export function aggregateVotes(
  votes: readonly ClassificationVote[],
): ClassificationResult {
  const totals = new Map<QueryLabel, number>();
  let sum = 0;
  for (const vote of votes) {
    totals.set(vote.label, (totals.get(vote.label) ?? 0) + vote.weight);
    sum += vote.weight;
  }

  const matchedSignals: ReadonlySet<string> = new Set(
    votes.map((vote) => vote.signal),
  );

  if (sum <= 0) {
    return {
      label: QueryLabel.UNCLEAR,
      confidence: CONFIDENCE_FLOOR,
      matchedSignals,
    };
  }

  let label = QueryLabel.UNCLEAR;
  let best = -Infinity;
  for (const candidate of LABEL_PRIORITY) {
    const weight = totals.get(candidate);
    if (weight !== undefined && weight > best) {
      best = weight;
      label = candidate;
    }
  }

  const greetingKind = votes.find((vote) => vote.greetingKind)?.greetingKind;

  return {
    label,
    confidence: Math.min(1, Math.max(0, best / sum)),
    matchedSignals,
    ...(label === QueryLabel.GREETING && greetingKind ? { greetingKind } : {}),
  };
}

@Injectable()
export class QueryClassifierService {
  private readonly logger = new Logger(QueryClassifierService.name);
  private readonly detectors: readonly SignalDetector[] = DEFAULT_DETECTORS;

  classify(
    utterance: string,
    recentHistory: readonly Turn[] = [],
  ): ClassificationResult {
    const input = toDetectorInput(utterance, recentHistory);

    const votes: ClassificationVote[] = [];
    for (const detector of this.detectors) {
      const vote = detector.detect(input, votes);
      if (vote) votes.push(vote);
    }

    const result = aggregateVotes(votes);

    this.logger.debug(
      `🎯 "${utterance.substring(0, 60)}" → ${result.label} ` +
        `(${(result.confidence * 100).toFixed(0)}%) signals=[${[
          ...result.matchedSignals,
        ].join(', ')}]`,
    );

    return result;
  }
}
