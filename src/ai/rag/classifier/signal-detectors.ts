import vocabulary from './vocabulary.json';
import {
  ClassificationVote,
  DetectorInput,
  GreetingKind,
  QueryLabel,
  SignalDetector,
} from './classification.types';

export const SIGNAL_WEIGHTS = {
  greeting: 4,
  domainKeyword: 2,
  domainKeywordExtra: 0.5,
  domainKeywordMax: 3,
  generalTopic: 2.5,
  interrogative: 1.5,
  interrogativeWithDomain: 0.5,
  followUp: 2,
  ambiguity: 1,
} as const;

export const MIN_CLEAR_TOKENS = 4;

export function normalizeUtterance(text: string): string {
  return text
    .toLowerCase()
    .replace(/['’`]/g, '')
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function phrasePattern(phrase: string, allowPlural: boolean): RegExp {
  const suffix = allowPlural ? '(?:s|es)?' : '';
  return new RegExp(`(?:^| )${escapeRegExp(phrase)}${suffix}(?= |$)`);
}

function startsWithPhrase(normalized: string, phrase: string): boolean {
  return normalized === phrase || normalized.startsWith(`${phrase} `);
}

const GREETING_KINDS: readonly GreetingKind[] = ['hello', 'farewell', 'thanks'];

const greetingVocabulary: Record<GreetingKind, string[]> =
  vocabulary.greetingPhrases;

const GREETING_PHRASES: ReadonlyArray<[GreetingKind, string]> =
  GREETING_KINDS.flatMap((kind) =>
    greetingVocabulary[kind].map((phrase): [GreetingKind, string] => [
      kind,
      phrase,
    ]),
  );

const DOMAIN_TERMS = vocabulary.domainTerms.map((term) => ({
  term,
  pattern: phrasePattern(term, true),
}));

const GENERAL_TOPIC_PATTERNS = vocabulary.generalTopicPatterns.map(
  (source) => new RegExp(source),
);

const FOLLOW_UP_PATTERNS = vocabulary.followUpMarkers.map((marker) =>
  phrasePattern(marker, false),
);

export function findDomainTerms(normalized: string): string[] {
  return DOMAIN_TERMS.filter(({ pattern }) => pattern.test(normalized)).map(
    ({ term }) => term,
  );
}

export function findGreetingKind(normalized: string): GreetingKind | null {
  const match = GREETING_PHRASES.find(([, phrase]) =>
    startsWithPhrase(normalized, phrase),
  );
  return match ? match[0] : null;
}

function hasVote(votes: readonly ClassificationVote[], signal: string): boolean {
  return votes.some((vote) => vote.signal === signal);
}

export const greetingDetector: SignalDetector = {
  name: 'greeting',
  detect({ normalized }) {
    const kind = findGreetingKind(normalized);
    if (!kind) return null;
    return {
      label: QueryLabel.GREETING,
      weight: SIGNAL_WEIGHTS.greeting,
      signal: this.name,
      greetingKind: kind,
    };
  },
};

export const domainKeywordDetector: SignalDetector = {
  name: 'domain_keyword',
  detect({ normalized }) {
    const terms = findDomainTerms(normalized);
    if (terms.length === 0) return null;
    const weight = Math.min(
      SIGNAL_WEIGHTS.domainKeywordMax,
      SIGNAL_WEIGHTS.domainKeyword +
        SIGNAL_WEIGHTS.domainKeywordExtra * (terms.length - 1),
    );
    return { label: QueryLabel.RAG_REQUIRED, weight, signal: this.name };
  },
};

export const generalTopicDetector: SignalDetector = {
  name: 'general_topic',
  detect({ normalized }) {
    if (!GENERAL_TOPIC_PATTERNS.some((pattern) => pattern.test(normalized))) {
      return null;
    }
    return {
      label: QueryLabel.DIRECT_ANSWER,
      weight: SIGNAL_WEIGHTS.generalTopic,
      signal: this.name,
    };
  },
};

export const interrogativeDetector: SignalDetector = {
  name: 'interrogative',
  detect({ raw, normalized }, votes) {
    const isQuestion =
      raw.includes('?') ||
      vocabulary.interrogativeWords.some((word) =>
        startsWithPhrase(normalized, word),
      );
    if (!isQuestion) return null;

    // Question phrasing only backs retrieval when a domain term is present
    if (hasVote(votes, domainKeywordDetector.name)) {
      return {
        label: QueryLabel.RAG_REQUIRED,
        weight: SIGNAL_WEIGHTS.interrogativeWithDomain,
        signal: this.name,
      };
    }
    return {
      label: QueryLabel.DIRECT_ANSWER,
      weight: SIGNAL_WEIGHTS.interrogative,
      signal: this.name,
    };
  },
};

export const followUpDetector: SignalDetector = {
  name: 'follow_up',
  detect({ normalized, history }, votes) {
    if (hasVote(votes, domainKeywordDetector.name)) return null;
    if (hasVote(votes, greetingDetector.name)) return null;

    const lastUserTurn = [...history]
      .reverse()
      .find((turn) => turn.role === 'user');
    if (!lastUserTurn) return null;
    if (findDomainTerms(normalizeUtterance(lastUserTurn.content)).length === 0) {
      return null;
    }
    if (!FOLLOW_UP_PATTERNS.some((pattern) => pattern.test(normalized))) {
      return null;
    }
    return {
      label: QueryLabel.RAG_REQUIRED,
      weight: SIGNAL_WEIGHTS.followUp,
      signal: this.name,
    };
  },
};

export const ambiguityDetector: SignalDetector = {
  name: 'ambiguity',
  detect({ tokens }, votes) {
    if (votes.length > 0 || tokens.length >= MIN_CLEAR_TOKENS) return null;
    return {
      label: QueryLabel.UNCLEAR,
      weight: SIGNAL_WEIGHTS.ambiguity,
      signal: this.name,
    };
  },
};

/** Evaluated in order; later detectors see the votes cast before them. */
export const DEFAULT_DETECTORS: readonly SignalDetector[] = [
  greetingDetector,
  domainKeywordDetector,
  generalTopicDetector,
  interrogativeDetector,
  followUpDetector,
  ambiguityDetector,
];

export function toDetectorInput(
  raw: string,
  history: DetectorInput['history'],
): DetectorInput {
  const normalized = normalizeUtterance(raw);
  return {
    raw,
    normalized,
    tokens: normalized ? normalized.split(' ') : [],
    history,
  };
}
