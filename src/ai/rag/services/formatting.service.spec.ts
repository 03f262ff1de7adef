import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import {
  FormattingService,
  NO_CONTEXT_SENTINEL,
  documentLabel,
  formatContext,
} from './formatting.service';
import { RetrievedDocument } from './retrieval.service';
import { DEFAULT_RAG_CONFIG } from '../../../config/rag.config';

function doc(
  id: string,
  text: string,
  metadata: Record<string, unknown> = {},
): RetrievedDocument {
  return { id, text, metadata, score: 0.9 };
}

describe('formatContext', () => {
  const cards = doc('1', 'Call support to block a card.', {
    category: 'cards',
  });
  const limits = doc('2', 'The daily limit depends on your tier.', {
    title: 'Limits',
  });
  const firstBlock = '[1] Category: cards\nCall support to block a card.';
  const secondBlock = '[2] Limits\nThe daily limit depends on your tier.';

  it('should return the sentinel for no documents', () => {
    expect(formatContext([], 2000)).toBe(NO_CONTEXT_SENTINEL);
  });

  it('should number blocks and separate them with a blank line', () => {
    expect(formatContext([cards, limits], 2000)).toBe(
      `${firstBlock}\n\n${secondBlock}`,
    );
  });

  it('should stop at the last whole block that fits', () => {
    const maxLength = firstBlock.length + 5;

    const context = formatContext([cards, limits], maxLength);

    expect(context).toBe(firstBlock);
    expect(context.length).toBeLessThanOrEqual(maxLength);
  });

  it('should cut a first block that is too long on its own', () => {
    const context = formatContext([cards], 10);

    expect(context).toBe('[1] Categ…');
    expect(context).toHaveLength(10);
  });

  it('should never exceed the budget', () => {
    const docs = Array.from({ length: 20 }, (_, i) =>
      doc(`${i}`, `Policy paragraph number ${i} about transfers.`),
    );

    for (const maxLength of [100, 250, 600]) {
      expect(formatContext(docs, maxLength).length).toBeLessThanOrEqual(
        maxLength,
      );
    }
  });
});

describe('documentLabel', () => {
  it('should fall back from category to title, source and id', () => {
    expect(documentLabel(doc('a', 'x', { category: 'fees', title: 'T' }))).toBe(
      'Category: fees',
    );
    expect(documentLabel(doc('a', 'x', { title: 'Transfers' }))).toBe(
      'Transfers',
    );
    expect(documentLabel(doc('a', 'x', { source: 'faq.md' }))).toBe(
      'Source: faq.md',
    );
    expect(documentLabel(doc('a', 'x'))).toBe('Document a');
  });
});

describe('FormattingService', () => {
  let service: FormattingService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        FormattingService,
        {
          provide: ConfigService,
          useValue: new ConfigService({
            rag: { ...DEFAULT_RAG_CONFIG, maxContextLength: 100 },
          }),
        },
      ],
    }).compile();

    service = module.get<FormattingService>(FormattingService);
  });

  it('should apply the configured context budget', () => {
    const long = doc('1', 'x'.repeat(500));

    expect(service.formatContext([long])).toHaveLength(100);
  });

  it('should truncate text with an ellipsis', () => {
    expect(service.truncate('abcdef', 3)).toBe('abc...');
    expect(service.truncate('abc', 3)).toBe('abc');
  });
});
