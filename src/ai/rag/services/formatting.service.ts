import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RetrievedDocument } from './retrieval.service';
import { DEFAULT_RAG_CONFIG, RagConfig } from '../../../config/rag.config';

export const NO_CONTEXT_SENTINEL =
  'No relevant information found in the knowledge base.';

const BLOCK_SEPARATOR = '\n\n';

/**
 * Human-readable label for a document, taken from its metadata.
 */
export function documentLabel(doc: RetrievedDocument): string {
  const { category, title, source } = doc.metadata;
  if (typeof category === 'string' && category.trim()) {
    return `Category: ${category.trim()}`;
  }
  if (typeof title === 'string' && title.trim()) return title.trim();
  if (typeof source === 'string' && source.trim()) {
    return `Source: ${source.trim()}`;
  }
  return `Document ${doc.id}`;
}

/**
 * Renders documents as numbered blocks, keeping only whole blocks that fit
 * in `maxLength`. A first block that is too long on its own is cut.
 */
export function formatContext(
  documents: readonly RetrievedDocument[],
  maxLength: number,
): string {
  if (documents.length === 0) return NO_CONTEXT_SENTINEL;

  let context = '';
  for (const [idx, doc] of documents.entries()) {
    const block = `[${idx + 1}] ${documentLabel(doc)}\n${doc.text.trim()}`;
    const candidate = context ? `${context}${BLOCK_SEPARATOR}${block}` : block;

    if (candidate.length > maxLength) {
      if (!context) {
        return `${block.substring(0, Math.max(0, maxLength - 1))}…`;
      }
      break;
    }
    context = candidate;
  }

  return context;
}

/**
 * Centralized formatting utilities for RAG services.
 */
@Injectable()
export class FormattingService {
  private readonly maxContextLength: number;

  constructor(private readonly configService: ConfigService) {
    const rag = this.configService.get<RagConfig>('rag') ?? DEFAULT_RAG_CONFIG;
    this.maxContextLength = rag.maxContextLength;
  }

  formatContext(documents: readonly RetrievedDocument[]): string {
    return formatContext(documents, this.maxContextLength);
  }

  /**
   * Truncate text with ellipsis
   */
  truncate(text: string, maxLength: number): string {
    if (text.length <= maxLength) return text;
    return text.substring(0, maxLength) + '...';
  }
}
