import { Test, TestingModule } from '@nestjs/testing';
import { AxiosError } from 'axios';
import { GenerationService } from './generation.service';
import { OllamaService } from '../../llm/ollama.service';
import { createTurn } from '../history/conversation-history';
import {
  GenerationTimeoutError,
  GenerationUnavailableError,
} from '../errors/routing.errors';
import { DIRECT_SYSTEM_PROMPTS, RAG_SYSTEM_PROMPT } from '../../prompts';

describe('GenerationService', () => {
  let service: GenerationService;
  const ollamaService = {
    chat: jest.fn(),
    getChatBackend: jest.fn().mockReturnValue('ollama:llama3.2'),
  };

  const history = [
    createTurn('user', 'What is the daily limit?'),
    createTurn('assistant', 'It depends on your tier.'),
  ];

  beforeEach(async () => {
    jest.clearAllMocks();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        GenerationService,
        { provide: OllamaService, useValue: ollamaService },
      ],
    }).compile();

    service = module.get<GenerationService>(GenerationService);
  });

  describe('buildRagMessages', () => {
    it('should order system prompt, context, history, then the question', () => {
      const messages = service.buildRagMessages(
        'And the weekly one?',
        '[1] Limits\nWeekly limit is 5000.',
        history,
      );

      expect(messages.map((m) => m.role)).toEqual([
        'system',
        'user',
        'user',
        'assistant',
        'user',
      ]);
      expect(messages[0].content).toBe(RAG_SYSTEM_PROMPT);
      expect(messages[1].content).toContain('[1] Limits\nWeekly limit is 5000.');
      expect(messages[4].content).toBe('Question: And the weekly one?');
    });
  });

  describe('buildDirectMessages', () => {
    it('should use the prompt for the direct kind and end with the raw utterance', () => {
      const messages = service.buildDirectMessages('ok', 'clarify', []);

      expect(messages).toEqual([
        { role: 'system', content: DIRECT_SYSTEM_PROMPTS.clarify },
        { role: 'user', content: 'ok' },
      ]);
    });
  });

  describe('generate', () => {
    const messages = [{ role: 'user' as const, content: 'hello' }];

    it('should pass the abort signal to the backend', async () => {
      ollamaService.chat.mockResolvedValue('Hi! How can I help?');
      const controller = new AbortController();

      await expect(service.generate(messages, controller.signal)).resolves.toBe(
        'Hi! How can I help?',
      );
      expect(ollamaService.chat).toHaveBeenCalledWith(messages, {
        signal: controller.signal,
      });
    });

    it('should map timeouts to GenerationTimeoutError', async () => {
      ollamaService.chat.mockRejectedValue(
        new AxiosError('timeout of 30000ms exceeded', 'ECONNABORTED'),
      );

      await expect(service.generate(messages)).rejects.toBeInstanceOf(
        GenerationTimeoutError,
      );
    });

    it('should map other failures to GenerationUnavailableError', async () => {
      const cause = new Error('Empty response from Ollama chat API');
      ollamaService.chat.mockRejectedValue(cause);

      const attempt = service.generate(messages);

      await expect(attempt).rejects.toBeInstanceOf(GenerationUnavailableError);
      await expect(attempt).rejects.toMatchObject({
        message: 'Chat completion failed: Empty response from Ollama chat API',
        cause,
      });
    });

    it('should let cancellation through unchanged', async () => {
      const canceled = new AxiosError('canceled', 'ERR_CANCELED');
      ollamaService.chat.mockRejectedValue(canceled);

      await expect(service.generate(messages)).rejects.toBe(canceled);
    });
  });

  it('should report the chat backend', () => {
    expect(service.getBackendName()).toBe('ollama:llama3.2');
  });
});
