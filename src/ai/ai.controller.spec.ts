import { Test, TestingModule } from '@nestjs/testing';
import { AiController } from './ai.controller';
import { RagService } from './rag/rag.service';
import { OllamaService } from './llm/ollama.service';
import { QdrantService } from './vector-store/qdrant.service';
import { RoutingState, emptyDiagnostics } from './rag/routing-state';

describe('AiController', () => {
  let controller: AiController;
  let ragService: {
    handle: jest.Mock;
    reset: jest.Mock;
    getHistory: jest.Mock;
    generateSessionId: jest.Mock;
  };
  let ollamaService: { checkHealth: jest.Mock };
  let qdrantService: { checkHealth: jest.Mock };

  beforeEach(async () => {
    ragService = {
      handle: jest.fn().mockResolvedValue({
        response: 'Sorry, something went wrong.',
        diagnostics: {
          ...emptyDiagnostics('s1'),
          label: 'rag_required',
          confidence: 0.8,
          matchedSignals: ['domain_term'],
          retrievalError: true,
          failedStage: RoutingState.RETRIEVING,
          elapsedMs: 12,
          path: [RoutingState.START, RoutingState.DONE],
        },
      }),
      reset: jest.fn().mockResolvedValue(undefined),
      getHistory: jest.fn().mockResolvedValue([
        { role: 'user', content: 'hello' },
        { role: 'assistant', content: 'Hi! How can I help?' },
      ]),
      generateSessionId: jest.fn().mockReturnValue('session_1_abc'),
    };
    ollamaService = { checkHealth: jest.fn().mockResolvedValue(true) };
    qdrantService = { checkHealth: jest.fn().mockResolvedValue(true) };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [AiController],
      providers: [
        { provide: RagService, useValue: ragService },
        { provide: OllamaService, useValue: ollamaService },
        { provide: QdrantService, useValue: qdrantService },
      ],
    }).compile();

    controller = module.get<AiController>(AiController);
  });

  describe('chat', () => {
    it('should map diagnostics of a cycle without a generation backend', async () => {
      const result = await controller.chat({
        message: 'How do I block my card?',
        sessionId: 's1',
      });

      expect(result).toEqual({
        response: 'Sorry, something went wrong.',
        sessionId: 's1',
        metadata: {
          label: 'rag_required',
          confidence: 0.8,
          matchedSignals: ['domain_term'],
          route: 'none',
          retrievalCount: 0,
          retrievalError: true,
          generationError: false,
          generationBackend: 'none',
          failedStage: RoutingState.RETRIEVING,
          processingTime: 12,
          path: [RoutingState.START, RoutingState.DONE],
        },
      });
    });

    it('should pass resetHistory into the same cycle', async () => {
      await controller.chat({
        message: 'hello',
        sessionId: 's1',
        resetHistory: true,
      });

      expect(ragService.handle).toHaveBeenCalledWith('s1', 'hello', {
        resetHistory: true,
      });
      expect(ragService.reset).not.toHaveBeenCalled();
    });

    it('should start a new session when none is given', async () => {
      const result = await controller.chat({ message: 'hello' });

      expect(result.sessionId).toBe('session_1_abc');
      expect(ragService.handle).toHaveBeenCalledWith('session_1_abc', 'hello', {
        resetHistory: false,
      });
    });
  });

  it('should reset a session', async () => {
    await expect(controller.reset('s1')).resolves.toEqual({
      message: 'Conversation history cleared',
      sessionId: 's1',
    });
    expect(ragService.reset).toHaveBeenCalledWith('s1');
  });

  it('should list the retained turns', async () => {
    await expect(controller.history('s1')).resolves.toEqual({
      sessionId: 's1',
      messages: [
        { role: 'user', content: 'hello' },
        { role: 'assistant', content: 'Hi! How can I help?' },
      ],
      count: 2,
    });
  });

  describe('health', () => {
    it('should report ok when both backends answer', async () => {
      await expect(controller.health()).resolves.toEqual({
        status: 'ok',
        ollama: true,
        qdrant: true,
      });
    });

    it('should report degraded when the vector store is down', async () => {
      qdrantService.checkHealth.mockResolvedValue(false);

      await expect(controller.health()).resolves.toEqual({
        status: 'degraded',
        ollama: true,
        qdrant: false,
      });
    });
  });
});
