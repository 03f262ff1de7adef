import { Body, Controller, Get, HttpCode, Param, Post } from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiTags } from '@nestjs/swagger';
import { RagService } from './rag/rag.service';
import { OllamaService } from './llm/ollama.service';
import { QdrantService } from './vector-store/qdrant.service';
import {
  ChatRequestDto,
  ChatResponseDto,
  HealthResponseDto,
  HistoryResponseDto,
  ResetResponseDto,
} from './dto/chat.dto';

@ApiTags('Support Chat')
@Controller()
export class AiController {
  constructor(
    private readonly ragService: RagService,
    private readonly ollamaService: OllamaService,
    private readonly qdrantService: QdrantService,
  ) {}

  @Post('chat')
  @HttpCode(200)
  @ApiOperation({
    summary: 'Answer one support utterance',
    description: `Classifies the utterance and routes it:
    - rag_required: knowledge-base search, then a grounded answer
    - direct_answer / greeting: answered without retrieval
    - unclear: asks the user to clarify

    Omit sessionId to start a new conversation; the response carries the id to reuse.`,
  })
  @ApiOkResponse({ type: ChatResponseDto })
  async chat(@Body() request: ChatRequestDto): Promise<ChatResponseDto> {
    const sessionId = request.sessionId ?? this.ragService.generateSessionId();
    const { response, diagnostics } = await this.ragService.handle(
      sessionId,
      request.message,
      { resetHistory: request.resetHistory === true },
    );

    return {
      response,
      sessionId,
      metadata: {
        label: diagnostics.label,
        confidence: diagnostics.confidence,
        matchedSignals: diagnostics.matchedSignals,
        route: diagnostics.route ?? 'none',
        retrievalCount: diagnostics.retrievalCount,
        retrievalError: diagnostics.retrievalError,
        generationError: diagnostics.generationError,
        generationBackend: diagnostics.generationBackend ?? 'none',
        failedStage: diagnostics.failedStage,
        processingTime: diagnostics.elapsedMs,
        path: diagnostics.path,
      },
    };
  }

  @Post('chat/:sessionId/reset')
  @HttpCode(200)
  @ApiOperation({ summary: 'Clear the conversation history of a session' })
  @ApiOkResponse({ type: ResetResponseDto })
  async reset(@Param('sessionId') sessionId: string): Promise<ResetResponseDto> {
    await this.ragService.reset(sessionId);
    return { message: 'Conversation history cleared', sessionId };
  }

  @Get('chat/:sessionId/history')
  @ApiOperation({ summary: 'List the retained turns of a session' })
  @ApiOkResponse({ type: HistoryResponseDto })
  async history(
    @Param('sessionId') sessionId: string,
  ): Promise<HistoryResponseDto> {
    const turns = await this.ragService.getHistory(sessionId);
    return {
      sessionId,
      messages: turns.map((turn) => ({ role: turn.role, content: turn.content })),
      count: turns.length,
    };
  }

  @Get('health')
  @ApiOperation({ summary: 'Report reachability of the LLM and vector store' })
  @ApiOkResponse({ type: HealthResponseDto })
  async health(): Promise<HealthResponseDto> {
    const [ollama, qdrant] = await Promise.all([
      this.ollamaService.checkHealth(),
      this.qdrantService.checkHealth(),
    ]);
    return { status: ollama && qdrant ? 'ok' : 'degraded', ollama, qdrant };
  }
}
