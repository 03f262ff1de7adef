import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsBoolean,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';
import { Transform } from 'class-transformer';
import { RouteDecision, RoutingState } from '../rag/routing-state';

export class ChatRequestDto {
  @ApiProperty({
    description: 'The user utterance',
    example: 'How do I block my card?',
  })
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  @IsString()
  @IsNotEmpty()
  @MaxLength(4000)
  message!: string;

  @ApiPropertyOptional({
    description: 'Pass to continue an existing conversation',
    example: 'session_1700000000000_abc123def',
  })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  sessionId?: string;

  @ApiPropertyOptional({
    description: 'Clear the session history before answering',
    default: false,
  })
  @IsOptional()
  @IsBoolean()
  resetHistory?: boolean;
}

export class ChatMetadataDto {
  @ApiProperty({ example: 'rag_required' })
  label!: string;

  @ApiProperty({ example: 1 })
  confidence!: number;

  @ApiProperty({ type: [String], example: ['domain_keyword', 'interrogative'] })
  matchedSignals!: string[];

  @ApiProperty({ enum: ['retrieval', 'direct', 'clarify', 'none'] })
  route!: RouteDecision['kind'] | 'none';

  @ApiProperty({ example: 3 })
  retrievalCount!: number;

  @ApiProperty()
  retrievalError!: boolean;

  @ApiProperty()
  generationError!: boolean;

  @ApiProperty({ example: 'ollama:llama3.2' })
  generationBackend!: string;

  @ApiProperty({ enum: RoutingState, nullable: true })
  failedStage!: RoutingState | null;

  @ApiProperty({ example: 412 })
  processingTime!: number;

  @ApiProperty({ enum: RoutingState, isArray: true })
  path!: RoutingState[];
}

export class ChatResponseDto {
  @ApiProperty()
  response!: string;

  @ApiProperty()
  sessionId!: string;

  @ApiProperty({ type: ChatMetadataDto })
  metadata!: ChatMetadataDto;
}

export class TurnDto {
  @ApiProperty({ enum: ['user', 'assistant'] })
  role!: 'user' | 'assistant';

  @ApiProperty()
  content!: string;
}

export class HistoryResponseDto {
  @ApiProperty()
  sessionId!: string;

  @ApiProperty({ type: [TurnDto] })
  messages!: TurnDto[];

  @ApiProperty()
  count!: number;
}

export class ResetResponseDto {
  @ApiProperty({ example: 'Conversation history cleared' })
  message!: string;

  @ApiProperty()
  sessionId!: string;
}

export class HealthResponseDto {
  @ApiProperty({ enum: ['ok', 'degraded'] })
  status!: 'ok' | 'degraded';

  @ApiProperty()
  ollama!: boolean;

  @ApiProperty()
  qdrant!: boolean;
}
