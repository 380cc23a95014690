import {
  IsString,
  IsArray,
  IsOptional,
  IsBoolean,
  IsNumber,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class ContentPart {
  @ApiProperty({ example: 'text' })
  @IsString()
  type!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  text?: string;
}

export class MessageDto {
  @ApiProperty({ enum: ['system', 'user', 'assistant', 'tool'] })
  @IsString()
  role!: string;

  @ApiPropertyOptional({ oneOf: [{ type: 'string' }, { type: 'array' }] })
  @IsOptional()
  content?: string | ContentPart[];

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  name?: string;
}

export class ChatCompletionRequestDto {
  @ApiPropertyOptional({
    example: 'claude-opus-4-6',
    description:
      'Model id. Bare claude-* and gemini-* ids get their provider namespace.',
  })
  @IsOptional()
  @IsString()
  model?: string;

  @ApiProperty({ type: [MessageDto] })
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => MessageDto)
  messages!: MessageDto[];

  @ApiPropertyOptional({ example: false })
  @IsOptional()
  @IsBoolean()
  stream?: boolean;

  // Accepted for client compatibility; the upstream takes no sampling options
  @ApiPropertyOptional({ minimum: 0, maximum: 2, example: 1 })
  @IsOptional()
  @IsNumber()
  temperature?: number;

  @ApiPropertyOptional({ example: 4096 })
  @IsOptional()
  @IsNumber()
  max_tokens?: number;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  user?: string;
}
