import {
  Controller,
  Post,
  Get,
  Body,
  Res,
  UseGuards,
  HttpCode,
} from '@nestjs/common';
import {
  ApiTags,
  ApiBearerAuth,
  ApiOperation,
  ApiResponse,
} from '@nestjs/swagger';
import type { Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { ChatService } from './chat.service';
import { ChatCompletionRequestDto, ModelsResponse } from './dto';
import { ApiKeyGuard } from '../common/guards/api-key.guard';

@Controller('v1')
@UseGuards(ApiKeyGuard)
@ApiBearerAuth()
export class ChatController {
  constructor(private readonly chatService: ChatService) {}

  @Post('chat/completions')
  @HttpCode(200)
  @ApiTags('OpenAI Compatible')
  @ApiOperation({
    summary: 'Create chat completion',
    description:
      'Creates a model response for the given chat conversation. Compatible with OpenAI API format.',
  })
  @ApiResponse({ status: 200, description: 'Chat completion response' })
  @ApiResponse({ status: 400, description: 'Invalid request or model' })
  @ApiResponse({ status: 401, description: 'Unauthorized - invalid API key' })
  @ApiResponse({ status: 429, description: 'Upstream concurrency limit' })
  @ApiResponse({ status: 503, description: 'No accounts available' })
  async chatCompletions(
    @Body() dto: ChatCompletionRequestDto,
    @Res() res: Response,
  ): Promise<void> {
    const requestId = `req_${uuidv4().replace(/-/g, '').slice(0, 24)}`;
    const startTime = Date.now();

    res.setHeader('x-request-id', requestId);

    if (dto.stream) {
      await this.chatService.chatCompletionStream(dto, res);
      return;
    }

    const result = await this.chatService.chatCompletion(dto);
    res.setHeader('openai-processing-ms', String(Date.now() - startTime));
    res.status(200).json(result);
  }

  @Get('models')
  @ApiTags('Models')
  @ApiOperation({
    summary: 'List available models',
    description: 'Lists the models the upstream serves',
  })
  @ApiResponse({ status: 200, description: 'List of available models' })
  async listModels(
    @Res({ passthrough: true }) res: Response,
  ): Promise<ModelsResponse> {
    const requestId = `req_${uuidv4().replace(/-/g, '').slice(0, 24)}`;
    res.setHeader('x-request-id', requestId);
    return this.chatService.listModels();
  }
}
