import { HttpException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Response } from 'express';
import { Readable } from 'stream';
import { v4 as uuidv4 } from 'uuid';
import { AccountsService } from '../accounts/accounts.service';
import { TokenService } from '../accounts/token.service';
import { AccountLease } from '../accounts/account-lease';
import { Account } from '../accounts/interfaces';
import {
  InvalidModelError,
  InvalidRequestError,
  PoolExhaustedError,
  RateLimitedError,
  RelayError,
  UnexpectedResponseError,
  UpstreamError,
} from '../common/errors';
import {
  SSEStreamParser,
  classifyUpstreamEvent,
  delay,
  isRecord,
  truncate,
} from '../common/utils';
import { UpstreamService } from '../upstream/upstream.service';
import { UpstreamTextResponse } from '../upstream/interfaces';
import {
  ChatCompletionRequestDto,
  ChatCompletionResponse,
  ModelsResponse,
} from './dto';
import { OpenedConversation } from './interfaces';
import { RequestTransformerService } from './services/request-transformer.service';
import { StreamTransformerService } from './services/stream-transformer.service';

/**
 * Drives a chat completion through the upstream's two calls: start a
 * conversation, then read its event stream.
 */
@Injectable()
export class ChatService {
  private readonly logger = new Logger(ChatService.name);
  private readonly defaultModel: string;
  private readonly servedNamespace: string;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;

  constructor(
    private readonly accountsService: AccountsService,
    private readonly tokenService: TokenService,
    private readonly upstreamService: UpstreamService,
    private readonly requestTransformer: RequestTransformerService,
    private readonly streamTransformer: StreamTransformerService,
    private readonly configService: ConfigService,
  ) {
    this.defaultModel =
      this.configService.get<string>('defaultModel') ||
      'anthropic/claude-opus-4-6';
    this.servedNamespace =
      this.configService.get<string>('upstream.servedNamespace') || 'anthropic';
    this.maxAttempts = this.configService.get<number>('retry.maxAttempts') || 3;
    this.baseDelayMs =
      this.configService.get<number>('retry.baseDelayMs') ?? 1000;
  }

  async chatCompletion(
    dto: ChatCompletionRequestDto,
  ): Promise<ChatCompletionResponse> {
    const { session, stream } = await this.openConversation(dto);

    try {
      const response = await this.streamTransformer.collect(stream, session);
      session.lease.release();
      return response;
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : 'Unknown error';
      session.lease.release(truncate(errorMessage));
      throw new UpstreamError(`Stream error: ${errorMessage}`);
    }
  }

  /**
   * Streams the completion into `res`. Failures before the first byte are
   * thrown; after that the stream transformer owns the response and the
   * lease.
   */
  async chatCompletionStream(
    dto: ChatCompletionRequestDto,
    res: Response,
  ): Promise<void> {
    const { session, stream } = await this.openConversation(dto);
    await this.streamTransformer.pipeToResponse(stream, res, session);
  }

  /**
   * Lists the models of the served namespace, as reported by upstream.
   */
  async listModels(): Promise<ModelsResponse> {
    const lease = this.accountsService.lease();
    if (!lease) {
      throw new PoolExhaustedError();
    }

    let catalog: unknown;
    try {
      const accessToken = await this.tokenService.ensureToken(lease.account);
      const response = await this.upstreamService.fetchModels(accessToken);
      if (response.status !== 200) {
        throw new UpstreamError(
          `Model listing failed [${response.status}]: ${truncate(response.body)}`,
        );
      }
      catalog = this.parseJson(response);
    } catch (error) {
      this.releaseAfterFailure(lease, error);
      throw this.toHttpException(error);
    }
    lease.release();

    const names = isRecord(catalog) ? catalog[this.servedNamespace] : undefined;
    const created = Math.floor(Date.now() / 1000);

    return {
      object: 'list',
      data: (Array.isArray(names) ? names : [])
        .filter((name): name is string => typeof name === 'string')
        .map((name) => ({
          id: `${this.servedNamespace}/${name}`,
          object: 'model' as const,
          created,
          owned_by: this.servedNamespace,
        })),
    };
  }

  private async openConversation(
    dto: ChatCompletionRequestDto,
  ): Promise<OpenedConversation> {
    const transcript = this.requestTransformer.buildTranscript(dto.messages);
    if (!transcript) {
      throw new InvalidRequestError('No messages');
    }

    const requestedModel = dto.model || this.defaultModel;
    const upstreamModel = this.requestTransformer.normalizeModel(requestedModel);

    const lease = this.accountsService.lease();
    if (!lease) {
      throw new PoolExhaustedError();
    }
    const { account } = lease;

    try {
      const accessToken = await this.tokenService.ensureToken(account);
      const conversationId = await this.initiateConversation(
        account,
        accessToken,
        transcript,
        requestedModel,
        upstreamModel,
      );

      this.logger.log(
        `[${account.email}] Conversation started: conv=${conversationId.slice(0, 12)} model=${upstreamModel}`,
      );

      const stream = await this.openStream(accessToken, conversationId);

      return {
        session: {
          lease,
          requestedModel,
          upstreamModel,
          conversationId,
          responseId: `chatcmpl-${uuidv4()}`,
        },
        stream,
      };
    } catch (error) {
      this.releaseAfterFailure(lease, error);
      throw this.toHttpException(error);
    }
  }

  /**
   * Phase 1. Retries on 429 with exponential backoff.
   *
   * @returns The upstream conversation id
   */
  private async initiateConversation(
    account: Account,
    accessToken: string,
    transcript: string,
    requestedModel: string,
    upstreamModel: string,
  ): Promise<string> {
    const payload = this.requestTransformer.buildInitiatePayload(
      transcript,
      upstreamModel,
      this.upstreamService.endpointName,
    );

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const response = await this.upstreamService.initiateConversation(
        accessToken,
        payload,
      );

      if (response.status !== 429) {
        return this.classifyInitiateResponse(response, requestedModel);
      }

      this.logger.warn(
        `[${account.email}] Concurrency limit (attempt ${attempt + 1}/${this.maxAttempts}): ${truncate(response.body, 100)}`,
      );
      if (attempt < this.maxAttempts - 1) {
        await delay(this.baseDelayMs * 2 ** attempt);
      }
    }

    throw new RateLimitedError();
  }

  private classifyInitiateResponse(
    response: UpstreamTextResponse,
    requestedModel: string,
  ): string {
    if (response.status !== 200) {
      const body = truncate(response.body);
      throw new UpstreamError(
        `Chat init failed [${response.status}]: ${body}`,
        body || `HTTP ${response.status}`,
      );
    }

    if (response.contentType.includes('application/json')) {
      const data = this.parseJson(response);
      const conversationId = isRecord(data) ? data.conversationId : undefined;
      if (typeof conversationId !== 'string' || !conversationId) {
        throw new UpstreamError('No conversationId in response', 'No conversationId');
      }
      return conversationId;
    }

    // An event stream here means the upstream refused the turn inline
    const parser = new SSEStreamParser();
    const frames = [...parser.parseChunk(response.body), ...parser.flush()];
    for (const frame of frames) {
      if (frame.type !== 'data') continue;

      const event = classifyUpstreamEvent(frame.payload);
      if (event.kind === 'invalid-model') {
        throw new InvalidModelError(requestedModel);
      }
      if (event.kind === 'error') {
        throw new UpstreamError(`Upstream error: ${event.message}`, event.message);
      }
    }

    throw new UnexpectedResponseError(`Unexpected SSE: ${truncate(response.body)}`);
  }

  /** Phase 2. */
  private async openStream(
    accessToken: string,
    conversationId: string,
  ): Promise<Readable> {
    const { status, stream } = await this.upstreamService.openConversationStream(
      accessToken,
      conversationId,
    );

    if (status !== 200) {
      const body = await this.upstreamService.readBody(stream);
      throw new UpstreamError(
        `Stream failed [${status}]: ${truncate(body)}`,
        `Stream [${status}]`,
      );
    }

    return stream;
  }

  private parseJson(response: UpstreamTextResponse): unknown {
    try {
      const data: unknown = JSON.parse(response.body);
      return data;
    } catch {
      throw new UnexpectedResponseError(
        `Unparsable JSON: ${truncate(response.body)}`,
      );
    }
  }

  /**
   * Failures the account did not cause leave its health as it was; anything
   * else counts against it.
   */
  private releaseAfterFailure(lease: AccountLease, error: unknown): void {
    if (error instanceof RelayError && !error.penalizesAccount) {
      lease.releaseNeutral();
      return;
    }
    lease.release(this.describeFailure(error));
  }

  private describeFailure(error: unknown): string {
    if (error instanceof RelayError) {
      return error.diagnostic;
    }
    if (error instanceof Error) {
      return truncate(error.message) || error.name;
    }
    return 'Unknown error';
  }

  private toHttpException(error: unknown): HttpException {
    if (error instanceof HttpException) {
      return error;
    }
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    return new UpstreamError(`Upstream request failed: ${errorMessage}`);
  }
}
