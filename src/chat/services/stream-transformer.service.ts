import { Injectable, Logger } from '@nestjs/common';
import type { Response } from 'express';
import { Readable } from 'stream';
import {
  SSEFrame,
  SSEStreamParser,
  SSE_DONE_MARKER,
  classifyUpstreamEvent,
} from '../../common/utils';
import {
  ChatCompletionChunk,
  ChatCompletionChunkChoice,
  ChatCompletionResponse,
  FinishReason,
} from '../dto';
import { ConversationSession } from '../interfaces';

/**
 * Translates the LibreChat agents event stream into OpenAI chat completion
 * output, either chunk by chunk or as one buffered response.
 */
@Injectable()
export class StreamTransformerService {
  private readonly logger = new Logger(StreamTransformerService.name);

  /**
   * Forwards upstream deltas to the client as `chat.completion.chunk`
   * events. Always ends with a finish chunk and `[DONE]`, whether upstream
   * sent its own end marker, closed early, or the client went away. The
   * session's lease is released once the stream is over.
   */
  async pipeToResponse(
    source: Readable,
    res: Response,
    session: ConversationSession,
  ): Promise<void> {
    const parser = new SSEStreamParser();
    let settled = false;
    const onClientClose = () => {
      if (!settled) {
        this.logger.debug(`Client closed ${session.responseId} mid-stream`);
        source.destroy();
      }
    };
    res.on('close', onClientClose);

    this.setSSEHeaders(res);
    this.writeChunk(res, this.createChunk(session, { role: 'assistant' }, null));

    try {
      let sawDone = false;
      const chunks: AsyncIterable<Buffer | string> = source;

      for await (const chunk of chunks) {
        if (this.isClosed(res)) break;
        sawDone = this.forwardFrames(parser.parseChunk(chunk), res, session);
        if (sawDone) break;
      }

      if (!sawDone && !this.isClosed(res)) {
        this.forwardFrames(parser.flush(), res, session);
      }
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : 'Unknown error';
      this.logger.warn(
        `[${session.lease.account.email}] Stream transport error: ${errorMessage}`,
      );
    } finally {
      settled = true;
      res.off('close', onClientClose);
      this.endStream(res, session);
      if (!source.destroyed) source.destroy();
      session.lease.release();
    }
  }

  /**
   * Reads the whole upstream stream and returns the concatenated text as a
   * single `chat.completion`. Transport errors propagate to the caller.
   */
  async collect(
    source: Readable,
    session: ConversationSession,
  ): Promise<ChatCompletionResponse> {
    const parser = new SSEStreamParser();
    let content = '';
    const chunks: AsyncIterable<Buffer | string> = source;

    for await (const chunk of chunks) {
      content += this.collectText(parser.parseChunk(chunk));
    }
    content += this.collectText(parser.flush());

    return {
      id: session.responseId,
      object: 'chat.completion',
      created: Math.floor(Date.now() / 1000),
      model: session.requestedModel,
      system_fingerprint: null,
      choices: [
        {
          index: 0,
          message: { role: 'assistant', content },
          logprobs: null,
          finish_reason: 'stop',
        },
      ],
      usage: { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 },
    };
  }

  createChunk(
    session: ConversationSession,
    delta: ChatCompletionChunkChoice['delta'],
    finishReason: FinishReason,
  ): ChatCompletionChunk {
    return {
      id: session.responseId,
      object: 'chat.completion.chunk',
      created: Math.floor(Date.now() / 1000),
      model: session.requestedModel,
      system_fingerprint: null,
      choices: [
        {
          index: 0,
          delta,
          logprobs: null,
          finish_reason: finishReason,
        },
      ],
    };
  }

  /**
   * Writes a content chunk per text delta.
   *
   * @returns True once the upstream end marker has been seen
   */
  private forwardFrames(
    frames: SSEFrame[],
    res: Response,
    session: ConversationSession,
  ): boolean {
    for (const frame of frames) {
      if (frame.type === 'done') {
        return true;
      }
      const event = classifyUpstreamEvent(frame.payload);
      if (event.kind === 'delta') {
        this.writeChunk(res, this.createChunk(session, { content: event.text }, null));
      }
    }
    return false;
  }

  private collectText(frames: SSEFrame[]): string {
    let text = '';
    for (const frame of frames) {
      if (frame.type !== 'data') continue;
      const event = classifyUpstreamEvent(frame.payload);
      if (event.kind === 'delta') text += event.text;
    }
    return text;
  }

  private endStream(res: Response, session: ConversationSession): void {
    if (this.isClosed(res)) {
      return;
    }
    this.writeChunk(res, this.createChunk(session, {}, 'stop'));
    res.write(`data: ${SSE_DONE_MARKER}\n\n`);
    res.end();
  }

  private writeChunk(res: Response, chunk: ChatCompletionChunk): void {
    if (!this.isClosed(res)) {
      res.write(`data: ${JSON.stringify(chunk)}\n\n`);
    }
  }

  private isClosed(res: Response): boolean {
    return res.writableEnded || res.destroyed;
  }

  private setSSEHeaders(res: Response): void {
    if (res.headersSent) return;
    res.status(200);
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no');
  }
}
