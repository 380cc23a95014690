import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosResponse } from 'axios';
import { Readable } from 'stream';
import {
  InitiateConversationPayload,
  UpstreamStreamResponse,
  UpstreamTextResponse,
} from './interfaces';

/**
 * Thin HTTP client for the LibreChat deployment behind the relay. Every
 * call resolves with the status it got; classifying the outcome is left to
 * the caller.
 */
@Injectable()
export class UpstreamService {
  private readonly logger = new Logger(UpstreamService.name);
  private readonly baseUrl: string;
  private readonly endpoint: string;
  private readonly userAgent: string;
  private readonly refreshTimeoutMs: number;
  private readonly initiateTimeoutMs: number;
  private readonly streamTimeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    this.baseUrl = (
      this.configService.get<string>('upstream.baseUrl') ||
      'https://chat.atxp.ai'
    ).replace(/\/+$/, '');
    this.endpoint = this.configService.get<string>('upstream.endpoint') || 'ATXP';
    this.userAgent = this.configService.get<string>('upstream.userAgent') || '';
    this.refreshTimeoutMs =
      this.configService.get<number>('upstream.refreshTimeoutMs') || 15000;
    this.initiateTimeoutMs =
      this.configService.get<number>('upstream.initiateTimeoutMs') || 30000;
    this.streamTimeoutMs =
      this.configService.get<number>('upstream.streamTimeoutMs') || 300000;
  }

  get endpointName(): string {
    return this.endpoint;
  }

  /**
   * Exchanges the rotating refresh credential for a short-lived access token.
   * A replacement credential, when issued, arrives in `Set-Cookie`.
   */
  async refreshSession(refreshToken: string): Promise<UpstreamTextResponse> {
    const response = await axios.post<string>(
      `${this.baseUrl}/api/auth/refresh`,
      {},
      {
        headers: {
          Cookie: `refreshToken=${refreshToken}`,
          'Content-Type': 'application/json',
          'Accept-Encoding': 'gzip, deflate',
          'User-Agent': this.userAgent,
        },
        responseType: 'text',
        timeout: this.refreshTimeoutMs,
        validateStatus: () => true,
      },
    );
    return this.toTextResponse(response);
  }

  async initiateConversation(
    accessToken: string,
    payload: InitiateConversationPayload,
  ): Promise<UpstreamTextResponse> {
    const url = `${this.baseUrl}/api/agents/chat/${this.endpoint}`;
    this.logger.debug(`Initiating conversation: ${url}`);

    const response = await axios.post<string>(url, payload, {
      headers: {
        ...this.authHeaders(accessToken),
        'Content-Type': 'application/json',
      },
      responseType: 'text',
      timeout: this.initiateTimeoutMs,
      validateStatus: () => true,
    });
    return this.toTextResponse(response);
  }

  async openConversationStream(
    accessToken: string,
    conversationId: string,
  ): Promise<UpstreamStreamResponse> {
    const url = `${this.baseUrl}/api/agents/chat/stream/${encodeURIComponent(conversationId)}`;

    const response = await axios.get<Readable>(url, {
      headers: this.authHeaders(accessToken),
      responseType: 'stream',
      timeout: this.streamTimeoutMs,
      validateStatus: () => true,
    });
    return { status: response.status, stream: response.data };
  }

  async fetchModels(accessToken: string): Promise<UpstreamTextResponse> {
    const response = await axios.get<string>(`${this.baseUrl}/api/models`, {
      headers: {
        Authorization: `Bearer ${accessToken}`,
        'Accept-Encoding': 'gzip, deflate',
        'User-Agent': this.userAgent,
      },
      responseType: 'text',
      timeout: this.initiateTimeoutMs,
      validateStatus: () => true,
    });
    return this.toTextResponse(response);
  }

  /** Drains a byte stream into a string, used for error bodies. */
  async readBody(stream: Readable): Promise<string> {
    const chunks: Buffer[] = [];
    const source: AsyncIterable<Buffer | string> = stream;
    for await (const chunk of source) {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
    }
    return Buffer.concat(chunks).toString('utf-8');
  }

  private authHeaders(accessToken: string): Record<string, string> {
    return {
      Authorization: `Bearer ${accessToken}`,
      'Accept-Encoding': 'gzip, deflate',
      Accept: 'application/json, text/plain, */*',
      Origin: this.baseUrl,
      Referer: `${this.baseUrl}/c/new`,
      'User-Agent': this.userAgent,
    };
  }

  private toTextResponse(response: AxiosResponse<unknown>): UpstreamTextResponse {
    const rawCookies: unknown = response.headers['set-cookie'];
    const setCookies = Array.isArray(rawCookies)
      ? rawCookies.filter((value): value is string => typeof value === 'string')
      : [];
    const contentType: unknown = response.headers['content-type'];
    const { data } = response;

    return {
      status: response.status,
      contentType: typeof contentType === 'string' ? contentType : '',
      body:
        typeof data === 'string'
          ? data
          : data === undefined || data === null
            ? ''
            : JSON.stringify(data),
      setCookies,
    };
  }
}
