import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { Readable } from 'stream';
import { UpstreamService } from './upstream.service';
import { RequestTransformerService } from '../chat/services/request-transformer.service';

jest.mock('axios');

const mockedAxios = axios as jest.Mocked<typeof axios>;

describe('UpstreamService', () => {
  let service: UpstreamService;

  const config: Record<string, unknown> = {
    'upstream.baseUrl': 'https://chat.example.test/',
    'upstream.endpoint': 'ATXP',
    'upstream.userAgent': 'test-agent',
    'upstream.refreshTimeoutMs': 15000,
    'upstream.initiateTimeoutMs': 30000,
    'upstream.streamTimeoutMs': 300000,
  };

  beforeEach(async () => {
    jest.clearAllMocks();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        UpstreamService,
        {
          provide: ConfigService,
          useValue: { get: jest.fn((key: string) => config[key]) },
        },
      ],
    }).compile();

    service = module.get<UpstreamService>(UpstreamService);
  });

  it('should expose the configured endpoint', () => {
    expect(service.endpointName).toBe('ATXP');
  });

  describe('refreshSession', () => {
    it('should present the refresh cookie and collect Set-Cookie', async () => {
      mockedAxios.post.mockResolvedValueOnce({
        status: 200,
        headers: {
          'content-type': 'application/json; charset=utf-8',
          'set-cookie': ['refreshToken=rotated; Path=/api; HttpOnly'],
        },
        data: '{"token":"access"}',
      });

      await expect(service.refreshSession('test-refresh')).resolves.toEqual({
        status: 200,
        contentType: 'application/json; charset=utf-8',
        body: '{"token":"access"}',
        setCookies: ['refreshToken=rotated; Path=/api; HttpOnly'],
      });

      // eslint-disable-next-line @typescript-eslint/unbound-method
      expect(mockedAxios.post).toHaveBeenCalledWith(
        'https://chat.example.test/api/auth/refresh',
        {},
        expect.objectContaining({
          headers: expect.objectContaining({
            Cookie: 'refreshToken=test-refresh',
            'User-Agent': 'test-agent',
          }),
          responseType: 'text',
          timeout: 15000,
        }),
      );
    });

    it('should return error statuses instead of throwing', async () => {
      mockedAxios.post.mockResolvedValueOnce({
        status: 401,
        headers: {},
        data: 'Unauthorized',
      });

      await expect(service.refreshSession('test-refresh')).resolves.toEqual({
        status: 401,
        contentType: '',
        body: 'Unauthorized',
        setCookies: [],
      });
    });
  });

  describe('initiateConversation', () => {
    it('should post the payload to the agents endpoint', async () => {
      mockedAxios.post.mockResolvedValueOnce({
        status: 200,
        headers: { 'content-type': 'application/json' },
        data: { conversationId: 'conv-1' },
      });
      const payload = new RequestTransformerService().buildInitiatePayload(
        'Hi',
        'anthropic/claude-opus-4-6',
        'ATXP',
      );

      const result = await service.initiateConversation('test-token', payload);

      expect(result.body).toBe('{"conversationId":"conv-1"}');
      // eslint-disable-next-line @typescript-eslint/unbound-method
      expect(mockedAxios.post).toHaveBeenCalledWith(
        'https://chat.example.test/api/agents/chat/ATXP',
        payload,
        expect.objectContaining({
          headers: expect.objectContaining({
            Authorization: 'Bearer test-token',
            Origin: 'https://chat.example.test',
            'Content-Type': 'application/json',
          }),
          timeout: 30000,
        }),
      );
    });
  });

  describe('openConversationStream', () => {
    it('should open the conversation stream as a byte stream', async () => {
      const stream = Readable.from(['data: [DONE]\n\n']);
      mockedAxios.get.mockResolvedValueOnce({ status: 200, headers: {}, data: stream });

      await expect(
        service.openConversationStream('test-token', 'conv/1'),
      ).resolves.toEqual({ status: 200, stream });

      // eslint-disable-next-line @typescript-eslint/unbound-method
      expect(mockedAxios.get).toHaveBeenCalledWith(
        'https://chat.example.test/api/agents/chat/stream/conv%2F1',
        expect.objectContaining({
          responseType: 'stream',
          timeout: 300000,
        }),
      );
    });
  });

  describe('fetchModels', () => {
    it('should fetch the model catalog', async () => {
      mockedAxios.get.mockResolvedValueOnce({
        status: 200,
        headers: { 'content-type': 'application/json' },
        data: '{"anthropic":["claude-opus-4-6"]}',
      });

      const result = await service.fetchModels('test-token');

      expect(result.body).toBe('{"anthropic":["claude-opus-4-6"]}');
      // eslint-disable-next-line @typescript-eslint/unbound-method
      expect(mockedAxios.get).toHaveBeenCalledWith(
        'https://chat.example.test/api/models',
        expect.objectContaining({
          headers: expect.objectContaining({ Authorization: 'Bearer test-token' }),
        }),
      );
    });
  });

  describe('readBody', () => {
    it('should concatenate buffers and strings', async () => {
      const stream = Readable.from([Buffer.from('not '), 'found']);

      await expect(service.readBody(stream)).resolves.toBe('not found');
    });
  });
});
