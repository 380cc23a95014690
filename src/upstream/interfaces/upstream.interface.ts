import type { Readable } from 'stream';

/** A fully read upstream response, whatever its status. */
export interface UpstreamTextResponse {
  status: number;
  contentType: string;
  body: string;
  setCookies: string[];
}

export interface UpstreamStreamResponse {
  status: number;
  stream: Readable;
}

export interface EphemeralAgentSettings {
  mcp: string[];
  web_search: boolean;
  file_search: boolean;
  execute_code: boolean;
  artifacts: boolean;
}

/** Body of the conversation-start call (phase 1). */
export interface InitiateConversationPayload {
  text: string;
  sender: 'User';
  clientTimestamp: string;
  isCreatedByUser: true;
  parentMessageId: string;
  messageId: string;
  error: false;
  endpoint: string;
  endpointType: 'custom';
  model: string;
  modelLabel: null;
  spec: string;
  key: 'never';
  isTemporary: true;
  isRegenerate: false;
  isContinued: false;
  conversationId: null;
  ephemeralAgent: EphemeralAgentSettings;
}
