import type { Readable } from 'stream';
import type { AccountLease } from '../../accounts/account-lease';

/** Per-request state; lives only as long as the request. */
export interface ConversationSession {
  lease: AccountLease;
  /** Model id as the client sent it; echoed back in every chunk. */
  requestedModel: string;
  upstreamModel: string;
  conversationId: string;
  responseId: string;
}

export interface OpenedConversation {
  session: ConversationSession;
  stream: Readable;
}
