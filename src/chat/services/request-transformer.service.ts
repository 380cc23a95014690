import { Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { InitiateConversationPayload } from '../../upstream/interfaces';
import { isRecord } from '../../common/utils';
import {
  MODEL_NAMESPACE_PREFIXES,
  NAMESPACE_SEPARATOR,
  NO_MCP_SERVERS,
  ROOT_PARENT_MESSAGE_ID,
} from '../constants';
import { ContentPart, MessageDto } from '../dto';

/**
 * Turns OpenAI chat requests into the single-prompt conversation start the
 * LibreChat agents endpoint expects.
 */
@Injectable()
export class RequestTransformerService {
  /**
   * Adds the provider namespace to bare `claude-*` / `gemini-*` ids. Ids that
   * already carry a namespace, and anything else, pass through.
   */
  normalizeModel(model: string): string {
    if (model.includes(NAMESPACE_SEPARATOR)) {
      return model;
    }
    for (const [prefix, namespace] of MODEL_NAMESPACE_PREFIXES) {
      if (model.startsWith(prefix)) {
        return `${namespace}${NAMESPACE_SEPARATOR}${model}`;
      }
    }
    return model;
  }

  /**
   * Flattens the message list into one transcript. System and assistant
   * turns are tagged, user and tool turns are left bare. Turns without
   * text are kept, so an empty system turn still reads `[System] `.
   */
  buildTranscript(messages: MessageDto[]): string {
    const parts: string[] = [];

    for (const message of messages) {
      const content = this.flattenContent(message.content);

      switch (message.role) {
        case 'system':
          parts.push(`[System] ${content}`);
          break;
        case 'assistant':
          parts.push(`[Assistant] ${content}`);
          break;
        default:
          parts.push(content);
      }
    }

    return parts.join('\n\n');
  }

  buildInitiatePayload(
    text: string,
    upstreamModel: string,
    endpoint: string,
  ): InitiateConversationPayload {
    return {
      text,
      sender: 'User',
      clientTimestamp: new Date().toISOString().slice(0, 19),
      isCreatedByUser: true,
      parentMessageId: ROOT_PARENT_MESSAGE_ID,
      messageId: uuidv4(),
      error: false,
      endpoint,
      endpointType: 'custom',
      model: upstreamModel,
      modelLabel: null,
      spec: upstreamModel,
      key: 'never',
      isTemporary: true,
      isRegenerate: false,
      isContinued: false,
      conversationId: null,
      ephemeralAgent: {
        mcp: [NO_MCP_SERVERS],
        web_search: false,
        file_search: false,
        execute_code: false,
        artifacts: false,
      },
    };
  }

  private flattenContent(content: MessageDto['content']): string {
    if (typeof content === 'string') {
      return content;
    }
    if (!Array.isArray(content)) {
      return '';
    }
    // elements are not validated, so anything may sit in the array
    const parts: unknown[] = content;
    return parts
      .filter(
        (part): part is ContentPart => isRecord(part) && part.type === 'text',
      )
      .map((part) => (typeof part.text === 'string' ? part.text : ''))
      .join(' ');
  }
}
