import { truncate } from './truncate.util';

export const INVALID_MODEL_MARKER = 'Invalid model spec';

export type UpstreamEvent =
  | { kind: 'delta'; text: string }
  | { kind: 'invalid-model' }
  | { kind: 'error'; message: string }
  | { kind: 'unrecognized' };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Classifies one parsed LibreChat agents event.
 *
 * Deltas look like
 * `{"event":"on_message_delta","data":{"delta":{"content":[{"type":"text","text":"..."}]}}}`.
 */
export function classifyUpstreamEvent(payload: unknown): UpstreamEvent {
  if (!isRecord(payload)) {
    return { kind: 'unrecognized' };
  }

  if (payload.event === 'on_message_delta') {
    const text = extractDeltaText(payload.data);
    return text ? { kind: 'delta', text } : { kind: 'unrecognized' };
  }

  if (payload.text === INVALID_MODEL_MARKER) {
    return { kind: 'invalid-model' };
  }

  if (payload.error) {
    const message =
      typeof payload.text === 'string' && payload.text
        ? payload.text
        : truncate(JSON.stringify(payload));
    return { kind: 'error', message };
  }

  return { kind: 'unrecognized' };
}

function extractDeltaText(data: unknown): string {
  if (!isRecord(data)) return '';
  const delta = data.delta;
  if (!isRecord(delta)) return '';
  const content = delta.content;
  if (!Array.isArray(content)) return '';

  let text = '';
  for (const part of content) {
    if (isRecord(part) && part.type === 'text' && typeof part.text === 'string') {
      text += part.text;
    }
  }
  return text;
}
