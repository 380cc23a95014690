import { StringDecoder } from 'string_decoder';

export const SSE_DONE_MARKER = '[DONE]';

export type SSEFrame = { type: 'data'; payload: unknown } | { type: 'done' };

/**
 * Incremental parser for `data:` server-sent events. Events are delimited by
 * a blank line; anything after the last delimiter is held until more bytes
 * arrive or {@link SSEStreamParser.flush} is called.
 */
export class SSEStreamParser {
  private buffer = '';
  private readonly decoder = new StringDecoder('utf8');

  parseChunk(chunk: Buffer | string): SSEFrame[] {
    const text = typeof chunk === 'string' ? chunk : this.decoder.write(chunk);
    this.buffer = (this.buffer + text).replace(/\r\n/g, '\n');

    const frames: SSEFrame[] = [];
    let boundary = this.buffer.indexOf('\n\n');
    while (boundary !== -1) {
      const block = this.buffer.slice(0, boundary);
      this.buffer = this.buffer.slice(boundary + 2);
      frames.push(...this.parseEvent(block));
      boundary = this.buffer.indexOf('\n\n');
    }
    return frames;
  }

  /** Parses whatever is left once the source has ended. */
  flush(): SSEFrame[] {
    const rest = (this.buffer + this.decoder.end()).replace(/\r\n/g, '\n');
    this.buffer = '';
    return rest.trim() ? this.parseEvent(rest) : [];
  }

  private parseEvent(block: string): SSEFrame[] {
    const frames: SSEFrame[] = [];
    for (const rawLine of block.split('\n')) {
      const line = rawLine.trim();
      if (!line.startsWith('data:')) continue;

      const data = line.slice(5).trim();
      if (!data) continue;
      if (data === SSE_DONE_MARKER) {
        frames.push({ type: 'done' });
        continue;
      }

      try {
        const payload: unknown = JSON.parse(data);
        frames.push({ type: 'data', payload });
      } catch {
        // malformed payloads are dropped, the stream keeps going
        continue;
      }
    }
    return frames;
  }
}
