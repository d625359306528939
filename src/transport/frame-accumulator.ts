/**
 * Whole-buffer JSON framing.
 *
 * The daemon writes responses with no length prefix or delimiter. The only
 * boundary signal is that the accumulated bytes parse as JSON, so every new
 * chunk triggers a parse of everything received so far. When the daemon
 * streams several documents back to back they can land in one read; the
 * first complete value is then cut off and the rest is kept for the next
 * attempt.
 *
 * Bytes are kept raw and decoded per attempt: a multi-byte character split
 * across two chunks decodes correctly once both halves have arrived.
 */

export type ParseAttempt =
  | { complete: true; value: unknown; bytes: number }
  | { complete: false };

const OPEN_BRACE = 0x7b;
const CLOSE_BRACE = 0x7d;
const OPEN_BRACKET = 0x5b;
const CLOSE_BRACKET = 0x5d;
const QUOTE = 0x22;
const BACKSLASH = 0x5c;

/**
 * Byte offset just past the first complete top-level object or array, or
 * undefined when the buffer does not start with one that has closed yet.
 * Structural characters are ASCII, so scanning bytes is safe for UTF-8.
 */
export function firstValueEnd(buffer: Buffer): number | undefined {
  let start = 0;
  while (start < buffer.length && isWhitespace(buffer[start])) {
    start++;
  }
  const opener = buffer[start];
  if (opener !== OPEN_BRACE && opener !== OPEN_BRACKET) {
    return undefined;
  }

  let depth = 0;
  let inString = false;
  for (let i = start; i < buffer.length; i++) {
    const byte = buffer[i];
    if (inString) {
      if (byte === BACKSLASH) {
        i++;
      } else if (byte === QUOTE) {
        inString = false;
      }
      continue;
    }
    switch (byte) {
      case QUOTE:
        inString = true;
        break;
      case OPEN_BRACE:
      case OPEN_BRACKET:
        depth++;
        break;
      case CLOSE_BRACE:
      case CLOSE_BRACKET:
        depth--;
        if (depth === 0) {
          return i + 1;
        }
        break;
    }
  }
  return undefined;
}

function isWhitespace(byte: number | undefined): boolean {
  return byte === 0x20 || byte === 0x0a || byte === 0x0d || byte === 0x09;
}

function parseJson(buffer: Buffer): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(buffer.toString('utf-8')) };
  } catch {
    // Not (yet) a document
    return { ok: false };
  }
}

export class FrameAccumulator {
  private chunks: Buffer[] = [];
  private length = 0;

  push(chunk: Buffer): void {
    this.chunks.push(chunk);
    this.length += chunk.length;
  }

  get size(): number {
    return this.length;
  }

  /**
   * Try to parse the accumulated bytes as one JSON document. On success the
   * consumed bytes are dropped; on failure everything is kept for the next
   * chunk.
   */
  tryParse(): ParseAttempt {
    if (this.length === 0) {
      return { complete: false };
    }

    const buffer = this.chunks.length === 1 ? this.chunks[0] : Buffer.concat(this.chunks, this.length);
    if (!buffer) {
      return { complete: false };
    }
    this.chunks = [buffer];

    const whole = parseJson(buffer);
    if (whole.ok) {
      const bytes = this.length;
      this.reset();
      return { complete: true, value: whole.value, bytes };
    }

    // Several documents back to back: take the first, keep the rest
    const end = firstValueEnd(buffer);
    if (end === undefined || end >= buffer.length) {
      return { complete: false };
    }
    const first = parseJson(buffer.subarray(0, end));
    if (!first.ok) {
      return { complete: false };
    }

    const rest = buffer.subarray(end);
    this.chunks = [rest];
    this.length = rest.length;
    return { complete: true, value: first.value, bytes: end };
  }

  reset(): void {
    this.chunks = [];
    this.length = 0;
  }
}
