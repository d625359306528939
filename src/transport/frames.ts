/**
 * Response frames
 *
 * A response document is either the bare frame array
 *
 *   [{"Response": "hello there", "Error": ""}]
 *
 * or the streaming envelope, where More announces further documents:
 *
 *   {"Resp": [...frames], "Rendered": "...", "More": true}
 */

import { z } from 'zod';
import { ParseError } from '../errors.js';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

const wireFrameSchema = z.object({
  Response: jsonValueSchema.optional(),
  Error: z.string().nullish(),
  Host: z.string().optional(),
  Header: z.array(z.string()).nullish(),
  Tabular: z.array(z.array(z.string())).nullish(),
});

const frameListSchema = z.array(wireFrameSchema).nullable();

const envelopeSchema = z.object({
  Resp: frameListSchema,
  Rendered: z.string().optional(),
  More: z.boolean().optional(),
});

export interface ResponseFrame {
  response: JsonValue;
  /** Empty when the command succeeded */
  error: string;
  host?: string;
  header?: string[];
  tabular?: string[][];
}

export interface DecodedResponse {
  frames: ResponseFrame[];
  /** Daemon announced more documents for this request */
  more: boolean;
}

type WireFrame = z.infer<typeof wireFrameSchema>;

function toFrame(wire: WireFrame): ResponseFrame {
  const frame: ResponseFrame = {
    response: wire.Response ?? '',
    error: wire.Error ?? '',
  };
  if (wire.Host !== undefined) frame.host = wire.Host;
  if (wire.Header) frame.header = wire.Header;
  if (wire.Tabular) frame.tabular = wire.Tabular;
  return frame;
}

/**
 * Convert one parsed response document into frames.
 */
export function decodeResponse(value: unknown): DecodedResponse {
  if (Array.isArray(value)) {
    const frames = frameListSchema.safeParse(value);
    if (!frames.success) {
      throw new ParseError('malformed response frames', {}, frames.error);
    }
    return { frames: (frames.data ?? []).map(toFrame), more: false };
  }

  const envelope = envelopeSchema.safeParse(value);
  if (!envelope.success) {
    throw new ParseError('unrecognised response document', {}, envelope.error);
  }

  return {
    frames: (envelope.data.Resp ?? []).map(toFrame),
    more: envelope.data.More ?? false,
  };
}

/**
 * Encode a request the way the daemon expects it: one compact JSON object.
 */
export function encodeRequest(command: string, args: readonly string[]): Buffer {
  return Buffer.from(JSON.stringify({ Command: command, Args: args }), 'utf-8');
}

/**
 * Human-readable text for a frame: an aligned table when the daemon sent
 * tabular data, the response itself when it is text, JSON otherwise.
 */
export function formatFrame(frame: ResponseFrame): string {
  if (frame.header && frame.tabular) {
    const rows = [frame.header, ...frame.tabular];
    const widths = frame.header.map((_, column) =>
      Math.max(...rows.map((row) => (row[column] ?? '').length)),
    );
    return rows
      .map((row) => widths.map((width, column) => (row[column] ?? '').padEnd(width)).join(' | ').trimEnd())
      .join('\n');
  }
  if (typeof frame.response === 'string') {
    return frame.response;
  }
  return JSON.stringify(frame.response, null, 2);
}
