/**
 * Wire frames exchanged with the browser client over the WebSocket.
 *
 * Inbound:  { "message": string }
 * Outbound: connection | tool_use | response | error
 */

import { NotificationEvent } from './types';

// ─── Outbound ───────────────────────────────────────────────────────────────

export type OutboundFrame =
  | { type: 'connection'; status: 'connected'; session_id: string; user_id: string }
  | { type: 'tool_use'; tool: string; status: 'completed' }
  | { type: 'response'; content: string }
  | { type: 'error'; content: string };

export function toFrame(sessionId: string, event: NotificationEvent): OutboundFrame {
  switch (event.type) {
    case 'connected':
      return { type: 'connection', status: 'connected', session_id: sessionId, user_id: event.userId };
    case 'tool_invocation_completed':
      return { type: 'tool_use', tool: event.toolName, status: 'completed' };
    case 'final_response':
      return { type: 'response', content: event.text };
    case 'error':
      return { type: 'error', content: event.message };
  }
}

// ─── Inbound ────────────────────────────────────────────────────────────────

export interface InboundMessage {
  message: string;
}

export type ParseResult =
  | { ok: true; frame: InboundMessage }
  | { ok: false; error: string };

export function parseInboundFrame(raw: string, maxBytes: number): ParseResult {
  const size = Buffer.byteLength(raw, 'utf8');
  if (size > maxBytes) {
    return { ok: false, error: `frame_too_large:${size}` };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { ok: false, error: 'invalid_json' };
  }

  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return { ok: false, error: 'invalid_frame' };
  }

  const message: unknown = Reflect.get(parsed, 'message');
  if (typeof message !== 'string') {
    return { ok: false, error: 'missing_message' };
  }
  if (!message.trim()) {
    return { ok: false, error: 'empty_message' };
  }

  return { ok: true, frame: { message } };
}

const PARSE_ERROR_TEXT: Record<string, string> = {
  invalid_json: 'Message frame is not valid JSON',
  invalid_frame: 'Message frame must be a JSON object',
  missing_message: 'Message frame must include a "message" string',
  empty_message: 'Message text is empty',
};

/** Human-readable text for a parse error code, sent back in an error frame. */
export function describeParseError(code: string): string {
  if (code.startsWith('frame_too_large:')) {
    return `Message frame is too large (${code.slice('frame_too_large:'.length)} bytes)`;
  }
  return PARSE_ERROR_TEXT[code] ?? `Invalid message frame: ${code}`;
}
