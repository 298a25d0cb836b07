// ─── Content blocks ─────────────────────────────────────────────────────────

export interface TextBlock {
  type: 'text';
  text: string;
}

/** A model's request to run a named tool. */
export interface ToolUseBlock {
  type: 'tool_use';
  id: string;
  name: string;
  input: Record<string, unknown>;
}

/** Answer to exactly one ToolUseBlock, matched by `toolUseId`. */
export interface ToolResultBlock {
  type: 'tool_result';
  toolUseId: string;
  content: string;
  /** Set when `content` is an error payload rather than tool output. */
  isError?: boolean;
}

export type ContentBlock = TextBlock | ToolUseBlock | ToolResultBlock;

/** Blocks a model response may contain. */
export type AssistantBlock = TextBlock | ToolUseBlock;

// ─── Transcript ─────────────────────────────────────────────────────────────

export type Turn =
  | { readonly role: 'user'; readonly content: string }
  | { readonly role: 'assistant'; readonly content: string | readonly AssistantBlock[] }
  | { readonly role: 'tool_result'; readonly content: readonly ToolResultBlock[] };

export interface Session {
  readonly sessionId: string;
  readonly userId: string;
  readonly startTime: string;
  readonly transcript: readonly Turn[];
  readonly endTime?: string;
}

// ─── Tools ──────────────────────────────────────────────────────────────────

export interface ToolParameter {
  type: 'string' | 'number' | 'integer' | 'boolean' | 'object' | 'array';
  description?: string;
}

/** Declared to the model service only; never executed. */
export interface ToolDefinition {
  name: string;
  description: string;
  input_schema: {
    type: 'object';
    properties: Record<string, ToolParameter>;
    required: string[];
  };
}

export type ToolOutput = Record<string, unknown>;

export interface ToolHandler {
  readonly definition: ToolDefinition;
  execute(input: Record<string, unknown>): ToolOutput | Promise<ToolOutput>;
}

// ─── Model service ──────────────────────────────────────────────────────────

export type StopCondition = 'needs_tool' | 'final';

export interface ModelRequest {
  system: string;
  tools: readonly ToolDefinition[];
  messages: readonly Turn[];
}

export interface ModelResponse {
  stopCondition: StopCondition;
  content: AssistantBlock[];
}

export interface ModelClient {
  readonly name: string;
  createMessage(request: ModelRequest): Promise<ModelResponse>;
}

// ─── Notifications ──────────────────────────────────────────────────────────

export type NotificationEvent =
  | { type: 'connected'; userId: string }
  | { type: 'tool_invocation_completed'; toolName: string }
  | { type: 'final_response'; text: string }
  | { type: 'error'; message: string };

/**
 * Pushes events toward whichever client is attached to a session.
 * Fire-and-forget: implementations must not throw back into the caller's
 * control flow, and must keep per-session emission order.
 */
export interface NotificationSink {
  notify(sessionId: string, event: NotificationEvent): void;
}

// ─── Audit ──────────────────────────────────────────────────────────────────

export type AuditEventType = 'user_message' | 'ai_response' | 'error';

export interface SessionRecord {
  sessionId: string;
  userId: string;
  startTime: string;
  status: 'active' | 'completed';
  endTime?: string;
}

/** Best-effort audit sink. Every method resolves, even when the backing store fails. */
export interface AuditLog {
  createSessionRecord(record: SessionRecord): Promise<void>;
  closeSessionRecord(sessionId: string, endTime: string): Promise<void>;
  record(
    sessionId: string,
    eventType: AuditEventType,
    timestamp: string,
    payload: Record<string, unknown>,
  ): Promise<void>;
}
