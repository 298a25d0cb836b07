import { ModelServiceError } from '../core/errors';
import {
  AssistantBlock,
  ModelClient,
  ModelRequest,
  ModelResponse,
  ToolResultBlock,
  Turn,
} from '../core/types';

export interface AnthropicConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
  baseUrl: string;
  timeoutMs: number;
}

// ---------------------------------------------------------------------------
// Anthropic Messages API wire types
// ---------------------------------------------------------------------------

interface AnthropicTextBlock {
  type: 'text';
  text: string;
}

interface AnthropicToolUseBlock {
  type: 'tool_use';
  id: string;
  name: string;
  input: Record<string, unknown>;
}

interface AnthropicToolResultBlock {
  type: 'tool_result';
  tool_use_id: string;
  content: string;
  is_error?: boolean;
}

type AnthropicContentBlock = AnthropicTextBlock | AnthropicToolUseBlock | AnthropicToolResultBlock;

export interface AnthropicMessage {
  role: 'user' | 'assistant';
  content: string | AnthropicContentBlock[];
}

// ---------------------------------------------------------------------------
// Transcript <-> wire conversion
// ---------------------------------------------------------------------------

/** Tool-result carrier turns travel as user messages, per the Messages API. */
export function toAnthropicMessages(turns: readonly Turn[]): AnthropicMessage[] {
  return turns.map((turn): AnthropicMessage => {
    switch (turn.role) {
      case 'user':
        return { role: 'user', content: turn.content };
      case 'assistant':
        return {
          role: 'assistant',
          content: typeof turn.content === 'string'
            ? turn.content
            : turn.content.map(toAnthropicAssistantBlock),
        };
      case 'tool_result':
        return { role: 'user', content: turn.content.map(toAnthropicToolResult) };
    }
  });
}

function toAnthropicAssistantBlock(block: AssistantBlock): AnthropicContentBlock {
  switch (block.type) {
    case 'text':
      return { type: 'text', text: block.text };
    case 'tool_use':
      return { type: 'tool_use', id: block.id, name: block.name, input: block.input };
  }
}

function toAnthropicToolResult(block: ToolResultBlock): AnthropicToolResultBlock {
  const wire: AnthropicToolResultBlock = { type: 'tool_result', tool_use_id: block.toolUseId, content: block.content };
  if (block.isError) {
    wire.is_error = true;
  }
  return wire;
}

/** Validates a Messages API response body and maps it onto a ModelResponse. */
export function parseMessageResponse(body: unknown): ModelResponse {
  if (!isRecord(body) || !Array.isArray(body.content)) {
    throw new ModelServiceError('anthropic_malformed_response: missing content array');
  }

  const content: AssistantBlock[] = [];
  for (const block of body.content) {
    if (!isRecord(block)) {
      throw new ModelServiceError('anthropic_malformed_response: content block is not an object');
    }
    if (block.type === 'text' && typeof block.text === 'string') {
      content.push({ type: 'text', text: block.text });
    } else if (block.type === 'tool_use' && typeof block.id === 'string' && typeof block.name === 'string') {
      content.push({
        type: 'tool_use',
        id: block.id,
        name: block.name,
        input: isRecord(block.input) ? block.input : {},
      });
    }
    // Other block kinds (thinking, etc.) carry nothing the relay uses.
  }

  return {
    stopCondition: body.stop_reason === 'tool_use' ? 'needs_tool' : 'final',
    content,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class AnthropicModelClient implements ModelClient {
  readonly name = 'anthropic';

  constructor(private readonly config: AnthropicConfig) {}

  async createMessage(request: ModelRequest): Promise<ModelResponse> {
    const body: Record<string, unknown> = {
      model: this.config.model,
      max_tokens: this.config.maxTokens,
      system: request.system,
      messages: toAnthropicMessages(request.messages),
    };

    if (request.tools.length > 0) {
      body.tools = request.tools;
    }

    let response: Response;
    try {
      response = await fetch(`${this.config.baseUrl}/v1/messages`, {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
          'x-api-key': this.config.apiKey,
          'anthropic-version': '2023-06-01',
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : 'network error';
      throw new ModelServiceError(`anthropic_request_failed: ${reason}`, { cause: err });
    }

    if (!response.ok) {
      const bodyText = await response.text();
      throw new ModelServiceError(`anthropic_http_${response.status}: ${bodyText.slice(0, 120)}`, {
        status: response.status,
      });
    }

    let parsed: unknown;
    try {
      parsed = await response.json();
    } catch (err) {
      throw new ModelServiceError('anthropic_malformed_response: body is not JSON', { cause: err });
    }

    return parseMessageResponse(parsed);
  }
}
