/**
 * Amazon Bedrock Converse integration.
 *
 * Uses the non-streaming Converse API: the orchestrator needs the complete
 * response (stop reason + every block) before it can decide what to do next.
 */

import {
  BedrockRuntimeClient,
  ConverseCommand,
  type ContentBlock,
  type ConverseCommandOutput,
  type Message,
  type Tool,
  type ToolUseBlock as BedrockToolUseBlock,
} from '@aws-sdk/client-bedrock-runtime';
import { describeError, ModelServiceError } from '../core/errors';
import { logger } from '../core/logger';
import {
  AssistantBlock,
  ModelClient,
  ModelRequest,
  ModelResponse,
  ToolDefinition,
  Turn,
} from '../core/types';

export interface BedrockConfig {
  modelId: string;
  region: string;
  maxTokens: number;
}

/** JSON document type the SDK uses for tool input and schemas. */
type Document = Exclude<BedrockToolUseBlock['input'], undefined>;

// ─── Conversion ─────────────────────────────────────────────────────────────

export function toDocument(value: unknown): Document {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(toDocument);
  }
  if (typeof value === 'object') {
    const doc: { [key: string]: Document } = {};
    for (const [key, entry] of Object.entries(value)) {
      if (entry !== undefined) {
        doc[key] = toDocument(entry);
      }
    }
    return doc;
  }
  return null;
}

export function toBedrockMessages(turns: readonly Turn[]): Message[] {
  return turns.map((turn): Message => {
    switch (turn.role) {
      case 'user':
        return { role: 'user', content: [{ text: turn.content }] };
      case 'assistant':
        return {
          role: 'assistant',
          content: typeof turn.content === 'string'
            ? [{ text: turn.content }]
            : turn.content.map(toBedrockAssistantBlock),
        };
      case 'tool_result':
        return {
          role: 'user',
          content: turn.content.map((block): ContentBlock => ({
            toolResult: {
              toolUseId: block.toolUseId,
              content: [{ text: block.content }],
              status: block.isError ? 'error' : undefined,
            },
          })),
        };
    }
  });
}

function toBedrockAssistantBlock(block: AssistantBlock): ContentBlock {
  switch (block.type) {
    case 'text':
      return { text: block.text };
    case 'tool_use':
      return {
        toolUse: {
          toolUseId: block.id,
          name: block.name,
          input: toDocument(block.input),
        },
      };
  }
}

export function toBedrockTools(tools: readonly ToolDefinition[]): Tool[] {
  return tools.map((tool): Tool => ({
    toolSpec: {
      name: tool.name,
      description: tool.description,
      inputSchema: { json: toDocument(tool.input_schema) },
    },
  }));
}

export function fromConverseOutput(output: ConverseCommandOutput): ModelResponse {
  const blocks = output.output?.message?.content;
  if (!blocks) {
    throw new ModelServiceError('bedrock_malformed_response: no message in Converse output');
  }

  const content: AssistantBlock[] = [];
  for (const block of blocks) {
    if (block.text !== undefined) {
      content.push({ type: 'text', text: block.text });
    } else if (block.toolUse?.toolUseId && block.toolUse.name) {
      const input = block.toolUse.input;
      content.push({
        type: 'tool_use',
        id: block.toolUse.toolUseId,
        name: block.toolUse.name,
        input: isRecord(input) ? input : {},
      });
    }
  }

  return {
    stopCondition: output.stopReason === 'tool_use' ? 'needs_tool' : 'final',
    content,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ─── Client ─────────────────────────────────────────────────────────────────

export class BedrockModelClient implements ModelClient {
  readonly name = 'bedrock';

  private readonly client: BedrockRuntimeClient;

  constructor(private readonly config: BedrockConfig, client?: BedrockRuntimeClient) {
    this.client = client ?? new BedrockRuntimeClient({ region: config.region });
  }

  async createMessage(request: ModelRequest): Promise<ModelResponse> {
    const command = new ConverseCommand({
      modelId: this.config.modelId,
      system: [{ text: request.system }],
      messages: toBedrockMessages(request.messages),
      toolConfig: request.tools.length > 0 ? { tools: toBedrockTools(request.tools) } : undefined,
      inferenceConfig: { maxTokens: this.config.maxTokens },
    });

    let output: ConverseCommandOutput;
    try {
      output = await this.client.send(command);
    } catch (err) {
      logger.error('Bedrock Converse failed', {}, { modelId: this.config.modelId, error: describeError(err) });
      throw new ModelServiceError(`bedrock_converse_failed: ${describeError(err)}`, { cause: err });
    }

    return fromConverseOutput(output);
  }
}
