import { BedrockRuntimeClient, ConverseCommandOutput } from '@aws-sdk/client-bedrock-runtime';
import { ModelServiceError } from '../src/core/errors';
import { Turn } from '../src/core/types';
import {
  BedrockModelClient,
  fromConverseOutput,
  toBedrockMessages,
  toBedrockTools,
} from '../src/providers/bedrockClient';
import { fetchUserDataTool } from '../src/tools/accountTools';

const metadata = { $metadata: {} };

function converseOutput(partial: Omit<ConverseCommandOutput, '$metadata'>): ConverseCommandOutput {
  return { ...metadata, ...partial };
}

afterEach(() => {
  jest.restoreAllMocks();
});

// ─── Conversion ─────────────────────────────────────────────────────────────

describe('toBedrockMessages', () => {
  test('maps every turn kind onto Converse content blocks', () => {
    const turns: Turn[] = [
      { role: 'user', content: 'status?' },
      {
        role: 'assistant',
        content: [
          { type: 'text', text: 'Checking.' },
          { type: 'tool_use', id: 't1', name: 'fetch_user_data', input: { user_id: 'u' } },
        ],
      },
      { role: 'tool_result', content: [{ type: 'tool_result', toolUseId: 't1', content: '{"ok":true}' }] },
      { role: 'assistant', content: 'done' },
    ];

    expect(toBedrockMessages(turns)).toEqual([
      { role: 'user', content: [{ text: 'status?' }] },
      {
        role: 'assistant',
        content: [
          { text: 'Checking.' },
          { toolUse: { toolUseId: 't1', name: 'fetch_user_data', input: { user_id: 'u' } } },
        ],
      },
      { role: 'user', content: [{ toolResult: { toolUseId: 't1', content: [{ text: '{"ok":true}' }] } }] },
      { role: 'assistant', content: [{ text: 'done' }] },
    ]);
  });

  test('marks error results with status error', () => {
    const [message] = toBedrockMessages([
      {
        role: 'tool_result',
        content: [{ type: 'tool_result', toolUseId: 't1', content: '{"error":"Unknown tool"}', isError: true }],
      },
    ]);

    expect(message).toEqual({
      role: 'user',
      content: [{ toolResult: { toolUseId: 't1', content: [{ text: '{"error":"Unknown tool"}' }], status: 'error' } }],
    });
  });
});

describe('toBedrockTools', () => {
  test('wraps the JSON schema in a toolSpec', () => {
    expect(toBedrockTools([fetchUserDataTool.definition])).toEqual([
      {
        toolSpec: {
          name: 'fetch_user_data',
          description: 'Fetch user profile information',
          inputSchema: {
            json: {
              type: 'object',
              properties: {
                user_id: { type: 'string', description: 'Identifier of the user to look up' },
              },
              required: ['user_id'],
            },
          },
        },
      },
    ]);
  });
});

describe('fromConverseOutput', () => {
  test('maps tool_use stop reason and blocks', () => {
    const response = fromConverseOutput(converseOutput({
      stopReason: 'tool_use',
      output: {
        message: {
          role: 'assistant',
          content: [
            { text: 'Checking.' },
            { toolUse: { toolUseId: 't1', name: 'fetch_user_data', input: { user_id: 'u' } } },
          ],
        },
      },
      usage: undefined,
      metrics: undefined,
    }));

    expect(response).toEqual({
      stopCondition: 'needs_tool',
      content: [
        { type: 'text', text: 'Checking.' },
        { type: 'tool_use', id: 't1', name: 'fetch_user_data', input: { user_id: 'u' } },
      ],
    });
  });

  test('rejects output without a message', () => {
    expect(() => fromConverseOutput(converseOutput({
      stopReason: 'end_turn',
      output: undefined,
      usage: undefined,
      metrics: undefined,
    }))).toThrow(ModelServiceError);
  });
});

// ─── Client ─────────────────────────────────────────────────────────────────

describe('BedrockModelClient', () => {
  function setup() {
    const runtime = new BedrockRuntimeClient({
      region: 'us-east-1',
      credentials: { accessKeyId: 'test-key', secretAccessKey: 'test-secret' },
    });
    const client = new BedrockModelClient({ modelId: 'test-model', region: 'us-east-1', maxTokens: 128 }, runtime);
    return { runtime, client };
  }

  test('sends a Converse command built from the request', async () => {
    const { runtime, client } = setup();
    const send = jest.spyOn(runtime, 'send').mockImplementation(async () => converseOutput({
      stopReason: 'end_turn',
      output: { message: { role: 'assistant', content: [{ text: 'Hello!' }] } },
      usage: undefined,
      metrics: undefined,
    }));

    const response = await client.createMessage({
      system: 'test prompt',
      tools: [],
      messages: [{ role: 'user', content: 'hi' }],
    });

    expect(response).toEqual({ stopCondition: 'final', content: [{ type: 'text', text: 'Hello!' }] });
    expect(send).toHaveBeenCalledWith(expect.objectContaining({
      input: {
        modelId: 'test-model',
        system: [{ text: 'test prompt' }],
        messages: [{ role: 'user', content: [{ text: 'hi' }] }],
        toolConfig: undefined,
        inferenceConfig: { maxTokens: 128 },
      },
    }));
  });

  test('wraps SDK failures in ModelServiceError', async () => {
    const { runtime, client } = setup();
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    jest.spyOn(runtime, 'send').mockImplementation(async () => {
      throw new Error('ThrottlingException');
    });

    await expect(client.createMessage({
      system: 'test prompt',
      tools: [],
      messages: [{ role: 'user', content: 'hi' }],
    })).rejects.toThrow('bedrock_converse_failed: ThrottlingException');
  });
});
