import { ToolRegistry, UNKNOWN_TOOL_RESULT } from '../src/core/toolRegistry';
import { ToolHandler } from '../src/core/types';
import { accountTools, fetchConversationAnalyticsTool, fetchUserDataTool } from '../src/tools/accountTools';

function handler(name: string, execute: ToolHandler['execute']): ToolHandler {
  return {
    definition: {
      name,
      description: `${name} tool`,
      input_schema: { type: 'object', properties: {}, required: [] },
    },
    execute,
  };
}

beforeEach(() => {
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('ToolRegistry', () => {
  test('lists definitions in registration order', () => {
    const registry = new ToolRegistry(accountTools);

    expect(registry.definitions().map((definition) => definition.name)).toEqual([
      'fetch_user_data',
      'fetch_conversation_analytics',
    ]);
  });

  test('rejects a second handler with the same name', () => {
    const registry = new ToolRegistry([fetchUserDataTool]);

    expect(() => registry.register(fetchUserDataTool)).toThrow('Tool fetch_user_data is already registered');
  });

  test('serializes handler output as JSON', async () => {
    const registry = new ToolRegistry([handler('echo', (input) => ({ echoed: input.value ?? null }))]);

    await expect(registry.resolve('echo', { value: 3 })).resolves.toEqual({ content: '{"echoed":3}', isError: false });
  });

  test('awaits async handlers', async () => {
    const registry = new ToolRegistry([handler('later', async () => ({ ready: true }))]);

    await expect(registry.resolve('later', {})).resolves.toEqual({ content: '{"ready":true}', isError: false });
  });

  test('returns the unknown-tool payload for an unregistered name', async () => {
    const registry = new ToolRegistry(accountTools);

    const result = await registry.resolve('drop_tables', {});

    expect(result).toEqual({ content: UNKNOWN_TOOL_RESULT, isError: true });
    expect(JSON.parse(result.content)).toEqual({ error: 'Unknown tool' });
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  test('turns a thrown error into an error payload', async () => {
    const registry = new ToolRegistry([
      handler('broken', () => {
        throw new Error('disk full');
      }),
    ]);

    await expect(registry.resolve('broken', {})).resolves.toEqual({
      content: '{"error":"Tool broken failed: disk full"}',
      isError: true,
    });
  });

  test('turns a rejected promise into an error payload', async () => {
    const registry = new ToolRegistry([handler('rejects', () => Promise.reject(new Error('timeout')))]);

    await expect(registry.resolve('rejects', {})).resolves.toEqual({
      content: '{"error":"Tool rejects failed: timeout"}',
      isError: true,
    });
  });

  test('resolving the same call twice gives the same result', async () => {
    const registry = new ToolRegistry(accountTools);

    const first = await registry.resolve('fetch_user_data', { user_id: 'u-42' });
    const second = await registry.resolve('fetch_user_data', { user_id: 'u-42' });

    expect(second).toEqual(first);
  });
});

describe('account tools', () => {
  test('fetch_user_data derives a profile from the id', () => {
    expect(fetchUserDataTool.execute({ user_id: 'abcdefghijkl' })).toEqual({
      user_id: 'abcdefghijkl',
      name: 'User abcdefgh',
      email: 'userabcdefgh@example.com',
      account_status: 'active',
    });
  });

  test('fetch_user_data falls back to unknown without an id', () => {
    expect(fetchUserDataTool.execute({ user_id: 7 })).toEqual({
      user_id: 'unknown',
      name: 'User unknown',
      email: 'userunknown@example.com',
      account_status: 'active',
    });
  });

  test('fetch_conversation_analytics returns fixed metrics', () => {
    expect(fetchConversationAnalyticsTool.execute({ session_id: 's-9' })).toEqual({
      session_id: 's-9',
      message_count: 5,
      avg_response_time: 1.2,
      sentiment: 'positive',
    });
  });

  test('declare required inputs in their schemas', () => {
    expect(fetchUserDataTool.definition.input_schema.required).toEqual(['user_id']);
    expect(fetchConversationAnalyticsTool.definition.input_schema.required).toEqual(['session_id']);
  });
});
