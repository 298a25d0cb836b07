import { ToolHandler } from '../core/types';

export type UserProfile = {
  user_id: string;
  name: string;
  email: string;
  account_status: 'active' | 'suspended';
};

export type ConversationAnalytics = {
  session_id: string;
  message_count: number;
  avg_response_time: number;
  sentiment: 'positive' | 'neutral' | 'negative';
};

function stringInput(input: Record<string, unknown>, key: string): string {
  const value = input[key];
  return typeof value === 'string' && value.length > 0 ? value : 'unknown';
}

/**
 * Stand-in profile lookup. Returns a deterministic record so the model has
 * something to reason about without a user service behind it.
 */
export const fetchUserDataTool: ToolHandler = {
  definition: {
    name: 'fetch_user_data',
    description: 'Fetch user profile information',
    input_schema: {
      type: 'object',
      properties: {
        user_id: { type: 'string', description: 'Identifier of the user to look up' },
      },
      required: ['user_id'],
    },
  },
  execute(input): UserProfile {
    const userId = stringInput(input, 'user_id');
    const short = userId.slice(0, 8);
    return {
      user_id: userId,
      name: `User ${short}`,
      email: `user${short}@example.com`,
      account_status: 'active',
    };
  },
};

export const fetchConversationAnalyticsTool: ToolHandler = {
  definition: {
    name: 'fetch_conversation_analytics',
    description: 'Fetch conversation analytics',
    input_schema: {
      type: 'object',
      properties: {
        session_id: { type: 'string', description: 'Session to summarise' },
      },
      required: ['session_id'],
    },
  },
  execute(input): ConversationAnalytics {
    return {
      session_id: stringInput(input, 'session_id'),
      message_count: 5,
      avg_response_time: 1.2,
      sentiment: 'positive',
    };
  },
};

export const accountTools: readonly ToolHandler[] = [fetchUserDataTool, fetchConversationAnalyticsTool];
