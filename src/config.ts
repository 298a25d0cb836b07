import { DEFAULT_MAX_ROUND_TRIPS } from './core/orchestrator';
import { ProviderConfig } from './providers';

export const DEFAULT_SYSTEM_PROMPT = 'You are a helpful AI assistant. Use tools when appropriate.';

export interface AppConfig {
  port: number;
  provider: ProviderConfig;
  systemPrompt: string;
  maxRoundTrips: number;
  maxFrameBytes: number;
  rateLimitPerMinute: number;
  audit: {
    enabled: boolean;
    sessionsTable: string;
    eventLogsTable: string;
    region: string;
  };
  staticDir: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const awsRegion = env.AWS_REGION ?? 'us-east-1';

  return {
    port: parseInteger(env.PORT, 8000),
    provider: {
      modelProvider: (env.MODEL_PROVIDER ?? 'anthropic').toLowerCase() === 'bedrock' ? 'bedrock' : 'anthropic',
      anthropicApiKey: env.ANTHROPIC_API_KEY || undefined,
      anthropicModel: env.ANTHROPIC_MODEL ?? 'claude-3-5-sonnet-20241022',
      anthropicBaseUrl: (env.ANTHROPIC_BASE_URL ?? 'https://api.anthropic.com').replace(/\/+$/, ''),
      bedrockModelId: env.BEDROCK_MODEL_ID ?? 'anthropic.claude-3-5-sonnet-20240620-v1:0',
      awsRegion,
      maxOutputTokens: parseInteger(env.MAX_OUTPUT_TOKENS, 1024),
      requestTimeoutMs: parseInteger(env.MODEL_TIMEOUT_MS, 30_000),
    },
    systemPrompt: env.SYSTEM_PROMPT?.trim() || DEFAULT_SYSTEM_PROMPT,
    maxRoundTrips: parseInteger(env.MAX_ROUND_TRIPS, DEFAULT_MAX_ROUND_TRIPS),
    maxFrameBytes: parseInteger(env.MAX_FRAME_BYTES, 65_536),
    rateLimitPerMinute: parseInteger(env.SESSION_RATE_LIMIT_PER_MIN, 30),
    audit: {
      enabled: parseBoolean(env.AUDIT_ENABLED, true),
      sessionsTable: env.SESSIONS_TABLE ?? 'ToolRelay-Sessions',
      eventLogsTable: env.EVENT_LOGS_TABLE ?? 'ToolRelay-EventLogs',
      region: awsRegion,
    },
    staticDir: env.STATIC_DIR ?? 'static',
  };
}

export function parseInteger(raw: string | undefined, fallback: number): number {
  if (!raw) {
    return fallback;
  }

  const value = Number.parseInt(raw, 10);
  if (Number.isNaN(value) || value <= 0) {
    return fallback;
  }
  return value;
}

export function parseBoolean(raw: string | undefined, fallback: boolean): boolean {
  if (!raw) {
    return fallback;
  }
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
}
