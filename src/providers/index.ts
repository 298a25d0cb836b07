import { ModelClient } from '../core/types';
import { AnthropicModelClient } from './anthropicClient';
import { BedrockModelClient } from './bedrockClient';

export interface ProviderConfig {
  modelProvider: 'anthropic' | 'bedrock';
  anthropicApiKey?: string;
  anthropicModel: string;
  anthropicBaseUrl: string;
  bedrockModelId: string;
  awsRegion: string;
  maxOutputTokens: number;
  requestTimeoutMs: number;
}

export function buildModelClient(config: ProviderConfig): ModelClient {
  if (config.modelProvider === 'bedrock') {
    return new BedrockModelClient({
      modelId: config.bedrockModelId,
      region: config.awsRegion,
      maxTokens: config.maxOutputTokens,
    });
  }

  if (!config.anthropicApiKey) {
    throw new Error('ANTHROPIC_API_KEY is required when MODEL_PROVIDER=anthropic');
  }

  return new AnthropicModelClient({
    apiKey: config.anthropicApiKey,
    model: config.anthropicModel,
    maxTokens: config.maxOutputTokens,
    baseUrl: config.anthropicBaseUrl,
    timeoutMs: config.requestTimeoutMs,
  });
}
