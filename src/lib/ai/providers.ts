import { createOpenAI } from '@ai-sdk/openai';
import type { LanguageModel } from 'ai';
import type { AppConfig } from '@/lib/config';
import { ConfigurationError } from '@/lib/errors';

export type SimpleProvider = 'OPENROUTER';

// Provider configuration (static metadata only)
export const providerConfigs: Record<SimpleProvider, {
  name: string;
  baseURL: string;
  setupUrl: string;
}> = {
  OPENROUTER: {
    name: 'OpenRouter',
    baseURL: 'https://openrouter.ai/api/v1',
    setupUrl: 'https://openrouter.ai/keys',
  },
};

/**
 * Language model for the configured OpenAI-compatible endpoint.
 */
export function getLanguageModel(config: AppConfig['ai']): LanguageModel {
  if (!config.apiKey) {
    const { name, setupUrl } = providerConfigs.OPENROUTER;
    throw new ConfigurationError(`No API key configured for ${name}. Set AI_API_KEY (keys: ${setupUrl}).`, {
      missing: ['AI_API_KEY'],
    });
  }

  const provider = createOpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseURL,
  });

  // Chat completions: the endpoint is OpenAI-compatible, not OpenAI itself
  return provider.chat(config.model);
}
