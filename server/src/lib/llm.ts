import { AnthropicProvider, OpenAICompatProvider, type LLMProvider } from './llm-provider.js';
import { getConfig, resolveProviderName, type AppConfig } from './config.js';

export interface ProviderSelection {
  provider: LLMProvider;
  model: string;
  maxTokens: number;
}

/**
 * Pick the LLM provider from configuration. Anthropic is the default;
 * `LLM_PROVIDER=openai-compat` (or only an OpenAI-compatible key) selects
 * a chat-completions endpoint instead.
 */
export function createProvider(config: AppConfig = getConfig()): ProviderSelection {
  if (resolveProviderName(config) === 'openai-compat') {
    const apiKey = config.OPENAI_COMPAT_API_KEY;
    if (!apiKey) {
      throw new Error('OPENAI_COMPAT_API_KEY environment variable is required when LLM_PROVIDER=openai-compat');
    }
    return {
      provider: new OpenAICompatProvider({ apiKey, baseUrl: config.OPENAI_COMPAT_BASE_URL }),
      model: config.OPENAI_COMPAT_MODEL,
      maxTokens: config.MAX_TOKENS,
    };
  }

  // Anthropic client is created on first chat() call
  return {
    provider: new AnthropicProvider(),
    model: config.ANTHROPIC_MODEL,
    maxTokens: config.MAX_TOKENS,
  };
}

/** Whether the selected provider has the credential it needs. */
export function hasProviderCredentials(config: AppConfig = getConfig()): boolean {
  return resolveProviderName(config) === 'openai-compat'
    ? Boolean(config.OPENAI_COMPAT_API_KEY)
    : Boolean(config.ANTHROPIC_API_KEY);
}
