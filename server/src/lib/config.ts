import { z } from 'zod';
import { formatIssues } from './validate.js';

/**
 * Environment configuration, parsed once on first access.
 *
 * API keys stay optional here; the provider that needs one checks for it
 * lazily so the runtime can be imported in tests without credentials.
 */

const positiveInt = (fallback: number) =>
  z.preprocess(
    (raw) => (raw === undefined || raw === '' ? undefined : Number.parseInt(String(raw), 10)),
    z.number().int().positive().default(fallback),
  );

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: positiveInt(3001),
  LLM_PROVIDER: z.enum(['anthropic', 'openai-compat']).optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  ANTHROPIC_MODEL: z.string().default('claude-sonnet-4-5-20250929'),
  OPENAI_COMPAT_API_KEY: z.string().optional(),
  OPENAI_COMPAT_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  OPENAI_COMPAT_MODEL: z.string().default('gpt-4o-mini'),
  MAX_TOKENS: positiveInt(4096),
  AGENT_MAX_STEPS: positiveInt(10),
  RUN_TIMEOUT_MS: positiveInt(120_000),
  TOOL_TIMEOUT_MS: positiveInt(30_000),
  MAX_CONCURRENT_RUNS: positiveInt(16),
  QUOTE_API_URL: z.string().url().default('https://query1.finance.yahoo.com/v8/finance/chart'),
  ALLOWED_ORIGINS: z.string().optional(),
});

export type AppConfig = z.infer<typeof envSchema>;

let cached: AppConfig | null = null;

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = formatIssues(result.error.issues).join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return result.data;
}

export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}

/** Which provider backs the LLM gateway: explicit setting first, then whichever key is present. */
export function resolveProviderName(config: AppConfig): 'anthropic' | 'openai-compat' {
  if (config.LLM_PROVIDER) return config.LLM_PROVIDER;
  return config.OPENAI_COMPAT_API_KEY && !config.ANTHROPIC_API_KEY ? 'openai-compat' : 'anthropic';
}

export function parseAllowedOrigins(config: AppConfig): string[] {
  if (config.ALLOWED_ORIGINS) {
    return config.ALLOWED_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean);
  }
  return config.NODE_ENV === 'production'
    ? []
    : ['http://localhost:5173', 'http://localhost:5174'];
}
