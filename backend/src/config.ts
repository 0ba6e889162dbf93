import { z } from 'zod';
import { ConfigError } from './errors.js';

export type Credentials =
  | { kind: 'apiKey'; apiKey: string }
  | { kind: 'vertex'; project: string; location: string };

export interface AppConfig {
  port: number;
  credentials: Credentials;
  /** Preferred model first, then fallbacks in the order they are tried */
  modelChain: string[];
  temperature: number;
  maxOutputTokens: number;
  timeoutMs: number;
}

export const DEFAULT_MODEL = 'gemini-2.0-flash-001';
export const DEFAULT_FALLBACK_MODELS = 'gemini-2.0-pro-exp';

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform(v => (v ? v : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  GEMINI_API_KEY: optionalString,
  GOOGLE_GENAI_USE_VERTEXAI: z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform(v => v === 'true' || v === '1'),
  GOOGLE_CLOUD_PROJECT: optionalString,
  GOOGLE_CLOUD_LOCATION: z.string().trim().min(1).default('us-west1'),
  GEMINI_MODEL: z.string().trim().min(1).default(DEFAULT_MODEL),
  GEMINI_FALLBACK_MODELS: z.string().default(DEFAULT_FALLBACK_MODELS),
  GENERATION_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.8),
  GENERATION_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(2048),
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
});

/**
 * Split a comma separated model list, dropping blanks and repeats.
 */
export function parseModelList(value: string): string[] {
  const seen = new Set<string>();
  for (const name of value.split(',')) {
    const trimmed = name.trim();
    if (trimmed) seen.add(trimmed);
  }
  return [...seen];
}

/**
 * Build the app configuration from environment variables.
 * Throws ConfigError when a value is invalid or no credential is set.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.errors.map(err => `${err.path.join('.')}: ${err.message}`);
    throw new ConfigError(issues.join('; '), issues);
  }
  const vars = parsed.data;

  let credentials: Credentials;
  if (vars.GOOGLE_GENAI_USE_VERTEXAI) {
    if (!vars.GOOGLE_CLOUD_PROJECT) {
      throw new ConfigError('GOOGLE_CLOUD_PROJECT is required when GOOGLE_GENAI_USE_VERTEXAI is set', [
        'GOOGLE_CLOUD_PROJECT: Required',
      ]);
    }
    credentials = { kind: 'vertex', project: vars.GOOGLE_CLOUD_PROJECT, location: vars.GOOGLE_CLOUD_LOCATION };
  } else if (vars.GEMINI_API_KEY) {
    credentials = { kind: 'apiKey', apiKey: vars.GEMINI_API_KEY };
  } else {
    throw new ConfigError('set GEMINI_API_KEY or enable Vertex AI with GOOGLE_GENAI_USE_VERTEXAI', [
      'GEMINI_API_KEY: Required',
    ]);
  }

  return {
    port: vars.PORT,
    credentials,
    modelChain: parseModelList([vars.GEMINI_MODEL, vars.GEMINI_FALLBACK_MODELS].join(',')),
    temperature: vars.GENERATION_TEMPERATURE,
    maxOutputTokens: vars.GENERATION_MAX_OUTPUT_TOKENS,
    timeoutMs: vars.GENERATION_TIMEOUT_MS,
  };
}
