import { z } from 'zod';
import { ConfigurationError } from '../common/errors';

export const AI_PROVIDERS = [
  'groq',
  'openai',
  'anthropic',
  'gemini',
  'ollama',
] as const;

export type AIProvider = (typeof AI_PROVIDERS)[number];

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const booleanFlag = z
  .union([z.boolean(), z.string()])
  .optional()
  .transform((value) =>
    typeof value === 'boolean'
      ? value
      : ['1', 'true', 'yes', 'on'].includes((value ?? '').toLowerCase()),
  );

/**
 * Environment schema. Values arrive as strings from process.env and .env;
 * numbers and flags are coerced here so the rest of the app reads typed values.
 */
export const environmentSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  CORS_ORIGINS: z
    .string()
    .default('http://localhost:5173,http://localhost:3000'),
  DEBUG: booleanFlag,

  AI_PROVIDER: z.enum(AI_PROVIDERS).default('groq'),
  GROQ_API_KEY: optionalString,
  GROQ_MODEL: z.string().default('llama-3.3-70b-versatile'),
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: z.string().default('claude-3-5-sonnet-20241022'),
  GOOGLE_GENERATIVE_AI_API_KEY: optionalString,
  GEMINI_MODEL: z.string().default('gemini-1.5-flash'),
  OLLAMA_BASE_URL: z.string().url().default('http://127.0.0.1:11434'),
  OLLAMA_MODEL: z.string().default('llama3.1'),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(500),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  IDENTITY_API_URL: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value.replace(/\/+$/, '') : undefined))
    .pipe(z.string().url().optional()),
  IDENTITY_CLIENT_ID: optionalString,
  IDENTITY_CLIENT_SECRET: optionalString,
  IDENTITY_TOKEN_PATH: z.string().default('/identityiq/oauth2/token'),
  IDENTITY_REFRESH_PATH: z
    .string()
    .default(
      '/identityiq/plugin/rest/RefreshIdentity/refreshIdentitySingleUser',
    ),
  IDENTITY_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
});

export type Environment = z.infer<typeof environmentSchema>;

/**
 * `validate` hook for ConfigModule. Throws on invalid values so the app fails
 * at startup rather than on the first request.
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): Environment {
  const result = environmentSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new ConfigurationError(
      `Invalid environment configuration: ${issues.join('; ')}`,
    );
  }
  return result.data;
}

export function parseOrigins(origins: string): string[] {
  return origins
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}
