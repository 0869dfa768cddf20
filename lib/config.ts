import { z } from 'zod';
import { DEFAULT_MODEL, MODEL_NAMES } from './services/model-registry';

// Configuration for the company detail workflow
export const COMPANY_DETAIL_CONFIG = {
  DISCOVERY: {
    MAX_LINKS_FOR_PROMPT: 200,
    MAX_HUB_SELECTIONS: 3,
    MAX_CANDIDATES: 5,
  },

  EXTRACTION: {
    MAX_CONTENT_CHARS: 400000,
  },

  MERGE: {
    MAX_ADDRESSES: 5,
    HEADQUARTERS_MARKER: '本社',
  },

  READER: {
    TIMEOUT_MS: 30000,
    MAX_RETRIES: 3,
    BASE_DELAY_MS: 1000,
    ACCEPT_LANGUAGE: 'ja-JP',
  },

  PROCESSING: {
    DELAY_BETWEEN_ROWS_MS: 1000,
    MAX_ROWS_PER_REQUEST: 100,
  },
} as const;

export class MissingConfigurationError extends Error {
  constructor(public readonly variable: string) {
    super(`${variable} environment variable is not set.`);
    this.name = 'MissingConfigurationError';
  }
}

const optionalSecret = z
  .string()
  .optional()
  .transform(value => (value && value.trim() ? value.trim() : undefined));

const EnvSchema = z.object({
  FIRECRAWL_API_KEY: optionalSecret,
  OPENAI_API_KEY: optionalSecret,
  GEMINI_API_KEY: optionalSecret,
  COMPANY_DETAIL_MODEL: z.enum(MODEL_NAMES).default(DEFAULT_MODEL),
  LANGFUSE_PUBLIC_KEY: optionalSecret,
  LANGFUSE_SECRET_KEY: optionalSecret,
  LANGFUSE_BASEURL: optionalSecret,
});

export type EnvConfig = z.infer<typeof EnvSchema>;

/**
 * Reads the environment once. Keys stay optional here; each service
 * checks for the one it needs when it is constructed.
 */
export function loadEnvConfig(env: Record<string, string | undefined> = process.env): EnvConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration: ${issues.join('; ')}`);
  }
  return parsed.data;
}

export function requireSetting(value: string | undefined, variable: string): string {
  if (!value) {
    throw new MissingConfigurationError(variable);
  }
  return value;
}
