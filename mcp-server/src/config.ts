import { z } from 'zod';
import type { ProviderParameters } from '@colmatch/shared';
import { ValidationError } from './errors.js';
import type { LogLevel } from './utils/logger.js';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const ServerConfigSchema = z.object({
  OPENAI_API_KEY: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  COLMATCH_PROVIDER: z.string().trim().min(1).default('openai'),
  COLMATCH_MODEL: optionalString,
  COLMATCH_TEMPERATURE: z.coerce.number().min(0).max(2).optional(),
  COLMATCH_MAX_TOKENS: z.coerce.number().int().min(1).max(100000).optional(),
  COLMATCH_HTTP_PORT: z.coerce.number().int().min(0).max(65535).default(40411),
  COLMATCH_HTTP_HOST: z.string().trim().min(1).default('127.0.0.1'),
  COLMATCH_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export interface ServerConfig {
  openaiApiKey?: string;
  anthropicApiKey?: string;
  defaultProvider: string;
  defaultModel?: string;
  defaultTemperature?: number;
  defaultMaxTokens?: number;
  httpPort: number;
  httpHost: string;
  requestTimeoutMs: number;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

/**
 * Blank variables count as unset so that `FOO=` in a .env file falls back
 * to the default instead of failing coercion.
 */
function withoutBlankValues(env: Env): Env {
  const result: Env = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value;
    }
  }
  return result;
}

export function getServerConfig(env: Env = process.env): ServerConfig {
  const parsed = ServerConfigSchema.safeParse(withoutBlankValues(env));
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(`Invalid environment configuration: ${details}`, {
      operation: 'config',
    });
  }

  const values = parsed.data;
  return {
    openaiApiKey: values.OPENAI_API_KEY,
    anthropicApiKey: values.ANTHROPIC_API_KEY,
    defaultProvider: values.COLMATCH_PROVIDER,
    defaultModel: values.COLMATCH_MODEL,
    defaultTemperature: values.COLMATCH_TEMPERATURE,
    defaultMaxTokens: values.COLMATCH_MAX_TOKENS,
    httpPort: values.COLMATCH_HTTP_PORT,
    httpHost: values.COLMATCH_HTTP_HOST,
    requestTimeoutMs: values.COLMATCH_REQUEST_TIMEOUT_MS,
    logLevel: values.LOG_LEVEL,
  };
}

/**
 * Default parameters for a provider taken from the environment. Explicit
 * request parameters are merged over these by the caller.
 */
export function providerParametersFromConfig(
  config: ServerConfig,
  providerId: string
): ProviderParameters {
  const parameters: ProviderParameters = {
    timeoutMs: String(config.requestTimeoutMs),
  };

  if (providerId === 'openai' && config.openaiApiKey) {
    parameters.apiKey = config.openaiApiKey;
  } else if (providerId === 'anthropic' && config.anthropicApiKey) {
    parameters.apiKey = config.anthropicApiKey;
  }

  return parameters;
}
