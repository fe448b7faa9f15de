/**
 * Process configuration, read once from the environment.
 * The AI credential is optional: without it the process runs in permanent
 * fallback mode. Malformed values stop startup.
 */

import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from './providers/ILogProvider.js';
import type { RemotePolicy } from './services/RemoteRunner.js';

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : null));

const EnvSchema = z.object({
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().trim().min(1).default('gpt-4o-mini'),
  AI_TIMEOUT_MS: z.coerce.number().int().positive().default(4000),
  AI_MAX_RETRIES: z.coerce.number().int().min(0).max(3).default(1),
  AI_RETRY_BACKOFF_MS: z.coerce.number().int().min(0).default(250),
  AI_DEADLINE_MS: z.coerce.number().int().positive().default(9000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  SUPABASE_URL: optionalString,
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
});

export interface AppConfig {
  ai: {
    /** null means fallback only. */
    apiKey: string | null;
    model: string;
    policy: RemotePolicy;
  };
  logLevel: LogLevel;
  supabase: { url: string; serviceRoleKey: string } | null;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const vars = parsed.data;

  if (vars.AI_DEADLINE_MS < vars.AI_TIMEOUT_MS) {
    throw new Error('Invalid configuration: AI_DEADLINE_MS must be at least AI_TIMEOUT_MS');
  }

  return {
    ai: {
      apiKey: vars.OPENAI_API_KEY,
      model: vars.OPENAI_MODEL,
      policy: {
        timeoutMs: vars.AI_TIMEOUT_MS,
        maxRetries: vars.AI_MAX_RETRIES,
        retryBackoffMs: vars.AI_RETRY_BACKOFF_MS,
        deadlineMs: vars.AI_DEADLINE_MS,
      },
    },
    logLevel: vars.LOG_LEVEL,
    supabase:
      vars.SUPABASE_URL && vars.SUPABASE_SERVICE_ROLE_KEY
        ? { url: vars.SUPABASE_URL, serviceRoleKey: vars.SUPABASE_SERVICE_ROLE_KEY }
        : null,
  };
}
