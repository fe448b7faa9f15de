/**
 * Production container: Supabase storage and, when a key is configured,
 * OpenAI completions. Without OPENAI_API_KEY every answer comes from the
 * fallback path.
 */

import { createContainer, type Container } from './container.js';
import { loadConfig } from './config.js';
import { getSupabaseClient } from './db.js';
import { SupabaseFeedbackRepository } from './repositories/SupabaseFeedbackRepository.js';
import { OpenAICompletionProvider } from './providers/OpenAICompletionProvider.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import { InMemoryRateLimitStore } from './stores/InMemoryRateLimitStore.js';

let cached: Container | null = null;

export function getProductionContainer(): Container {
  if (cached) return cached;

  const config = loadConfig();

  if (!config.supabase) {
    throw new Error(
      'Missing required environment variables: SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY'
    );
  }

  const logProvider = new ConsoleLogProvider({
    outputToConsole: true,
    retainEvents: false,
    minLevel: config.logLevel,
  });

  const completionProvider = config.ai.apiKey
    ? new OpenAICompletionProvider({ apiKey: config.ai.apiKey, model: config.ai.model })
    : null;

  if (!completionProvider) {
    logProvider.warn('OPENAI_API_KEY not set: running in fallback-only mode');
  }

  cached = createContainer({
    feedbackRepo: new SupabaseFeedbackRepository(
      getSupabaseClient(config.supabase.url, config.supabase.serviceRoleKey)
    ),
    completionProvider,
    logProvider,
    rateLimitStore: new InMemoryRateLimitStore(),
    remotePolicy: config.ai.policy,
  });

  return cached;
}
