/**
 * OpenAI chat completion provider.
 * Requests JSON-mode completions and maps SDK failures onto RemoteError kinds.
 * SDK-level retries are disabled; the orchestrator owns the retry budget.
 */

import OpenAI from 'openai';
import type { CompletionRequest, ICompletionProvider } from './ICompletionProvider.js';
import { RemoteError } from '../errors.js';

const DEFAULT_MODEL = 'gpt-4o-mini';

export class OpenAICompletionProvider implements ICompletionProvider {
  private client: OpenAI;
  readonly model: string;

  constructor(opts: {
    apiKey?: string;
    model?: string;
    /** Pre-built client; tests pass one with a fake fetch. */
    client?: OpenAI;
  }) {
    this.client =
      opts.client ??
      new OpenAI({
        apiKey: opts.apiKey,
        maxRetries: 0,
      });
    this.model = opts.model ?? DEFAULT_MODEL;
  }

  async completeJson(request: CompletionRequest, signal: AbortSignal): Promise<unknown> {
    let content: string | null | undefined;

    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          temperature: 0,
          response_format: { type: 'json_object' },
          messages: [
            { role: 'system', content: request.system },
            { role: 'user', content: request.prompt },
          ],
        },
        { signal, maxRetries: 0 }
      );
      content = response.choices[0]?.message?.content;
    } catch (err) {
      throw mapSdkError(err);
    }

    if (!content) {
      throw new RemoteError('MalformedResponse', 'Completion contained no content');
    }

    try {
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (err) {
      throw new RemoteError('MalformedResponse', 'Completion content is not valid JSON', {
        cause: err,
      });
    }
  }
}

function mapSdkError(err: unknown): RemoteError {
  if (err instanceof RemoteError) return err;

  // Subclasses before their parents: APIConnectionTimeoutError extends APIConnectionError.
  if (err instanceof OpenAI.APIConnectionTimeoutError || err instanceof OpenAI.APIUserAbortError) {
    return new RemoteError('Timeout', err.message, { cause: err });
  }
  if (err instanceof OpenAI.APIConnectionError) {
    return new RemoteError('NetworkError', err.message, { cause: err });
  }
  if (err instanceof OpenAI.AuthenticationError || err instanceof OpenAI.PermissionDeniedError) {
    return new RemoteError('Unauthorized', err.message, { cause: err });
  }
  if (err instanceof OpenAI.RateLimitError) {
    return new RemoteError('RateLimited', err.message, { cause: err });
  }
  if (err instanceof OpenAI.BadRequestError || err instanceof OpenAI.UnprocessableEntityError) {
    return new RemoteError('MalformedResponse', err.message, { cause: err });
  }

  const message = err instanceof Error ? err.message : String(err);
  return new RemoteError('NetworkError', message, { cause: err });
}
