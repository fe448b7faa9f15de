/**
 * Remote classification over a completion provider.
 * Output is schema-checked: a category or urgency outside the closed sets is
 * a MalformedResponse, never coerced to the nearest value.
 */

import { z } from 'zod';
import type { ICompletionProvider } from '../providers/ICompletionProvider.js';
import { CATEGORIES, URGENCIES, type Classification } from '../types/models.js';
import { RemoteError } from '../errors.js';
import { withDeadline } from '../lib/deadline.js';
import { CLASSIFY_SYSTEM, classifyPrompt } from './prompts.js';

export const RemoteClassificationSchema = z.object({
  category: z.enum(CATEGORIES),
  urgency: z.enum(URGENCIES),
  isSpam: z.boolean(),
  confidence: z.number().min(0).max(1),
});

/** Turn a schema failure into a MalformedResponse naming the offending fields. */
export function malformed(what: string, error: z.ZodError): RemoteError {
  const issues = error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
  return new RemoteError('MalformedResponse', `Invalid ${what}: ${issues}`, { cause: error });
}

export class RemoteClassificationClient {
  constructor(private readonly provider: ICompletionProvider) {}

  get model(): string {
    return this.provider.model;
  }

  async classifyRemote(
    text: string,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<Classification> {
    const raw = await withDeadline(
      (callSignal) =>
        this.provider.completeJson(
          { system: CLASSIFY_SYSTEM, prompt: classifyPrompt.render({ text }) },
          callSignal
        ),
      timeoutMs,
      signal
    );

    const parsed = RemoteClassificationSchema.safeParse(raw);
    if (!parsed.success) {
      throw malformed('classification', parsed.error);
    }

    return { ...parsed.data, source: 'remote' };
  }
}
