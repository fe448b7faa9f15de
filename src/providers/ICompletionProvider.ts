/**
 * Chat completion provider interface.
 * Wraps an external generative-AI endpoint that answers with a JSON object.
 */

export interface CompletionRequest {
  /** Fixed instructions, including the required JSON shape. */
  system: string;
  /** Rendered prompt carrying the feedback text or statistics. */
  prompt: string;
}

export interface ICompletionProvider {
  /** Model identifier, for logs. */
  readonly model: string;

  /**
   * Run one completion and return the parsed JSON object.
   * Rejects with a RemoteError; must stop work when `signal` aborts.
   * The result is unvalidated: callers check it against their schema.
   */
  completeJson(request: CompletionRequest, signal: AbortSignal): Promise<unknown>;
}
