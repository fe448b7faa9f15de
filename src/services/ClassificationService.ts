/**
 * Classification orchestrator.
 *
 *   Start → TryRemote → Validated → Done
 *                     ↘ RemoteFailed → TryFallback → Done
 *
 * TryRemote is skipped when no remote client was injected (no credential)
 * and for blank text. Done always carries exactly one Classification; the
 * `source` tag is the only trace of a remote failure.
 */

import type { Classification } from '../types/models.js';
import { LexicalClassifier } from '../fallback/LexicalClassifier.js';
import type { RemoteClassificationClient } from './RemoteClassificationClient.js';
import type { RemoteRunner } from './RemoteRunner.js';

export class ClassificationService {
  constructor(
    private readonly runner: RemoteRunner,
    private readonly remote: RemoteClassificationClient | null,
    private readonly fallback: LexicalClassifier = new LexicalClassifier()
  ) {}

  /** False means permanent fallback mode. */
  get remoteEnabled(): boolean {
    return this.remote !== null;
  }

  async classify(text: string, signal?: AbortSignal): Promise<Classification> {
    const remote = this.remote;
    const call =
      remote && text.trim().length > 0
        ? (timeoutMs: number, callSignal: AbortSignal) =>
            remote.classifyRemote(text, timeoutMs, callSignal)
        : null;

    return this.runner.run('classify', call, () => this.fallback.classify(text), signal);
  }
}
