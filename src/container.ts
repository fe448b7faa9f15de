/**
 * Dependency wiring.
 * Constructs all services with their dependencies. The completion provider
 * is null when no AI credential is configured, which puts every service in
 * fallback-only mode for the life of the container.
 */

import type { IFeedbackRepository } from './repositories/IFeedbackRepository.js';
import type { ICompletionProvider } from './providers/ICompletionProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { IRateLimitStore } from './stores/IRateLimitStore.js';
import type { Middleware } from './middleware/pipeline.js';
import { LexicalClassifier } from './fallback/LexicalClassifier.js';
import { RemoteRunner, DEFAULT_REMOTE_POLICY, type RemotePolicy } from './services/RemoteRunner.js';
import { RemoteClassificationClient } from './services/RemoteClassificationClient.js';
import { ClassificationService } from './services/ClassificationService.js';
import { GuidanceService } from './services/GuidanceService.js';
import { SummaryService } from './services/SummaryService.js';
import { FeedbackService } from './services/FeedbackService.js';
import { createRateLimitMiddleware, RATE_LIMITS } from './middleware/rate-limit.js';
import { createLoggingMiddleware } from './middleware/logging.js';
import { createErrorHandler } from './middleware/error-handler.js';

export interface Container {
  runner: RemoteRunner;
  classificationService: ClassificationService;
  guidanceService: GuidanceService;
  summaryService: SummaryService;
  feedbackService: FeedbackService;
  logProvider: ILogProvider;
  logging: Middleware;
  errorHandler: Middleware;
  rateLimit: {
    submitFeedback: Middleware;
    updateStatus: Middleware;
    summaries: Middleware;
  };
}

export function createContainer(deps: {
  feedbackRepo: IFeedbackRepository;
  completionProvider: ICompletionProvider | null;
  logProvider: ILogProvider;
  rateLimitStore: IRateLimitStore;
  remotePolicy?: Partial<RemotePolicy>;
}): Container {
  const runner = new RemoteRunner(
    { ...DEFAULT_REMOTE_POLICY, ...deps.remotePolicy },
    deps.logProvider
  );
  const provider = deps.completionProvider;

  const classificationService = new ClassificationService(
    runner,
    provider ? new RemoteClassificationClient(provider) : null,
    new LexicalClassifier()
  );
  const guidanceService = new GuidanceService(runner, provider);
  const summaryService = new SummaryService(runner, provider);
  const feedbackService = new FeedbackService(
    classificationService,
    guidanceService,
    summaryService,
    deps.feedbackRepo,
    deps.logProvider
  );

  const rateLimit = {
    submitFeedback: createRateLimitMiddleware(deps.rateLimitStore, RATE_LIMITS.submitFeedback),
    updateStatus: createRateLimitMiddleware(deps.rateLimitStore, RATE_LIMITS.updateStatus),
    summaries: createRateLimitMiddleware(deps.rateLimitStore, RATE_LIMITS.summaries),
  };

  return {
    runner,
    classificationService,
    guidanceService,
    summaryService,
    feedbackService,
    logProvider: deps.logProvider,
    logging: createLoggingMiddleware(deps.logProvider),
    errorHandler: createErrorHandler(deps.logProvider),
    rateLimit,
  };
}
