export { LexicalClassifier } from './fallback/LexicalClassifier.js';
export { compileLexicon, defaultLexicon } from './fallback/lexicon.js';
export { RemoteRunner, DEFAULT_REMOTE_POLICY } from './services/RemoteRunner.js';
export type { RemotePolicy } from './services/RemoteRunner.js';
export { RemoteClassificationClient } from './services/RemoteClassificationClient.js';
export { ClassificationService } from './services/ClassificationService.js';
export { GuidanceService } from './services/GuidanceService.js';
export { SummaryService } from './services/SummaryService.js';
export { FeedbackService, MAX_TEXT_LENGTH } from './services/FeedbackService.js';
export { priorityScore } from './services/priority.js';
export { createContainer } from './container.js';
export type { Container } from './container.js';
export { createRouter } from './api/router.js';
export { loadConfig } from './config.js';
export * from './providers/index.js';
export * from './errors.js';
export * from './types/models.js';
