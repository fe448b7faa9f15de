export type { ICompletionProvider, CompletionRequest } from './ICompletionProvider.js';
export { OpenAICompletionProvider } from './OpenAICompletionProvider.js';
export type { ILogProvider, LogEvent, LogLevel, RequestLogEvent } from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
