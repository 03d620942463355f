export type {
  CompletionRequest,
  CompletionResponse,
  FinishReason,
  ICompletionProvider,
  TokenUsage,
} from './ICompletionProvider.js';
export { OpenAICompletionProvider } from './OpenAICompletionProvider.js';
export type { ChatClient, ChatCompletionLike, ChatRequestBody } from './OpenAICompletionProvider.js';
export type { ILogProvider, LogEvent, LogLevel, TaskLogEvent } from './ILogProvider.js';
export { LOG_LEVEL_RANK } from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
export type { ConsoleLogProviderOptions } from './ConsoleLogProvider.js';
