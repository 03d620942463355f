/**
 * Production container: OpenAI-compatible proxy + console logging.
 * Without proxy credentials the oracle reports itself unavailable and every
 * file goes through the filename heuristics.
 */

import { loadConfig } from './config.js';
import { createContainer, type Container } from './container.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import { OpenAICompletionProvider } from './providers/OpenAICompletionProvider.js';
import { UsageTracker } from './services/UsageTracker.js';

let cached: Container | null = null;

export function getProductionContainer(env: Record<string, string | undefined> = process.env): Container {
  if (cached) return cached;

  const config = loadConfig(env);
  const logProvider = new ConsoleLogProvider({ outputToConsole: true, minLevel: config.logLevel });
  const usageTracker = new UsageTracker();
  const completionProvider = new OpenAICompletionProvider({
    baseURL: config.llm.baseURL,
    apiKey: config.llm.apiKey,
    model: config.llm.model,
    usageTracker,
  });

  if (!completionProvider.available) {
    logProvider.warn('LLM proxy not configured; schema discovery will use filename heuristics', {
      missing: [
        ...(config.llm.baseURL ? [] : ['LLM_PROXY_API_BASE']),
        ...(config.llm.apiKey ? [] : ['LLM_PROXY_API_KEY']),
      ],
    });
  }

  cached = createContainer({ completionProvider, logProvider, usageTracker, config });
  return cached;
}

/** Drop the cached container, e.g. after the environment changed. */
export function resetProductionContainer(): void {
  cached = null;
}
