/**
 * OpenAI-compatible completion provider.
 * Talks to any proxy speaking the chat completions API (LiteLLM, vLLM, OpenAI itself).
 * Without a base URL and API key it is unavailable and never touches the network.
 */

import OpenAI from 'openai';
import { OracleUnavailableError } from '../errors.js';
import type { UsageTracker } from '../services/UsageTracker.js';
import type {
  CompletionRequest,
  CompletionResponse,
  FinishReason,
  ICompletionProvider,
} from './ICompletionProvider.js';

const DEFAULT_MODEL = 'gemini-2.5-flash';

/** The request body this provider sends. */
export interface ChatRequestBody {
  model: string;
  messages: Array<{ role: 'system' | 'user'; content: string }>;
  max_tokens: number;
  response_format?: { type: 'json_object' };
}

/** The subset of a chat completion this provider reads. */
export interface ChatCompletionLike {
  choices: Array<{
    message: { content: string | null };
    finish_reason: string | null;
  }>;
  usage?: { prompt_tokens: number; completion_tokens: number } | null;
}

/** The slice of the OpenAI client used here; lets tests swap in a fake. */
export interface ChatClient {
  createCompletion(body: ChatRequestBody, options: { timeout: number }): Promise<ChatCompletionLike>;
}

export class OpenAICompletionProvider implements ICompletionProvider {
  readonly available: boolean;
  private readonly client: ChatClient | null;
  private readonly model: string;
  private readonly usageTracker: UsageTracker | undefined;

  constructor(opts: {
    baseURL?: string;
    apiKey?: string;
    model?: string;
    usageTracker?: UsageTracker;
    /** Overrides the SDK client; credentials still gate availability. */
    client?: ChatClient;
  }) {
    this.model = opts.model ?? DEFAULT_MODEL;
    this.usageTracker = opts.usageTracker;
    this.available = Boolean(opts.baseURL && opts.apiKey);

    if (!this.available) {
      this.client = null;
    } else if (opts.client) {
      this.client = opts.client;
    } else {
      const openai = new OpenAI({
        baseURL: opts.baseURL,
        apiKey: opts.apiKey,
        // The oracle has its own fallback; retrying here only delays it.
        maxRetries: 0,
      });
      this.client = {
        createCompletion: (body, options) => openai.chat.completions.create(body, options),
      };
    }
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    if (!this.client) {
      throw new OracleUnavailableError('LLM proxy base URL or API key is not configured');
    }

    const body: ChatRequestBody = {
      model: this.model,
      messages: [
        { role: 'system', content: request.systemPrompt },
        { role: 'user', content: request.userPrompt },
      ],
      max_tokens: request.maxTokens,
      ...(request.json && { response_format: { type: 'json_object' as const } }),
    };

    let completion: ChatCompletionLike;
    try {
      completion = await this.client.createCompletion(body, { timeout: request.timeoutMs });
    } catch (err) {
      throw new OracleUnavailableError(describeFailure(err), { caller: request.caller });
    }

    const usage = completion.usage
      ? {
          promptTokens: completion.usage.prompt_tokens,
          completionTokens: completion.usage.completion_tokens,
        }
      : undefined;
    this.usageTracker?.record(request.caller, usage);

    const choice = completion.choices[0];
    if (!choice || choice.message.content === null) {
      throw new OracleUnavailableError('LLM returned no content', { caller: request.caller });
    }

    return {
      text: choice.message.content,
      finishReason: toFinishReason(choice.finish_reason),
      usage,
    };
  }
}

function toFinishReason(reason: string | null): FinishReason {
  if (reason === 'stop') return 'stop';
  if (reason === 'length') return 'length';
  return 'other';
}

function describeFailure(err: unknown): string {
  if (err instanceof OpenAI.APIConnectionTimeoutError) {
    return 'LLM request timed out';
  }
  if (err instanceof OpenAI.APIError) {
    return `LLM API error (${err.status ?? 'no status'}): ${err.message}`;
  }
  return `LLM request failed: ${err instanceof Error ? err.message : String(err)}`;
}
