/**
 * Text completion provider interface.
 * The only way the core talks to a language model. Implementations throw
 * OracleUnavailableError for every transport, credential or timeout failure.
 */

export interface CompletionRequest {
  systemPrompt: string;
  userPrompt: string;
  maxTokens: number;
  /** Hard deadline for the whole call. */
  timeoutMs: number;
  /** Ask the model for a JSON object. */
  json: boolean;
  /** Who is calling, for usage accounting (e.g. "schema-oracle"). */
  caller: string;
}

export type FinishReason = 'stop' | 'length' | 'other';

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
}

export interface CompletionResponse {
  text: string;
  /** 'length' means the model hit maxTokens and the text is truncated. */
  finishReason: FinishReason;
  usage?: TokenUsage;
}

export interface ICompletionProvider {
  /** False when credentials are missing; complete() then always throws. */
  readonly available: boolean;

  complete(request: CompletionRequest): Promise<CompletionResponse>;
}
