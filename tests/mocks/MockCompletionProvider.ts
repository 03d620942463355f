/**
 * In-memory mock for ICompletionProvider.
 * Replies come from a queue, then from a default reply; every request is kept.
 */

import { OracleUnavailableError } from '../../src/errors.js';
import type {
  CompletionRequest,
  CompletionResponse,
  FinishReason,
  ICompletionProvider,
} from '../../src/providers/ICompletionProvider.js';

export type MockReply =
  | CompletionResponse
  | Error
  | ((request: CompletionRequest) => CompletionResponse | Promise<CompletionResponse>);

export function jsonReply(value: unknown, finishReason: FinishReason = 'stop'): CompletionResponse {
  return { text: JSON.stringify(value), finishReason, usage: { promptTokens: 100, completionTokens: 20 } };
}

export function textReply(text: string, finishReason: FinishReason = 'stop'): CompletionResponse {
  return { text, finishReason };
}

export class MockCompletionProvider implements ICompletionProvider {
  available: boolean;
  readonly requests: CompletionRequest[] = [];
  private readonly queue: MockReply[] = [];
  private fallback: MockReply | null = null;

  constructor(opts?: { available?: boolean }) {
    this.available = opts?.available ?? true;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    if (!this.available) {
      throw new OracleUnavailableError('Mock provider unavailable');
    }
    this.requests.push(request);

    const reply = this.queue.shift() ?? this.fallback;
    if (reply === null) {
      throw new OracleUnavailableError('No mock reply queued');
    }
    if (reply instanceof Error) throw reply;
    if (typeof reply === 'function') return reply(request);
    return reply;
  }

  // ── Test Helpers ──

  get callCount(): number {
    return this.requests.length;
  }

  /** Replies used once each, in order, before the default. */
  enqueue(...replies: MockReply[]): this {
    this.queue.push(...replies);
    return this;
  }

  /** Reply used whenever the queue is empty. */
  respondWith(reply: MockReply): this {
    this.fallback = reply;
    return this;
  }

  callsFor(caller: string): CompletionRequest[] {
    return this.requests.filter((r) => r.caller === caller);
  }

  clear(): void {
    this.requests.length = 0;
    this.queue.length = 0;
    this.fallback = null;
  }
}
