/**
 * Narrative writer: turns the facts behind a finding into short prose.
 * Returns null whenever the model is unavailable or its answer is unusable;
 * callers then keep their statistical wording.
 */

import { z } from 'zod';
import { isOracleError } from '../errors.js';
import { parseModelJson } from '../parsing/json.js';
import type { ICompletionProvider } from '../providers/ICompletionProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_TOKENS = 300;

const NarrativeSchema = z.object({
  summary: z.string().trim().min(1),
  recommendation: z.string().trim().min(1),
});

export type Narrative = z.infer<typeof NarrativeSchema>;

export interface NarrativeRequest {
  /** System role, e.g. "You are a LinkedIn marketing analyst..." */
  role: string;
  /** The question the narrative answers. */
  question: string;
  facts: readonly string[];
  /** Usage accounting name, e.g. "narrative:linkedin". */
  caller: string;
}

export class NarrativeWriter {
  private readonly timeoutMs: number;
  private readonly maxTokens: number;

  constructor(
    private readonly completions: ICompletionProvider,
    private readonly logger: ILogProvider,
    opts?: { timeoutMs?: number; maxTokens?: number }
  ) {
    this.timeoutMs = opts?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxTokens = opts?.maxTokens ?? DEFAULT_MAX_TOKENS;
  }

  get available(): boolean {
    return this.completions.available;
  }

  async write(request: NarrativeRequest): Promise<Narrative | null> {
    if (!this.completions.available) return null;

    const userPrompt = [
      'Facts:',
      ...request.facts.map((f) => `- ${f}`),
      '',
      request.question,
      'Use only the facts above.',
      'Reply with a JSON object: {"summary": "2-3 sentences", "recommendation": "one concrete action"}.',
    ].join('\n');

    try {
      const response = await this.completions.complete({
        systemPrompt: request.role,
        userPrompt,
        maxTokens: this.maxTokens,
        timeoutMs: this.timeoutMs,
        json: true,
        caller: request.caller,
      });

      const parsed = NarrativeSchema.safeParse(parseModelJson(response.text, response.finishReason === 'length'));
      if (!parsed.success) {
        this.logger.warn('Narrative response unusable, using statistical text', { caller: request.caller });
        return null;
      }
      return parsed.data;
    } catch (err) {
      if (!isOracleError(err)) throw err;
      this.logger.warn('Narrative unavailable, using statistical text', {
        caller: request.caller,
        code: err.code,
        error: err.message,
      });
      return null;
    }
  }
}
