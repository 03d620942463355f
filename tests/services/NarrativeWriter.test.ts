import { describe, it, expect, beforeEach } from 'vitest';
import { OracleInvalidResponseError } from '../../src/errors.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { NarrativeWriter, type NarrativeRequest } from '../../src/services/NarrativeWriter.js';
import { MockCompletionProvider, jsonReply, textReply } from '../mocks/MockCompletionProvider.js';

const request: NarrativeRequest = {
  role: 'You are a website analytics specialist.',
  question: 'Summarize the website page views trend.',
  facts: ['Recent 30-day average page views: 120', 'Change: +4.0%'],
  caller: 'narrative:website',
};

describe('NarrativeWriter', () => {
  let completions: MockCompletionProvider;
  let logger: ConsoleLogProvider;
  let writer: NarrativeWriter;

  beforeEach(() => {
    completions = new MockCompletionProvider();
    logger = new ConsoleLogProvider();
    writer = new NarrativeWriter(completions, logger, { timeoutMs: 5000 });
  });

  it('should return the trimmed summary and recommendation', async () => {
    completions.enqueue(jsonReply({ summary: '  Traffic held steady. ', recommendation: 'Refresh the top posts.' }));

    expect(await writer.write(request)).toEqual({
      summary: 'Traffic held steady.',
      recommendation: 'Refresh the top posts.',
    });
  });

  it('should build the prompt from the facts', async () => {
    completions.enqueue(jsonReply({ summary: 's', recommendation: 'r' }));
    await writer.write(request);

    const [sent] = completions.requests;
    expect(sent.systemPrompt).toBe('You are a website analytics specialist.');
    expect(sent.userPrompt.split('\n').slice(0, 4)).toEqual([
      'Facts:',
      '- Recent 30-day average page views: 120',
      '- Change: +4.0%',
      '',
    ]);
    expect(sent).toMatchObject({ maxTokens: 300, timeoutMs: 5000, json: true, caller: 'narrative:website' });
  });

  it('should return null without calling an unavailable provider', async () => {
    completions.available = false;
    expect(writer.available).toBe(false);
    expect(await writer.write(request)).toBeNull();
    expect(completions.callCount).toBe(0);
  });

  it('should return null for a response missing a field', async () => {
    completions.enqueue(jsonReply({ summary: 'Only a summary.' }));
    expect(await writer.write(request)).toBeNull();
    expect(logger.eventsAt('warn')[0]).toMatchObject({
      message: 'Narrative response unusable, using statistical text',
      fields: { caller: 'narrative:website' },
    });
  });

  it('should repair a truncated response', async () => {
    completions.enqueue(textReply('{"summary":"Up.","recommendation":"Post more.","extra":"cut of', 'length'));
    expect(await writer.write(request)).toEqual({ summary: 'Up.', recommendation: 'Post more.' });
  });

  it('should return null when the oracle errors', async () => {
    completions.enqueue(new OracleInvalidResponseError('garbled'));
    expect(await writer.write(request)).toBeNull();
    expect(logger.eventsAt('warn')[0].fields).toEqual({
      caller: 'narrative:website',
      code: 'ORACLE_INVALID_RESPONSE',
      error: 'garbled',
    });
  });

  it('should rethrow errors that are not oracle errors', async () => {
    completions.enqueue(new TypeError('bug'));
    await expect(writer.write(request)).rejects.toThrow(TypeError);
  });
});
