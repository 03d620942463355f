import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, loadConfig } from '../src/config.js';
import { ConfigurationError } from '../src/errors.js';

describe('loadConfig', () => {
  it('should fall back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('should read every setting', () => {
    const config = loadConfig({
      LLM_PROXY_API_BASE: 'http://localhost:4000',
      LLM_PROXY_API_KEY: 'test-secret',
      LLM_MODEL: 'test-model',
      LLM_TIMEOUT_MS: '5000',
      SCHEMA_SAMPLE_ROWS: '3',
      AGGREGATE_POLICY: 'distribute-evenly',
      LOG_LEVEL: 'debug',
    });

    expect(config).toEqual({
      llm: { baseURL: 'http://localhost:4000', apiKey: 'test-secret', model: 'test-model', timeoutMs: 5000 },
      ingestion: { sampleRows: 3, aggregatePolicy: 'distribute-evenly' },
      logLevel: 'debug',
    });
  });

  it('should treat blank credentials as missing', () => {
    const config = loadConfig({ LLM_PROXY_API_BASE: '  ', LLM_PROXY_API_KEY: '' });
    expect(config.llm.baseURL).toBeUndefined();
    expect(config.llm.apiKey).toBeUndefined();
  });

  it('should reject an unknown aggregate policy', () => {
    expect(() => loadConfig({ AGGREGATE_POLICY: 'weekly' })).toThrow(ConfigurationError);
  });

  it('should name every invalid setting', () => {
    expect(() => loadConfig({ LLM_TIMEOUT_MS: 'soon', SCHEMA_SAMPLE_ROWS: '50' })).toThrow(
      /Invalid configuration: LLM_TIMEOUT_MS: .+; SCHEMA_SAMPLE_ROWS: .+/
    );
  });
});
