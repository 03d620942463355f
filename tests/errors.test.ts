import { describe, it, expect } from 'vitest';
import {
  FileLoadError,
  OracleInvalidResponseError,
  OracleUnavailableError,
  PipelineFatalError,
  RowExtractionError,
  TaskFailedError,
  isOracleError,
  toTaskError,
} from '../src/errors.js';

describe('errors', () => {
  it('should name errors after their class', () => {
    const err = new FileLoadError('a.csv', 'no header');
    expect(err.name).toBe('FileLoadError');
    expect(err.message).toBe('Could not load a.csv: no header');
    expect(err.details).toEqual({ file: 'a.csv' });
  });

  it('should prefix row errors with the row number', () => {
    expect(new RowExtractionError(4, 'unparseable date').message).toBe('Row 4: unparseable date');
  });

  it('should recognise both oracle errors', () => {
    expect(isOracleError(new OracleUnavailableError('down'))).toBe(true);
    expect(isOracleError(new OracleInvalidResponseError('garbled'))).toBe(true);
    expect(isOracleError(new Error('other'))).toBe(false);
  });

  describe('toTaskError', () => {
    it('should keep the code of an AppError', () => {
      expect(toTaskError(new PipelineFatalError('No source files to ingest'), 'ingestion')).toEqual({
        code: 'PIPELINE_FATAL',
        message: 'No source files to ingest',
      });
    });

    it('should report anything else as TASK_FAILED', () => {
      expect(toTaskError(new RangeError('out of range'), 'analysis:website')).toEqual({
        code: 'TASK_FAILED',
        message: 'out of range',
      });
      expect(toTaskError('plain string', 'synthesis')).toEqual({ code: 'TASK_FAILED', message: 'plain string' });
    });

    it('should carry the task name on TaskFailedError', () => {
      expect(new TaskFailedError('synthesis', 'boom').details).toEqual({ task: 'synthesis' });
    });
  });
});
