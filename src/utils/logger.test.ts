import winston from 'winston';
import { describe, expect, it } from 'vitest';
import { createLogger, formatRepairs, RunLogger } from './logger.js';

describe('createLogger', () => {
  it('tags entries with the component', () => {
    const logger = createLogger('SampleEvaluator');
    expect(logger.defaultMeta).toEqual({ component: 'SampleEvaluator' });
  });

  it('writes no log files from tests', () => {
    const logger = createLogger('Test');
    expect(logger.transports).toHaveLength(1);
    expect(logger.transports[0]).toBeInstanceOf(winston.transports.Console);
  });
});

describe('formatRepairs', () => {
  it('renders each repair as code@path', () => {
    expect(
      formatRepairs([
        { code: 'coerce_op', path: 'units[0].branches[0].conditions' },
        { code: 'default_field', path: 'units[0].meta' },
      ])
    ).toEqual(['coerce_op@units[0].branches[0].conditions', 'default_field@units[0].meta']);
  });
});

describe('RunLogger', () => {
  it('keeps the run id', () => {
    expect(new RunLogger('eval-1').runId).toBe('eval-1');
  });
});
