import { describe, it, expect } from 'vitest';
import { loadOptionsFromEnv } from './config.js';

describe('loadOptionsFromEnv', () => {
  it('uses the defaults when nothing is set', () => {
    expect(loadOptionsFromEnv({})).toEqual({
      astFallback: 'normal-with-warning',
      assumeAllPiping: false,
      pipingOperator: '>>',
    });
  });

  it('reads every option and ignores unrelated variables', () => {
    expect(
      loadOptionsFromEnv({
        PIPESMITH_AST_FALLBACK: 'raise',
        PIPESMITH_ASSUME_ALL_PIPING: 'yes',
        PIPESMITH_PIPING_OPERATOR: '|',
        HOME: '/home/test',
      }),
    ).toEqual({ astFallback: 'raise', assumeAllPiping: true, pipingOperator: '|' });
  });

  it('rejects invalid values', () => {
    expect(() => loadOptionsFromEnv({ PIPESMITH_AST_FALLBACK: 'sometimes' })).toThrow();
    expect(() => loadOptionsFromEnv({ PIPESMITH_ASSUME_ALL_PIPING: 'maybe' })).toThrow();
  });
});
