import { describe, it, expect, vi, afterEach } from 'vitest';
import { createConsoleLogger, formatWarning } from './logger.js';

describe('formatWarning', () => {
  it('tags the message with its component and appends the location', () => {
    expect(formatWarning({ code: 'AMBIGUOUS_DISPATCH', message: 'pick one' })).toBe('[dispatch] pick one');
    expect(formatWarning({ code: 'CALL_MODE_UNDETERMINED', message: 'unknown', location: 'main.ts:3:7' })).toBe(
      '[call-mode] unknown (at main.ts:3:7)',
    );
  });
});

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes warnings to the console and debug output only when enabled', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

    createConsoleLogger().warn('[dispatch] x');
    createConsoleLogger().debug('hidden');
    createConsoleLogger({ debug: true }).debug('shown');

    expect(warn).toHaveBeenCalledWith('[dispatch] x');
    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith('shown');
  });
});
