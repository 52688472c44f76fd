import type { RuntimeWarning } from '@pipesmith/types';

export interface Logger {
  warn(message: string): void;
  debug(message: string): void;
}

/** Console logger that tags every line with the emitting component. */
export function createConsoleLogger(options: { debug?: boolean } = {}): Logger {
  return {
    warn: (message) => console.warn(message),
    debug: (message) => {
      if (options.debug) console.debug(message);
    },
  };
}

const COMPONENT_BY_CODE: Record<RuntimeWarning['code'], string> = {
  AMBIGUOUS_DISPATCH: 'dispatch',
  CALL_MODE_UNDETERMINED: 'call-mode',
};

export function formatWarning(warning: RuntimeWarning): string {
  const where = warning.location ? ` (at ${warning.location})` : '';
  return `[${COMPONENT_BY_CODE[warning.code]}] ${warning.message}${where}`;
}
