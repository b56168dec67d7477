import { Logger } from '../types';

export function createLogger(scope: string): Logger {
  const format = (message: string) => `[${scope}] ${message}`;

  return {
    info: (message: string, meta?: Record<string, unknown>) => {
      if (meta) console.log(format(message), meta);
      else console.log(format(message));
    },
    warn: (message: string, meta?: Record<string, unknown>) => {
      if (meta) console.warn(format(message), meta);
      else console.warn(format(message));
    },
    error: (message: string, meta?: Record<string, unknown>) => {
      if (meta) console.error(format(message), meta);
      else console.error(format(message));
    },
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
