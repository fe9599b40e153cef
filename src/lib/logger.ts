/**
 * Console progress output
 */

export interface Logger {
  info(message: string): void;
  /** Per-commit progress lines */
  step(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createConsoleLogger(options: { quiet?: boolean } = {}): Logger {
  const { quiet = false } = options;
  return {
    info: (message) => {
      if (!quiet) console.log(message);
    },
    step: (message) => {
      if (!quiet) console.log(`  ${message}`);
    },
    warn: (message) => console.error(`warning: ${message}`),
    error: (message) => console.error(message),
  };
}

export const silentLogger: Logger = {
  info: () => {},
  step: () => {},
  warn: () => {},
  error: () => {},
};
