/**
 * Console logging for the azlab CLI.
 *
 * Managers and procedures take a `Logger` and never write to the console
 * directly, so library callers can route output elsewhere.
 */

export type Logger = {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

// Theme helper for CLI output
export const theme = {
  error: (s: string) => `\x1b[31m${s}\x1b[0m`,
  success: (s: string) => `\x1b[32m${s}\x1b[0m`,
  warn: (s: string) => `\x1b[33m${s}\x1b[0m`,
  info: (s: string) => `\x1b[34m${s}\x1b[0m`,
  muted: (s: string) => `\x1b[90m${s}\x1b[0m`,
} as const;

export type ConsoleLoggerOptions = {
  /** Print debug lines. */
  verbose?: boolean;
  /** Disable ANSI colours (default: colour only when stdout is a TTY). */
  plain?: boolean;
  /** Output destination; info goes to `log`, everything else to `error`. */
  sink?: { log: (message: string) => void; error: (message: string) => void };
};

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const plain = options.plain ?? !process.stdout.isTTY;
  const paint = (fn: (s: string) => string, s: string) => (plain ? s : fn(s));
  const sink = options.sink ?? { log: (m: string) => console.log(m), error: (m: string) => console.error(m) };

  return {
    debug: (message) => {
      if (options.verbose) sink.error(paint(theme.muted, message));
    },
    info: (message) => sink.log(message),
    warn: (message) => sink.error(paint(theme.warn, `⚠ ${message}`)),
    error: (message) => sink.error(paint(theme.error, `✗ ${message}`)),
  };
}

export function createSilentLogger(): Logger {
  const noop = () => {};
  return { debug: noop, info: noop, warn: noop, error: noop };
}
