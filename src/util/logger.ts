export type Logger = {
  debug: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

export type LoggerOptions = {
  debug?: boolean;
};

// stdout is owned by the MCP stdio transport, so everything goes to stderr.
export function createLogger(subsystem: string, opts: LoggerOptions = {}): Logger {
  const line = (level: string, msg: string) => `[${subsystem}] ${level} ${msg}`;
  return {
    debug: (msg) => {
      if (opts.debug) console.error(line("debug", msg));
    },
    info: (msg) => console.error(line("info", msg)),
    warn: (msg) => console.error(line("warn", msg)),
    error: (msg) => console.error(line("error", msg)),
  };
}

export function childLogger(parent: Logger, scope: string): Logger {
  return {
    debug: (msg) => parent.debug(`${scope}: ${msg}`),
    info: (msg) => parent.info(`${scope}: ${msg}`),
    warn: (msg) => parent.warn(`${scope}: ${msg}`),
    error: (msg) => parent.error(`${scope}: ${msg}`),
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
