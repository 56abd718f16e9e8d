export type Logger = Pick<Console, "log" | "warn" | "error">;

export type LoggerOptions = {
  timestamps?: boolean;
  sink?: Logger;
};

// journald stamps every line itself
export function underSystemd(env: NodeJS.ProcessEnv = process.env): boolean {
  return Boolean(env.NOTIFY_SOCKET);
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? console;
  const timestamps = options.timestamps ?? !underSystemd();

  const prefix = () =>
    timestamps ? `${new Date().toISOString()} [${scope}]` : `[${scope}]`;

  return {
    log: (...args: unknown[]) => sink.log(prefix(), ...args),
    warn: (...args: unknown[]) => sink.warn(prefix(), ...args),
    error: (...args: unknown[]) => sink.error(prefix(), ...args),
  };
}
