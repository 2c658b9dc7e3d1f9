export type LogLevel = "error" | "warn" | "info" | "debug";

export interface Logger {
  level: LogLevel;
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

const SEVERITY: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

/**
 * Everything goes to stderr so stdout stays free for piping. Levels above
 * `level` are dropped.
 */
export function createLogger(
  level: LogLevel = "info",
  sink: (line: string) => void = (line) => console.error(line),
): Logger {
  const emit = (at: LogLevel, message: string) => {
    if (SEVERITY[at] > SEVERITY[level]) return;
    sink(at === "info" ? message : `[${at}] ${message}`);
  };

  return {
    level,
    error: (message) => emit("error", message),
    warn: (message) => emit("warn", message),
    info: (message) => emit("info", message),
    debug: (message) => emit("debug", message),
  };
}

export function levelFor(flags: { verbose: boolean; quiet: boolean }): LogLevel {
  if (flags.quiet) return "error";
  return flags.verbose ? "debug" : "info";
}
