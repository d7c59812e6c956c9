const maxLogLines = 100;
const lines: string[] = [];

export type LogLevel = "info" | "warn" | "error";

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

function append(level: LogLevel, scope: string, message: string): string {
  const line = `${new Date().toISOString()} ${level.toUpperCase()} [${scope}] ${message}`;
  lines.push(line);
  if (lines.length > maxLogLines) lines.shift();
  return line;
}

/** Console logger with a scope prefix. Every line is also kept in a bounded in-memory ring. */
export function createLogger(scope: string): Logger {
  return {
    info(message) {
      console.log(append("info", scope, message));
    },
    warn(message) {
      console.warn(append("warn", scope, message));
    },
    error(message, err) {
      const detail = err instanceof Error ? `: ${err.message}` : err !== undefined ? `: ${String(err)}` : "";
      console.error(append("error", scope, `${message}${detail}`));
    },
  };
}

export function getRecentLog(): string[] {
  return [...lines];
}

export function clearLog(): void {
  lines.length = 0;
}
