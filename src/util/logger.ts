export type LogLevel = "silent" | "error" | "info" | "debug";

const LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  info: 2,
  debug: 3,
};

// Everything goes to stderr: stdout belongs to the stdio MCP transport.
export class Logger {
  constructor(private readonly level: LogLevel = "info", private readonly sink: (line: string) => void = (line) => process.stderr.write(line)) {}

  isEnabled(level: Exclude<LogLevel, "silent">): boolean {
    return LEVEL_RANK[this.level] >= LEVEL_RANK[level];
  }

  error(message: string) {
    this.write("error", message);
  }

  info(message: string) {
    this.write("info", message);
  }

  debug(message: string) {
    this.write("debug", message);
  }

  private write(level: Exclude<LogLevel, "silent">, message: string) {
    if (!this.isEnabled(level)) return;
    this.sink(`[${new Date().toISOString()}] ${level.toUpperCase()} ${message}\n`);
  }
}
