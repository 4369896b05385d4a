/**
 * Structured logging to stderr for MCP server observability
 * All logs go to stderr since stdout is reserved for MCP protocol
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export interface LogEvent extends LogFields {
  ts: string;
  level: LogLevel;
  event: string;
}

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

/**
 * Stable error code for logs and metrics
 */
export function errorCode(err: unknown): string {
  if (typeof err === "object" && err !== null && "code" in err) {
    const code = err.code;
    if (typeof code === "string" || typeof code === "number") {
      return String(code);
    }
  }
  return "UNKNOWN";
}

export class Logger {
  #minLevel: LogLevel;
  #write: (line: string) => void;

  constructor(minLevel: LogLevel = "info", write: (line: string) => void = (line) => console.error(line)) {
    this.#minLevel = minLevel;
    this.#write = write;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.#minLevel);
  }

  private log(level: LogLevel, event: string, data?: LogFields): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const logEvent: LogEvent = {
      ...data,
      ts: new Date().toISOString(),
      level,
      event,
    };

    this.#write(JSON.stringify(logEvent));
  }

  debug(event: string, data?: LogFields): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: LogFields): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: LogFields): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: LogFields): void {
    this.log("error", event, data);
  }

  // Tool execution outcome
  toolCall(tool: string, duration_ms: number, success: boolean, err?: unknown): void {
    if (success) {
      this.info("tool.success", { tool, duration_ms });
    } else {
      this.error("tool.error", {
        tool,
        duration_ms,
        err_code: errorCode(err),
        err_message: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
