export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
export type LogFormat = "text" | "json";

const LEVEL_VALUE: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export const LOG_FORMATS = ["text", "json"] as const;

export interface LoggerOptions {
  /** Messages below this level are dropped. Default: "info". */
  level?: LogLevel;
  /** Default: "text". */
  format?: LogFormat;
  /** Default: "healthcheck". */
  component?: string;
}

/**
 * Leveled console logger.
 *
 * Text lines look like `[healthcheck:api] Health check has failed key=value`,
 * json lines are one object per line with `ts`, `level`, `component` and `msg`.
 */
export class Logger {
  readonly level: LogLevel;
  readonly format: LogFormat;
  readonly component: string;

  constructor(opts?: LoggerOptions) {
    this.level = opts?.level ?? "info";
    this.format = opts?.format ?? "text";
    this.component = opts?.component ?? "healthcheck";
  }

  static fromEnv(env: { LOG_LEVEL: LogLevel; LOG_FORMAT: LogFormat }): Logger {
    return new Logger({ level: env.LOG_LEVEL, format: env.LOG_FORMAT });
  }

  child(component: string): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      component: `${this.component}:${component}`,
    });
  }

  debug(msg: string, ctx?: Record<string, unknown>): void {
    this.log("debug", msg, ctx);
  }

  info(msg: string, ctx?: Record<string, unknown>): void {
    this.log("info", msg, ctx);
  }

  warn(msg: string, ctx?: Record<string, unknown>): void {
    this.log("warn", msg, ctx);
  }

  error(msg: string, ctx?: Record<string, unknown>): void {
    this.log("error", msg, ctx);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level !== "silent" && LEVEL_VALUE[level] >= LEVEL_VALUE[this.level];
  }

  private log(level: LogLevel, msg: string, ctx?: Record<string, unknown>) {
    if (!this.isLevelEnabled(level)) return;

    const write =
      level === "error"
        ? console.error
        : level === "warn"
          ? console.warn
          : console.log;

    if (this.format === "json") {
      write(
        JSON.stringify({
          ts: new Date().toISOString(),
          level,
          component: this.component,
          msg,
          ...ctx,
        })
      );
      return;
    }

    const fields = ctx
      ? Object.entries(ctx)
          .filter(([, value]) => value !== undefined)
          .map(([key, value]) => ` ${key}=${formatValue(value)}`)
          .join("")
      : "";
    write(`[${this.component}] ${msg}${fields}`);
  }
}

function formatValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  return JSON.stringify(value);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
