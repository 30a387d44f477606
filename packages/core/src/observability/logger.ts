import { getFeatureFlag } from "@framevis/shared";
import type { CorrelationContext, LogCategory, LogEntry, LogLevel } from "./types";

export type LoggerConfig = {
  minLevel: LogLevel;
  console: boolean;
  handler?: (entry: LogEntry) => void;
  defaultContext?: Partial<CorrelationContext>;
};

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function formatLogValue(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (value instanceof Error) {
    return value.stack ?? value.message;
  }
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

function formatLogLine(values: unknown[]): string {
  return values.map(formatLogValue).join(" ");
}

function writeLine(output: string, stream: "stdout" | "stderr"): void {
  if (typeof process === "undefined") {
    return;
  }
  const target = stream === "stderr" ? process.stderr : process.stdout;
  if (!target) {
    return;
  }
  target.write(`${output}\n`);
}

export class StructuredLogger {
  private config: LoggerConfig;
  private context: Partial<CorrelationContext>;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      minLevel: config.minLevel ?? getFeatureFlag("log_level"),
      console: config.console ?? true,
      handler: config.handler,
      defaultContext: config.defaultContext ?? {},
    };
    this.context = { ...this.config.defaultContext };
  }

  child(ctx: Partial<CorrelationContext>): StructuredLogger {
    const c = new StructuredLogger(this.config);
    c.context = { ...this.context, ...ctx };
    return c;
  }

  getContext(): Partial<CorrelationContext> {
    return { ...this.context };
  }

  isLevelEnabled(lvl: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[lvl] >= LOG_LEVEL_PRIORITY[this.config.minLevel];
  }

  debug(cat: LogCategory, msg: string, data?: Record<string, unknown>): void {
    this.log("debug", cat, msg, data);
  }

  info(cat: LogCategory, msg: string, data?: Record<string, unknown>): void {
    this.log("info", cat, msg, data);
  }

  warn(cat: LogCategory, msg: string, data?: Record<string, unknown>): void {
    this.log("warn", cat, msg, data);
  }

  error(cat: LogCategory, msg: string, err?: Error, data?: Record<string, unknown>): void {
    this.log("error", cat, msg, data, err);
  }

  logMutation(op: string, outcome: "applied" | "rejected", details: Record<string, unknown>): void {
    this.log(outcome === "rejected" ? "warn" : "debug", "visibility", `${op} -> ${outcome}`, {
      operation: op,
      outcome,
      ...details,
    });
  }

  private log(
    lvl: LogLevel,
    cat: LogCategory,
    msg: string,
    data?: Record<string, unknown>,
    err?: Error
  ): void {
    if (!this.isLevelEnabled(lvl)) {
      return;
    }
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: lvl,
      category: cat,
      message: msg,
      context: this.context,
      data,
      error: err ? { name: err.name, message: err.message, stack: err.stack } : undefined,
    };
    if (this.config.handler) {
      this.config.handler(entry);
    }
    if (this.config.console) {
      this.consoleLog(entry);
    }
  }

  private consoleLog(e: LogEntry): void {
    const p = `[${e.timestamp}] [${e.level.toUpperCase()}] [${e.category}]`;
    const c = e.context.primitiveId ? ` (primitive:${e.context.primitiveId})` : "";
    const a: unknown[] = [`${p + c} ${e.message}`];
    if (e.data) {
      a.push(e.data);
    }
    if (e.error) {
      a.push(e.error);
    }
    const line = formatLogLine(a);
    const stream = e.level === "warn" || e.level === "error" ? "stderr" : "stdout";
    writeLine(line, stream);
  }
}

let defaultLogger: StructuredLogger | null = null;

export function getLogger(): StructuredLogger {
  if (!defaultLogger) {
    defaultLogger = new StructuredLogger();
  }
  return defaultLogger;
}

export function setDefaultLogger(logger: StructuredLogger): void {
  defaultLogger = logger;
}
