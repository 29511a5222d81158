import type { LogFields, LogLevel } from "./types";

export interface LoggerContext {
  component: string;
  runId: string;
}

export type LogLineWriter = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  write?: LogLineWriter;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function writeToConsole(level: LogLevel, line: string): void {
  if (level === "error") {
    console.error(line);
    return;
  }
  console.log(line);
}

export class Logger {
  private readonly context: LoggerContext;
  private readonly level: LogLevel;
  private readonly writeLine: LogLineWriter;

  constructor(context: LoggerContext, options: LoggerOptions = {}) {
    this.context = context;
    this.level = options.level ?? "info";
    this.writeLine = options.write ?? writeToConsole;
  }

  child(component: string): Logger {
    return new Logger({ component, runId: this.context.runId }, { level: this.level, write: this.writeLine });
  }

  /** Same logger, calling `hook` before each line it writes. */
  tap(hook: (level: LogLevel) => void): Logger {
    const writeLine = this.writeLine;
    return new Logger(this.context, {
      level: this.level,
      write: (level, line) => {
        hook(level);
        writeLine(level, line);
      },
    });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(msg: string, fields?: LogFields): void {
    this.write("debug", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.write("info", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.write("warn", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.write("error", msg, fields);
  }

  private write(level: LogLevel, msg: string, fields?: LogFields): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const payload = {
      ts: new Date().toISOString(),
      level,
      msg,
      component: this.context.component,
      runId: this.context.runId,
      ...(fields ?? {}),
    };

    this.writeLine(level, JSON.stringify(payload));
  }
}
