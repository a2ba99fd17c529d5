import { ExecutionException } from "./exceptions";

export enum LogLevel {
  DEBUG,
  INFO,
  WARN,
  ERROR,
}

type MessageType = string | Error;

export type LogFunction = (message: string) => void;

/**
 * Provides a customizable logging mechanism across different levels of verbosity.
 *
 * Levels mapped to `undefined` are silenced. When `saveJson` is set, messages
 * are collected instead of printed and can be read back with `getJsonLogs`.
 */
export class Logger {
  private logFunctions: Map<LogLevel, LogFunction | undefined>;
  private jsonLogs: Map<LogLevel, string[]>;

  constructor(
    logMapping?: Partial<Record<LogLevel, LogFunction | undefined>>,
    private saveJson: boolean = false,
    private prefix: string | undefined = undefined,
  ) {
    this.jsonLogs = new Map([
      [LogLevel.DEBUG, []],
      [LogLevel.INFO, []],
      [LogLevel.WARN, []],
      [LogLevel.ERROR, []],
    ]);
    this.logFunctions = new Map<LogLevel, LogFunction | undefined>([
      [LogLevel.DEBUG, undefined],
      [LogLevel.INFO, console.log],
      [LogLevel.WARN, console.warn],
      [LogLevel.ERROR, console.error],
    ]);
    if (logMapping) {
      for (const level of [
        LogLevel.DEBUG,
        LogLevel.INFO,
        LogLevel.WARN,
        LogLevel.ERROR,
      ]) {
        if (level in logMapping) {
          this.logFunctions.set(level, logMapping[level]);
        }
      }
    }
  }

  public getJsonLogs(): Record<string, string[]> {
    if (!this.saveJson) {
      throw ExecutionException.make(
        "JSON logging not enabled for this logger instance",
      );
    }
    return {
      debug: this.jsonLogs.get(LogLevel.DEBUG) ?? [],
      info: this.jsonLogs.get(LogLevel.INFO) ?? [],
      warn: this.jsonLogs.get(LogLevel.WARN) ?? [],
      error: this.jsonLogs.get(LogLevel.ERROR) ?? [],
    };
  }

  /**
   * Returns a logger that shares sinks with this one and prepends `[name]`
   * to every message.
   */
  public child(name: string): Logger {
    const child = new Logger(
      undefined,
      this.saveJson,
      this.prefix === undefined ? name : `${this.prefix}:${name}`,
    );
    child.logFunctions = this.logFunctions;
    child.jsonLogs = this.jsonLogs;
    return child;
  }

  /**
   * Logs a message at the specified log level if a corresponding log function is defined.
   */
  protected log(level: LogLevel, msg: MessageType): void {
    const logFunction = this.logFunctions.get(level);
    if (logFunction === undefined) return;
    const text = msg instanceof Error ? msg.message : msg;
    const formatted =
      this.prefix === undefined ? text : `[${this.prefix}] ${text}`;
    if (this.saveJson) {
      this.jsonLogs.get(level)?.push(formatted);
    } else {
      logFunction(formatted);
    }
  }

  public debug(msg: MessageType): void {
    this.log(LogLevel.DEBUG, msg);
  }

  public info(msg: MessageType): void {
    this.log(LogLevel.INFO, msg);
  }

  public warn(msg: MessageType): void {
    this.log(LogLevel.WARN, msg);
  }

  public error(msg: MessageType): void {
    this.log(LogLevel.ERROR, msg);
  }
}

/**
 * Logger that silences all logs.
 */
export class QuietLogger extends Logger {
  constructor(saveJson: boolean = false) {
    super(
      {
        [LogLevel.INFO]: undefined,
        [LogLevel.WARN]: undefined,
        [LogLevel.ERROR]: undefined,
      },
      saveJson,
    );
  }
}

/**
 * Logger that enables debug level logging to stdout.
 */
export class DebugLogger extends Logger {
  constructor(saveJson: boolean = false) {
    super(
      {
        [LogLevel.DEBUG]: console.log,
      },
      saveJson,
    );
  }
}
