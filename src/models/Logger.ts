import {
  LogPrinter,
  type LogLevels,
  type PrintStrategy,
  type PrintableLog,
} from "./LogPrinter";

export interface ILogInfo {
  source?: string;
  error?: unknown;
  data?: Record<string, unknown>;
  [key: string]: unknown;
}

export type ILog = PrintableLog;

export interface ILoggerOptions {
  /** null disables printing entirely; listeners still receive every log */
  printThreshold: null | LogLevels;
  printStrategy: PrintStrategy;
  useColors?: boolean;
}

/**
 * Synchronous structured logger. Child loggers created with `.with()` share
 * the root's printer and listeners.
 */
export class Logger {
  private printThreshold: null | LogLevels;
  private printStrategy: PrintStrategy;
  private boundContext: Record<string, unknown>;
  private useColors: boolean;
  private printer: LogPrinter;
  private source?: string;
  // Set on children so listeners registered anywhere live on the root
  private rootLogger?: Logger;
  public localListeners: Array<(log: ILog) => void> = [];

  public static Severity: Readonly<Record<LogLevels, number>> = {
    trace: 0,
    debug: 1,
    info: 2,
    warn: 3,
    error: 4,
    critical: 5,
  };

  constructor(
    options: ILoggerOptions,
    boundContext: Record<string, unknown> = {},
    source?: string,
    printer?: LogPrinter,
  ) {
    this.boundContext = { ...boundContext };
    this.printThreshold = options.printThreshold;
    this.printStrategy = options.printStrategy;
    this.useColors =
      typeof options.useColors === "boolean"
        ? options.useColors
        : this.detectColorSupport();
    this.source = source;
    this.printer =
      printer ??
      new LogPrinter({
        strategy: this.printStrategy,
        useColors: this.useColors,
      });
  }

  private detectColorSupport(): boolean {
    // Respect NO_COLOR convention
    if (process.env.NO_COLOR) return false;
    return Boolean(process.stdout && process.stdout.isTTY);
  }

  /**
   * Creates a new logger instance with additional bound context
   */
  public with({
    source,
    additionalContext: context,
  }: {
    source?: string;
    additionalContext?: Record<string, unknown>;
  }): Logger {
    const child = new Logger(
      {
        printThreshold: this.printThreshold,
        printStrategy: this.printStrategy,
        useColors: this.useColors,
      },
      { ...this.boundContext, ...context },
      source ?? this.source,
      this.printer,
    );
    child.rootLogger = this.rootLogger ?? this;
    return child;
  }

  public log(level: LogLevels, message: unknown, logInfo: ILogInfo = {}): void {
    const { source, error, data, ...context } = logInfo;

    const log: ILog = {
      level,
      message,
      source: source || this.source,
      timestamp: new Date(),
      error: error ? this.extractErrorInfo(error) : undefined,
      data: data || undefined,
      context: { ...this.boundContext, ...context },
    };

    const root = this.rootLogger ?? this;
    root.triggerLogListeners(log);

    if (root.canPrint(level)) {
      root.printer.print(log);
    }
  }

  private extractErrorInfo(error: unknown): NonNullable<ILog["error"]> {
    if (error instanceof Error) {
      return {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    return {
      name: "UnknownError",
      message: String(error),
    };
  }

  public trace(message: unknown, logInfo?: ILogInfo) {
    this.log("trace", message, logInfo);
  }

  public debug(message: unknown, logInfo?: ILogInfo) {
    this.log("debug", message, logInfo);
  }

  public info(message: unknown, logInfo?: ILogInfo) {
    this.log("info", message, logInfo);
  }

  public warn(message: unknown, logInfo?: ILogInfo) {
    this.log("warn", message, logInfo);
  }

  public error(message: unknown, logInfo?: ILogInfo) {
    this.log("error", message, logInfo);
  }

  public critical(message: unknown, logInfo?: ILogInfo) {
    this.log("critical", message, logInfo);
  }

  /**
   * @param listener - A listener that will be triggered for every log.
   */
  public onLog(listener: (log: ILog) => void) {
    const root = this.rootLogger ?? this;
    root.localListeners.push(listener);
  }

  private canPrint(level: LogLevels): boolean {
    if (this.printThreshold === null) {
      return false;
    }
    return Logger.Severity[level] >= Logger.Severity[this.printThreshold];
  }

  private triggerLogListeners(log: ILog) {
    for (const listener of this.localListeners) {
      try {
        listener(log);
      } catch (error) {
        // A failing listener must not break serialization; report it instead.
        this.printer.print({
          level: "error",
          message: "Error in log listener",
          timestamp: new Date(),
          error: this.extractErrorInfo(error),
        });
      }
    }
  }
}
