import { safeStringify } from "./utils/safeStringify";
export type PrintStrategy = "pretty" | "plain" | "json" | "json_pretty";

export type LogLevels =
  | "trace"
  | "debug"
  | "info"
  | "warn"
  | "error"
  | "critical";

export interface PrintableLog {
  level: LogLevels;
  source?: string;
  message: unknown;
  timestamp: Date;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  data?: Record<string, unknown>;
  context?: Record<string, unknown>;
}

export type ColorTheme = {
  trace: string;
  debug: string;
  info: string;
  warn: string;
  error: string;
  critical: string;
  reset: string;
  bold: string;
  dim: string;
  blue: string;
  cyan: string;
  gray: string;
};

const COLORS: Readonly<ColorTheme> = {
  trace: "\x1b[90m",
  debug: "\x1b[36m",
  info: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
  critical: "\x1b[35m",
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
} as const;

const ICONS: Readonly<Record<LogLevels, string>> = {
  trace: "○",
  debug: "◆",
  info: "●",
  warn: "▲",
  error: "✕",
  critical: "█",
} as const;

type Writer = (msg: string) => void;

export class LogPrinter {
  private strategy: PrintStrategy;
  private colors: ColorTheme;

  constructor(options: {
    strategy: PrintStrategy;
    useColors: boolean;
    colorTheme?: Partial<ColorTheme>;
  }) {
    this.strategy = options.strategy;
    // For 'plain', force no ANSI colors regardless of options
    if (options.strategy === "plain") {
      this.colors = LogPrinter.NO_COLORS;
    } else {
      const base =
        options.useColors || options.colorTheme ? COLORS : LogPrinter.NO_COLORS;
      this.colors = { ...base, ...(options.colorTheme || {}) };
    }
  }

  public print(log: PrintableLog): void {
    if (this.strategy === "json") {
      LogPrinter.writers.log(safeStringify(this.normalizeForJson(log)));
      return;
    }

    if (this.strategy === "json_pretty") {
      LogPrinter.writers.log(safeStringify(this.normalizeForJson(log), 2));
      return;
    }

    const { level, source, message, timestamp, error, data, context } = log;
    const mainLine = [
      this.formatTime(timestamp),
      this.formatLevel(level),
      this.formatSource(source),
      this.formatMessage(message),
    ]
      .filter(Boolean)
      .join(" ");

    const output: string[] = [mainLine];
    const errorLines = this.formatError(error);
    const dataLines = this.formatBlock("data", this.colors.cyan, data);
    const contextLines = this.formatBlock("context", this.colors.blue, context);
    if (errorLines.length || dataLines.length || contextLines.length) {
      output.push(...errorLines, ...dataLines, ...contextLines);
      output.push("");
    }
    const writer = this.pickWriter(level);
    output.forEach((line) => writer(line));
  }

  private pickWriter(level: LogLevels): Writer {
    const toError =
      level === "warn" || level === "error" || level === "critical";
    return toError ? LogPrinter.writers.error : LogPrinter.writers.log;
  }

  private formatTime(timestamp: Date): string {
    const time = timestamp.toISOString().slice(11, 23);
    return `${this.colors.gray}${time}${this.colors.reset}`;
  }

  private formatLevel(level: LogLevels): string {
    const color = this.colors[level];
    const label = level.toUpperCase().padEnd(7);
    return `${color}${ICONS[level]} ${this.colors.bold}${label}${this.colors.reset}`;
  }

  private formatSource(source?: string): string {
    if (!source) return "";
    return `${this.colors.blue}[${source}]${this.colors.reset}`;
  }

  private formatMessage(message: unknown): string {
    if (typeof message === "object" && message !== null) {
      return safeStringify(message, 2);
    }
    return String(message);
  }

  private formatError(error: PrintableLog["error"]): string[] {
    if (!error) return [];
    const lines: string[] = [
      `    ${this.colors.gray}╰─${this.colors.reset} ${this.colors.error}${error.name}: ${error.message}${this.colors.reset}`,
    ];
    if (error.stack) {
      // First stack line repeats name and message
      for (const frame of error.stack.split("\n").slice(1)) {
        const cleaned = frame.trim().replace(/^at /, "");
        lines.push(
          `       ${this.colors.gray}↳${this.colors.reset} ${this.colors.dim}${cleaned}${this.colors.reset}`,
        );
      }
    }
    return lines;
  }

  private formatBlock(
    label: string,
    color: string,
    block?: Record<string, unknown>,
  ): string[] {
    if (!block || Object.keys(block).length === 0) return [];
    const lines: string[] = [
      `    ${this.colors.gray}╰─${this.colors.reset} ${color}${label}:${this.colors.reset}`,
    ];
    for (const line of safeStringify(block, 2, { maxDepth: 3 }).split("\n")) {
      lines.push(`       ${this.colors.dim}${line}${this.colors.reset}`);
    }
    return lines;
  }

  private normalizeForJson(log: PrintableLog): PrintableLog {
    return {
      ...log,
      context:
        log.context && Object.keys(log.context).length > 0
          ? log.context
          : undefined,
    };
  }

  private static NO_COLORS: ColorTheme = {
    trace: "",
    debug: "",
    info: "",
    warn: "",
    error: "",
    critical: "",
    reset: "",
    bold: "",
    dim: "",
    blue: "",
    cyan: "",
    gray: "",
  } as const;

  private static defaultWriters(): { log: Writer; error: Writer } {
    return {
      // eslint-disable-next-line no-console
      log: (msg) => console.log(msg),
      // eslint-disable-next-line no-console
      error: (msg) => console.error(msg),
    };
  }

  private static writers = LogPrinter.defaultWriters();

  public static setWriters(writers: Partial<{ log: Writer; error: Writer }>) {
    LogPrinter.writers = { ...LogPrinter.writers, ...writers };
  }

  public static resetWriters() {
    LogPrinter.writers = LogPrinter.defaultWriters();
  }
}
