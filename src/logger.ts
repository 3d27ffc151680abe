import { getLogConfig, type ILogConfig } from "./config";
import { Logger } from "./models/Logger";

let builtLogger: Logger | undefined;
let builtFrom: ILogConfig | undefined;
let customLogger: Logger | undefined;

/**
 * The logger used when a serializer call does not bring its own. Rebuilt
 * whenever the logging configuration changes.
 */
export function getDefaultLogger(): Logger {
  if (customLogger) {
    return customLogger;
  }
  const config = getLogConfig();
  if (!builtLogger || builtFrom !== config) {
    builtLogger = new Logger(
      {
        printThreshold: config.logLevel,
        printStrategy: config.logStrategy,
      },
      {},
      "fieldmap",
    );
    builtFrom = config;
  }
  return builtLogger;
}

/**
 * Replaces the default logger until called again with `undefined`.
 */
export function setDefaultLogger(logger: Logger | undefined): void {
  customLogger = logger;
}
