import { z } from "zod";
import { invalidConfigError } from "./errors";
import { Env } from "./models/Env";
import type { LogLevels, PrintStrategy } from "./models/LogPrinter";

export const ENV_LOG_LEVEL = "FIELDMAP_LOG_LEVEL";
export const ENV_LOG_STRATEGY = "FIELDMAP_LOG_STRATEGY";
export const ENV_MAX_DEPTH = "FIELDMAP_MAX_DEPTH";

export const DEFAULT_MAX_DEPTH = 32;

export interface IFieldmapConfig {
  /** null keeps the default logger silent */
  logLevel: LogLevels | null;
  logStrategy: PrintStrategy;
  maxDepth: number;
}

const logLevelSchema = z
  .enum(["trace", "debug", "info", "warn", "error", "critical"])
  .nullable();
const logStrategySchema = z.enum(["pretty", "plain", "json", "json_pretty"]);
export const maxDepthSchema = z.number().int().positive();

function parseSetting<T>(
  key: string,
  schema: z.ZodType<T>,
  value: unknown,
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    return invalidConfigError.throw({
      key,
      reason: result.error.issues.map((issue) => issue.message).join("; "),
    });
  }
  return result.data;
}

export type ILogConfig = Pick<IFieldmapConfig, "logLevel" | "logStrategy">;

function loadEnv(source: NodeJS.ProcessEnv): Env {
  const env = new Env(source);
  env.set(ENV_LOG_LEVEL, { cast: "string" });
  env.set(ENV_LOG_STRATEGY, { cast: "string", defaultValue: "pretty" });
  // Kept as text so a malformed value is reported instead of defaulted.
  env.set(ENV_MAX_DEPTH, { cast: "string", defaultValue: DEFAULT_MAX_DEPTH });
  return env;
}

/**
 * Reads the logging settings only, so a bad max depth never breaks logging.
 */
export function readLogConfig(
  source: NodeJS.ProcessEnv = process.env,
): ILogConfig {
  const env = loadEnv(source);
  return {
    logLevel: parseSetting(
      ENV_LOG_LEVEL,
      logLevelSchema,
      env.get(ENV_LOG_LEVEL) ?? null,
    ),
    logStrategy: parseSetting(
      ENV_LOG_STRATEGY,
      logStrategySchema,
      env.get(ENV_LOG_STRATEGY),
    ),
  };
}

export function readMaxDepth(source: NodeJS.ProcessEnv = process.env): number {
  return parseSetting(
    ENV_MAX_DEPTH,
    z.coerce.number().pipe(maxDepthSchema),
    loadEnv(source).get(ENV_MAX_DEPTH),
  );
}

/**
 * Reads the library settings from environment variables.
 */
export function readConfig(
  source: NodeJS.ProcessEnv = process.env,
): IFieldmapConfig {
  return { ...readLogConfig(source), maxDepth: readMaxDepth(source) };
}

// Each part is read on first use; a new object marks a change.
let activeLogConfig: ILogConfig | undefined;
let activeMaxDepth: number | undefined;

export function getLogConfig(): ILogConfig {
  activeLogConfig ??= readLogConfig();
  return activeLogConfig;
}

export function getMaxDepth(): number {
  activeMaxDepth ??= readMaxDepth();
  return activeMaxDepth;
}

export function getConfig(): IFieldmapConfig {
  return { ...getLogConfig(), maxDepth: getMaxDepth() };
}

/**
 * Overrides parts of the active configuration. Mostly useful in tests.
 */
export function setConfig(patch: Partial<IFieldmapConfig>): void {
  if (patch.maxDepth !== undefined) {
    activeMaxDepth = parseSetting("maxDepth", maxDepthSchema, patch.maxDepth);
  }
  if (patch.logLevel !== undefined || patch.logStrategy !== undefined) {
    const current = getLogConfig();
    activeLogConfig = {
      logLevel: patch.logLevel !== undefined ? patch.logLevel : current.logLevel,
      logStrategy: patch.logStrategy ?? current.logStrategy,
    };
  }
}

export function resetConfig(): void {
  activeLogConfig = undefined;
  activeMaxDepth = undefined;
}
