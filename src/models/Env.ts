export type EnvCastType = "string" | "number" | "boolean";

export type EnvValue = string | number | boolean;

export interface EnvVariableOptions {
  /** Default value returned when the environment variable is not set */
  defaultValue?: EnvValue;
  /** How should the string value coming from process.env be cast */
  cast?: EnvCastType;
}

function castValue(
  raw: string | undefined,
  cast: EnvCastType | undefined,
): EnvValue | undefined {
  if (raw === undefined || raw === "") return undefined;

  switch (cast) {
    case "number": {
      const n = Number(raw);
      return Number.isNaN(n) ? undefined : n;
    }
    case "boolean":
      return ["1", "true", "yes", "y"].includes(raw.toLowerCase());
    case "string":
    default:
      return raw;
  }
}

export class Env {
  private registry: Map<string, EnvVariableOptions> = new Map();

  constructor(private readonly source: NodeJS.ProcessEnv = process.env) {}

  /**
   * Register a new environment variable with optional metadata (default value & casting).
   */
  set(key: string, options: EnvVariableOptions) {
    this.registry.set(key, options);
  }

  /**
   * Retrieve an environment variable value applying casting & default value logic.
   */
  get(key: string): EnvValue | undefined {
    const registered = this.registry.get(key);
    const casted = castValue(this.source[key], registered?.cast);

    if (casted !== undefined) {
      return casted;
    }

    return registered?.defaultValue;
  }
}
