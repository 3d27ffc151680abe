import type {
  DefaultErrorType,
  IErrorDefinition,
  IErrorHelper,
  IFieldmapError,
} from "../types/error";
import { symbolError } from "../types/symbols";

export class FieldmapError<TData extends DefaultErrorType = DefaultErrorType>
  extends Error
  implements IFieldmapError<TData>
{
  constructor(
    public readonly id: string,
    public readonly data: TData,
    message: string,
  ) {
    super(message);
    this.name = id;
  }
}

export class ErrorHelper<TData extends DefaultErrorType = DefaultErrorType>
  implements IErrorHelper<TData>
{
  [symbolError] = true as const;
  constructor(private readonly definition: IErrorDefinition<TData>) {}
  get id(): string {
    return this.definition.id;
  }
  throw(data: TData): never {
    throw new FieldmapError(this.definition.id, data, this.message(data));
  }
  is(error: unknown): error is FieldmapError<TData> {
    return error instanceof FieldmapError && error.id === this.definition.id;
  }
  private message(data: TData): string {
    const { format, remediation } = this.definition;
    const base = format ? format(data) : this.definition.id;
    if (remediation === undefined) {
      return base;
    }
    const advice =
      typeof remediation === "function" ? remediation(data) : remediation;
    return `${base}\n\nRemediation: ${advice}`;
  }
}

/**
 * Create a new error helper.
 */
export function defineError<TData extends DefaultErrorType = DefaultErrorType>(
  definition: IErrorDefinition<TData>,
): ErrorHelper<TData> {
  return new ErrorHelper<TData>(definition);
}

export function isFieldmapError(error: unknown): error is FieldmapError {
  return error instanceof FieldmapError;
}
