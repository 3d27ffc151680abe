import type { symbolError } from "./symbols";

export type DefaultErrorType = Record<string, unknown>;

export interface IErrorDefinition<
  TData extends DefaultErrorType = DefaultErrorType,
> {
  id: string;
  format?: (data: TData) => string;
  /**
   * Appended to the formatted message to explain how to fix the error.
   */
  remediation?: string | ((data: TData) => string);
}

/**
 * The error instance thrown by every helper built with `error()`.
 */
export interface IFieldmapError<TData extends DefaultErrorType = DefaultErrorType>
  extends Error {
  readonly id: string;
  readonly data: TData;
}

/**
 * Runtime helper returned by defineError()/error().build().
 * Contains helpers to throw typed errors and perform type-safe checks.
 */
export interface IErrorHelper<
  TData extends DefaultErrorType = DefaultErrorType,
> {
  /** Unique id, also used as the thrown error's name */
  id: string;
  /** Throw a typed error with the given data */
  throw(data: TData): never;
  /** Type guard for checking if an unknown error is this error */
  is(error: unknown): error is IFieldmapError<TData>;
  /** Brand symbol for runtime detection */
  [symbolError]: true;
}
