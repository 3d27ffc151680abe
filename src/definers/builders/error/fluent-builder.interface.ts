import type { DefaultErrorType, IErrorHelper } from "../../../defs";

export interface ErrorFluentBuilder<
  TData extends DefaultErrorType = DefaultErrorType,
> {
  id: string;
  build(): IErrorHelper<TData>;
  format(fn: (data: TData) => string): ErrorFluentBuilder<TData>;
  /**
   * Attach remediation advice that explains how to fix this error.
   * Appears in the error message after the main line.
   */
  remediation(
    advice: string | ((data: TData) => string),
  ): ErrorFluentBuilder<TData>;
}
