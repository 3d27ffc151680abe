import type { OutputValue } from "../types/field";
import type { SerializedData } from "../types/serializer";

/**
 * Turns a serializer's output tree into wire text.
 */
export interface IEncoder {
  encode(value: OutputValue | SerializedData): string;
}

export interface JsonEncoderOptions {
  /** Whether to pretty-print JSON (for debugging) */
  pretty?: boolean;
}

export function createJsonEncoder(options: JsonEncoderOptions = {}): IEncoder {
  const indent = options.pretty ? 2 : undefined;
  return Object.freeze({
    encode(value: OutputValue | SerializedData): string {
      return JSON.stringify(value, null, indent);
    },
  });
}

export const jsonEncoder = createJsonEncoder();
