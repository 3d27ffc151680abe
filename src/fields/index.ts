import * as factories from "./factories";

export type { IFormatOptions, INestedOptions } from "./factories";
export { resolveField, resolveObject } from "./resolveField";
export { strftime, formatIsoDate, formatIsoDateTime, ISO_8601 } from "./strftime";

/**
 * Field factories: `fields.char()`, `fields.nested(userSerializer)`, ...
 */
export const fields = Object.freeze({ ...factories });
