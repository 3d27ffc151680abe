import { fields } from "./fields";
import * as errors from "./errors";

export { defineSerializer, isSerializerDefinition } from "./definers/defineSerializer";
export { defineError, isFieldmapError, FieldmapError } from "./definers/defineError";
export { serializer, serializerBuilder } from "./definers/builders/serializer";
export { errorBuilder } from "./definers/builders/error";
export type { SerializerFluentBuilder } from "./definers/builders/serializer";
export { fields };
export type { IFormatOptions, INestedOptions } from "./fields";
export { strftime, formatIsoDate, formatIsoDateTime, ISO_8601 } from "./fields";
export {
  defaultAccessor,
  getAttribute,
  hasAttribute,
  readSource,
} from "./tools/getAttribute";
export type {
  AttributeRead,
  IAttributeAccessor,
  SourceRead,
} from "./tools/getAttribute";
export {
  createJsonEncoder,
  jsonEncoder,
} from "./encoder/jsonEncoder";
export type { IEncoder, JsonEncoderOptions } from "./encoder/jsonEncoder";
export {
  getConfig,
  getLogConfig,
  getMaxDepth,
  setConfig,
  resetConfig,
  readConfig,
  DEFAULT_MAX_DEPTH,
} from "./config";
export type { IFieldmapConfig, ILogConfig } from "./config";
export { getDefaultLogger, setDefaultLogger } from "./logger";

export { errors };

export * as definitions from "./defs";
export * from "./defs";
export * from "./models";
