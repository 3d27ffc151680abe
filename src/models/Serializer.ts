import { getMaxDepth, maxDepthSchema } from "../config";
import { coercionError, invalidConfigError } from "../errors";
import {
  indexPath,
  resolveObject,
  type IResolutionContext,
} from "../fields/resolveField";
import { describeValue } from "../fields/coerce";
import { getDefaultLogger } from "../logger";
import { defaultAccessor } from "../tools/getAttribute";
import type { OutputMapping } from "../types/field";
import type {
  ISerializeOptions,
  ISerializerDefinition,
  ISerializerOptions,
  SerializedData,
} from "../types/serializer";
import { assembleCollection } from "./OutputAssembler";

const EMPTY_CONTEXT = Object.freeze({});

function resolveMaxDepth(maxDepth: number | undefined): number {
  if (maxDepth === undefined) {
    return getMaxDepth();
  }
  const parsed = maxDepthSchema.safeParse(maxDepth);
  if (!parsed.success) {
    return invalidConfigError.throw({
      key: "maxDepth",
      reason: `expected a positive integer, got ${maxDepth}`,
    });
  }
  return parsed.data;
}

/**
 * Creates the resolution context, runs `body` and logs the outcome. Errors
 * are logged and rethrown unchanged.
 */
function run<TResult>(
  definition: ISerializerDefinition<unknown>,
  many: boolean,
  options: ISerializeOptions,
  body: (ctx: IResolutionContext) => TResult,
): TResult {
  const logger = (options.logger ?? getDefaultLogger()).with({
    source: "fieldmap.serializer",
    additionalContext: { definition: definition.id },
  });
  const ctx: IResolutionContext = {
    definition: definition.id,
    path: "",
    depth: 0,
    maxDepth: resolveMaxDepth(options.maxDepth),
    context: options.context ?? EMPTY_CONTEXT,
    accessor: options.accessor ?? defaultAccessor,
  };

  try {
    const result = body(ctx);
    logger.trace("Serialized", { data: { many } });
    return result;
  } catch (error) {
    logger.debug("Serialization failed", { error, data: { many } });
    throw error;
  }
}

/**
 * Serializes a single object. A null or undefined source yields null.
 */
export function serializeOne<TSource>(
  definition: ISerializerDefinition<TSource>,
  source: TSource | null | undefined,
  options: ISerializeOptions = {},
): OutputMapping | null {
  return run(definition, false, options, (ctx) =>
    source === null || source === undefined
      ? null
      : resolveObject(definition.effectiveFields, source, ctx),
  );
}

/**
 * Serializes every element, in input order. The first failure aborts the
 * whole call; its error carries the element index.
 */
export function serializeMany<TSource>(
  definition: ISerializerDefinition<TSource>,
  sources: Iterable<TSource | null | undefined>,
  options: ISerializeOptions = {},
): Array<OutputMapping | null> {
  return run(definition, true, options, (ctx) =>
    assembleCollection(sources, (item, index) =>
      item === null || item === undefined
        ? null
        : resolveObject(definition.effectiveFields, item, {
            ...ctx,
            index,
            path: indexPath(ctx.path, index),
          }),
    ),
  );
}

const isIterable = (value: unknown): value is Iterable<unknown> =>
  typeof value === "object" && value !== null && Symbol.iterator in value;

/**
 * One serialization call. `.data` is computed on first access and cached;
 * a failed evaluation is not cached.
 */
export class Serializer<TSource = unknown> {
  public readonly many: boolean;
  private readonly source: unknown;
  private result?: { value: SerializedData };

  constructor(
    definition: ISerializerDefinition<TSource>,
    source: Iterable<TSource | null | undefined>,
    options: ISerializerOptions & { many: true },
  );
  constructor(
    definition: ISerializerDefinition<TSource>,
    source: TSource | null | undefined,
    options?: ISerializerOptions & { many?: false },
  );
  constructor(
    public readonly definition: ISerializerDefinition<TSource>,
    source: unknown,
    private readonly options: ISerializerOptions = {},
  ) {
    this.source = source;
    this.many = options.many ?? false;
  }

  get data(): SerializedData {
    if (!this.result) {
      this.result = { value: this.evaluate() };
    }
    return this.result.value;
  }

  private evaluate(): SerializedData {
    const { definition, source, options } = this;
    if (!this.many) {
      return serializeOne<unknown>(definition, source, options);
    }
    if (!isIterable(source)) {
      return coercionError.throw({
        definition: definition.id,
        field: "",
        path: "",
        kind: "collection",
        reason: `many=true needs an iterable source, got ${describeValue(source)}`,
      });
    }
    return serializeMany<unknown>(definition, source, options);
  }
}
