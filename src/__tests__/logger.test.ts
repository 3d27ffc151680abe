import { afterEach, beforeEach, describe, it, expect } from "@jest/globals";
import { ENV_MAX_DEPTH, resetConfig, setConfig } from "../config";
import { defineSerializer, errors, fields } from "../index";
import { getDefaultLogger, setDefaultLogger } from "../logger";
import { Logger } from "../models/Logger";
import { captureOutput, catchError } from "./test-utils";

describe("default logger", () => {
  let output: ReturnType<typeof captureOutput>;

  beforeEach(() => {
    output = captureOutput();
    setConfig({ logLevel: null, logStrategy: "plain" });
  });

  afterEach(() => {
    output.restore();
    setDefaultLogger(undefined);
    resetConfig();
  });

  it("follows log level changes made after first use", () => {
    const first = getDefaultLogger();
    defineSerializer({ id: "test.quiet", fields: { a: fields.int() } });
    expect(output.out).toEqual([]);

    setConfig({ logLevel: "debug" });
    const second = getDefaultLogger();
    defineSerializer({ id: "test.loud", fields: { a: fields.int() } });

    expect(second).not.toBe(first);
    expect(
      output.out[0].endsWith("◆ DEBUG   [fieldmap.registry] Serializer defined"),
    ).toBe(true);
  });

  it("keeps the same logger while the configuration is unchanged", () => {
    expect(getDefaultLogger()).toBe(getDefaultLogger());
  });

  it("prefers a logger set explicitly", () => {
    const custom = new Logger({ printThreshold: null, printStrategy: "plain" });
    setDefaultLogger(custom);
    setConfig({ logLevel: "trace" });

    expect(getDefaultLogger()).toBe(custom);
  });
});

describe("malformed max depth", () => {
  const saved = process.env[ENV_MAX_DEPTH];

  beforeEach(() => {
    process.env[ENV_MAX_DEPTH] = "deep";
    resetConfig();
  });

  afterEach(() => {
    if (saved === undefined) {
      delete process.env[ENV_MAX_DEPTH];
    } else {
      process.env[ENV_MAX_DEPTH] = saved;
    }
    resetConfig();
  });

  it("only fails the calls that need it", () => {
    const definition = defineSerializer({
      id: "test.depth",
      fields: { a: fields.int() },
    });

    const error = catchError(() => definition.serialize({ a: 1 }));
    if (!errors.invalidConfigError.is(error)) throw error;
    expect(error.data.key).toBe(ENV_MAX_DEPTH);
    expect(definition.serialize({ a: 1 }, { maxDepth: 5 })).toEqual({ a: 1 });
  });
});
