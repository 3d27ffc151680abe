import { LogPrinter } from "../models/LogPrinter";

/**
 * Runs `fn` and returns what it threw. Fails the test if nothing was thrown.
 */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected the call to throw");
}

/**
 * Redirects LogPrinter output into arrays until `restore` is called.
 */
export function captureOutput() {
  const out: string[] = [];
  const err: string[] = [];
  LogPrinter.setWriters({
    log: (line) => out.push(line),
    error: (line) => err.push(line),
  });
  return { out, err, restore: () => LogPrinter.resetWriters() };
}
