import { logger } from "../platform/logger";

/**
 * A broken bridge invariant: unbalanced stack, empty handle materialized,
 * wrong thread, closed state. Indicates a defect in the caller; not meant to be caught.
 */
export class BridgeAssertionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BridgeAssertionError";
  }
}

/**
 * The Lua value at hand cannot be converted to the requested host type.
 */
export class TypeMismatchError extends Error {
  constructor(
    public readonly expected: string,
    public readonly actual: string
  ) {
    super(`type mismatch: expected ${expected}, got ${actual}`);
    this.name = "TypeMismatchError";
  }
}

/**
 * A protected call into Lua failed. `message` carries the Lua error value rendered as a string.
 */
export class LuaRuntimeError extends Error {
  constructor(
    message: string,
    public readonly status: number
  ) {
    super(message);
    this.name = "LuaRuntimeError";
  }
}

export function fatal(message: string): never {
  logger.error(message);
  throw new BridgeAssertionError(message);
}

export function bridgeAssert(condition: boolean, message: string): asserts condition {
  if (!condition) {
    fatal(message);
  }
}
