import { type LuaJsFunction, lua, to_luastring } from "fengari";
import { TypeMismatchError } from "./errors";
import type { LuaState } from "./state";

/**
 * Moves values of one host type across the Lua stack.
 *
 * - `push` leaves exactly one new value on the stack.
 * - `read` never changes the stack height and throws `TypeMismatchError` when the
 *   value at `index` has the wrong shape.
 * - `read` at the top index right after `push` yields a value equal to the one pushed.
 */
export interface Converter<T> {
  /** Host type name reported in mismatch errors */
  readonly name: string;
  push(L: LuaState, value: T): void;
  read(L: LuaState, index: number): T;
}

/**
 * Host objects that know how to put their own Lua value on the stack (Refs and TableViews).
 */
export interface StackPushable {
  pushInto(L: LuaState): void;
}

export function isStackPushable(value: unknown): value is StackPushable {
  return typeof value === "object" && value !== null && "pushInto" in value && typeof value.pushInto === "function";
}

export type HostClass<T extends object> = abstract new (...args: never[]) => T;

/**
 * Converters for user-defined host classes, consulted by `pushAny`.
 */
export class ConverterRegistry {
  private readonly byClass = new Map<HostClass<object>, Converter<unknown>>();

  register<T extends object>(cls: HostClass<T>, converter: Converter<T>): void {
    if (this.byClass.has(cls)) {
      throw new Error(`ConverterRegistry.register: a converter for ${cls.name} already exists`);
    }
    this.byClass.set(cls, converter);
  }

  unregister(cls: HostClass<object>): boolean {
    return this.byClass.delete(cls);
  }

  has(cls: HostClass<object>): boolean {
    return this.byClass.has(cls);
  }

  /**
   * First registered converter whose class `value` is an instance of.
   */
  lookup(value: object): Converter<unknown> | undefined {
    for (const [cls, converter] of this.byClass) {
      if (value instanceof cls) {
        return converter;
      }
    }
    return undefined;
  }
}

export const converters = new ConverterRegistry();

const MIN_INTEGER = -0x8000_0000;
const MAX_INTEGER = 0x7fff_ffff;

/**
 * Whether `n` fits a fengari integer (32-bit).
 */
export function isLuaInteger(n: number): boolean {
  return Number.isInteger(n) && n >= MIN_INTEGER && n <= MAX_INTEGER;
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Host functions cross as raw fengari C functions: they receive the state and
 * return the number of results they pushed.
 */
function isHostFunction(value: unknown): value is LuaJsFunction {
  return typeof value === "function";
}

function describeHostValue(value: unknown): string {
  if (typeof value === "object" && value !== null) {
    return value.constructor?.name ?? "object";
  }
  return typeof value;
}

/**
 * Push any supported host value, choosing the Lua representation from its runtime type.
 * On failure nothing is left on the stack. Cyclic arrays and objects are a `TypeMismatchError`.
 */
export function pushAny(L: LuaState, value: unknown, registry: ConverterRegistry = converters): void {
  pushHostValue(L, value, registry, new Set());
}

function pushHostValue(L: LuaState, value: unknown, registry: ConverterRegistry, visiting: Set<object>): void {
  switch (typeof value) {
    case "undefined":
      lua.lua_pushnil(L);
      return;
    case "boolean":
      lua.lua_pushboolean(L, value);
      return;
    case "number":
      if (isLuaInteger(value)) {
        lua.lua_pushinteger(L, value);
      } else {
        lua.lua_pushnumber(L, value);
      }
      return;
    case "string":
      lua.lua_pushstring(L, to_luastring(value));
      return;
    case "function":
      if (isHostFunction(value)) {
        lua.lua_pushjsfunction(L, value);
        return;
      }
      break;
    case "object":
      if (value === null) {
        lua.lua_pushnil(L);
        return;
      }
      pushObject(L, value, registry, visiting);
      return;
  }
  throw new TypeMismatchError("lua value", describeHostValue(value));
}

function pushObject(L: LuaState, value: object, registry: ConverterRegistry, visiting: Set<object>): void {
  if (isStackPushable(value)) {
    value.pushInto(L);
    return;
  }
  const registered = registry.lookup(value);
  if (registered) {
    registered.push(L, value);
    return;
  }
  if (!Array.isArray(value) && !isPlainObject(value)) {
    throw new TypeMismatchError("lua value", describeHostValue(value));
  }
  if (visiting.has(value)) {
    throw new TypeMismatchError("lua value", `cyclic ${describeHostValue(value)}`);
  }

  visiting.add(value);
  const top = lua.lua_gettop(L);
  try {
    if (Array.isArray(value)) {
      lua.lua_createtable(L, value.length, 0);
      value.forEach((item: unknown, i) => {
        pushHostValue(L, item, registry, visiting);
        lua.lua_rawseti(L, -2, i + 1);
      });
    } else {
      const keys = Object.keys(value);
      lua.lua_createtable(L, 0, keys.length);
      for (const key of keys) {
        lua.lua_pushstring(L, to_luastring(key));
        pushHostValue(L, value[key], registry, visiting);
        lua.lua_rawset(L, -3);
      }
    }
  } catch (err) {
    lua.lua_settop(L, top);
    throw err;
  } finally {
    visiting.delete(value);
  }
}
