import { lauxlib, lua, to_luastring } from "fengari";
import { logger } from "../platform/logger";
import { getBridgeConfig } from "./config";
import { type Converter, pushAny, type StackPushable } from "./converter";
import { bridgeAssert, fatal, TypeMismatchError } from "./errors";
import { withStackCheck } from "./stack-check";
import { anyToString, checkState, isLuaStateClosed, type LuaState, typeNameAt } from "./state";

/** Slot value of an empty Ref. Equal to LUA_REFNIL, so nil and "no value" share one representation. */
export const EMPTY_SLOT = -1;

type Registration = { L: LuaState; slot: number };

// Slots of Refs that become unreachable without release() are returned to the registry here.
const leaks = new FinalizationRegistry<Registration>(({ L, slot }) => {
  if (isLuaStateClosed(L)) {
    return;
  }
  if (logger.isWarnEnabled()) {
    lua.lua_rawgeti(L, lua.LUA_REGISTRYINDEX, slot);
    const kind = typeNameAt(L, -1);
    lua.lua_pop(L, 1);
    logger.warn(`Ref to a ${kind} in registry slot ${slot} was garbage collected without release()`);
  }
  lauxlib.luaL_unref(L, lua.LUA_REGISTRYINDEX, slot);
});

/**
 * Pops the top value into a fresh registry slot. Nil is popped but not registered.
 */
function incRef(L: LuaState): number {
  if (lua.lua_isnil(L, -1)) {
    lua.lua_pop(L, 1);
    return EMPTY_SLOT;
  }
  return lauxlib.luaL_ref(L, lua.LUA_REGISTRYINDEX);
}

/**
 * A host-side handle to one Lua value, pinned in the registry of its state.
 *
 * Each non-empty Ref owns exactly one registry slot. Copies (`clone`, `assign`)
 * register the value again under a new slot; moves (`move`, `moveFrom`) hand the
 * slot over and leave the source empty. `release()` gives the slot back.
 *
 * ```ts
 * const t = Ref.fromHost(L, { answer: 42 });
 * const copy = t.clone();
 * t.release();
 * copy.debugString(); // "table: 0x..."
 * ```
 */
export class Ref implements StackPushable {
  protected L: LuaState | undefined = undefined;
  protected slot = EMPTY_SLOT;

  static empty(): Ref {
    return new Ref();
  }

  /**
   * Capture the value on top of the stack and pop it. A nil on top yields an empty Ref.
   */
  static fromStack(L: LuaState): Ref {
    const ref = new Ref();
    ref.capture(L);
    return ref;
  }

  /**
   * Push `value` (through `converter`, or `pushAny` without one) and capture it.
   */
  static fromHost<T>(L: LuaState, value: T, converter?: Converter<T>): Ref {
    checkState(L);
    return withStackCheck(L, "Ref.fromHost", () => {
      if (converter) {
        converter.push(L, value);
      } else {
        pushAny(L, value);
      }
      return Ref.fromStack(L);
    });
  }

  /**
   * Capture the global variable `name`.
   */
  static fromGlobal(L: LuaState, name: string): Ref {
    checkState(L);
    return withStackCheck(L, "Ref.fromGlobal", () => {
      lua.lua_getglobal(L, to_luastring(name));
      return Ref.fromStack(L);
    });
  }

  /**
   * Run `fn` with `ref` and release it afterwards, whether `fn` returns or throws.
   */
  static scoped<R extends Ref, T>(ref: R, fn: (ref: R) => T): T {
    try {
      return fn(ref);
    } finally {
      ref.release();
    }
  }

  protected capture(L: LuaState): void {
    checkState(L);
    bridgeAssert(lua.lua_gettop(L) > 0, "Ref.fromStack with an empty stack");
    this.L = L;
    this.slot = incRef(L);
    this.track();
  }

  /** The state this Ref was captured from, if any. */
  get lua(): LuaState | undefined {
    return this.L;
  }

  /** Registry slot held by this Ref, `EMPTY_SLOT` when empty. */
  get registrySlot(): number {
    return this.slot;
  }

  isEmpty(): boolean {
    return this.slot === EMPTY_SLOT;
  }

  isPresent(): boolean {
    return this.slot !== EMPTY_SLOT;
  }

  /**
   * A new Ref with its own registration of the same value.
   */
  clone(): Ref {
    return this.copyInto(new Ref());
  }

  /**
   * Make this Ref refer to the value of `other` through a registration of its own.
   * Assigning a Ref to itself does nothing.
   */
  assign(other: Ref): this {
    if (this.L === other.L && this.slot === other.slot) {
      return this;
    }
    this.release();
    other.copyInto(this);
    return this;
  }

  /**
   * A new Ref that takes over this Ref's slot; this Ref becomes empty.
   */
  move(): Ref {
    return new Ref().moveFrom(this);
  }

  /**
   * Take over the slot of `other`, releasing the one held so far. `other` becomes empty.
   * The Lua stack is not touched.
   */
  moveFrom(other: Ref): this {
    if (other === this) {
      return this;
    }
    this.release();
    other.untrack();
    this.L = other.L;
    this.slot = other.slot;
    other.L = undefined;
    other.slot = EMPTY_SLOT;
    this.track();
    return this;
  }

  /**
   * Give the registry slot back. Safe to call more than once, and after the state was closed.
   */
  release(): void {
    if (this.slot === EMPTY_SLOT || this.L === undefined) {
      return;
    }
    const L = this.L;
    const slot = this.slot;
    this.slot = EMPTY_SLOT;
    this.untrack();
    if (isLuaStateClosed(L)) {
      return;
    }
    checkState(L);
    lauxlib.luaL_unref(L, lua.LUA_REGISTRYINDEX, slot);
  }

  /**
   * Push the referenced value. The Ref must not be empty.
   */
  pushValueToStack(): void {
    const L = this.requireValue("pushValueToStack");
    lua.lua_rawgeti(L, lua.LUA_REGISTRYINDEX, this.slot);
  }

  /**
   * Push the referenced value onto the stack of `L`, or nil when empty.
   */
  pushInto(L: LuaState): void {
    if (this.isEmpty()) {
      lua.lua_pushnil(L);
      return;
    }
    if (this.L !== L) {
      fatal("Ref pushed onto the stack of a different Lua state");
    }
    this.pushValueToStack();
  }

  /**
   * Convert the referenced value. Throws `TypeMismatchError` when the converter rejects it.
   */
  as<T>(converter: Converter<T>): T {
    const L = this.requireValue("as");
    return withStackCheck(L, "Ref.as", () => {
      this.pushValueToStack();
      try {
        return converter.read(L, -1);
      } finally {
        lua.lua_pop(L, 1);
      }
    });
  }

  /**
   * Like `as`, but `undefined` instead of a `TypeMismatchError`.
   */
  tryAs<T>(converter: Converter<T>): T | undefined {
    try {
      return this.as(converter);
    } catch (err) {
      if (err instanceof TypeMismatchError) {
        return undefined;
      }
      throw err;
    }
  }

  isCallable(): boolean {
    const L = this.requireValue("isCallable");
    return withStackCheck(L, "Ref.isCallable", () => {
      this.pushValueToStack();
      const callable = lua.lua_isfunction(L, -1);
      lua.lua_pop(L, 1);
      return callable;
    });
  }

  /**
   * Lua type name of the referenced value; `"nil"` for an empty Ref.
   */
  typeName(): string {
    if (this.isEmpty() || this.L === undefined) {
      return "nil";
    }
    const L = this.L;
    return withStackCheck(L, "Ref.typeName", () => {
      this.pushValueToStack();
      const name = typeNameAt(L, -1);
      lua.lua_pop(L, 1);
      return name;
    });
  }

  /**
   * The metatable of the referenced value, or an empty Ref when it has none.
   */
  metatable(): Ref {
    const L = this.requireValue("metatable");
    return withStackCheck(L, "Ref.metatable", () => {
      this.pushValueToStack();
      if (lua.lua_getmetatable(L, -1)) {
        const meta = Ref.fromStack(L);
        lua.lua_pop(L, 1);
        return meta;
      }
      lua.lua_pop(L, 1);
      return new Ref();
    });
  }

  /**
   * Set the metatable of the referenced value. `meta` must push a table, or nil to remove it.
   */
  setMetatable(meta: unknown): void {
    const L = this.requireValue("setMetatable");
    withStackCheck(L, "Ref.setMetatable", () => {
      this.pushValueToStack();
      try {
        pushAny(L, meta);
      } catch (err) {
        lua.lua_pop(L, 1);
        throw err;
      }
      if (!lua.lua_istable(L, -1) && !lua.lua_isnil(L, -1)) {
        const actual = typeNameAt(L, -1);
        lua.lua_pop(L, 2);
        throw new TypeMismatchError("table", actual);
      }
      lua.lua_setmetatable(L, -2);
      lua.lua_pop(L, 1);
    });
  }

  /**
   * Both Refs denote the same Lua value (raw equality). Two empty Refs are equal.
   */
  equals(other: Ref): boolean {
    if (this.isEmpty() || other.isEmpty()) {
      return this.isEmpty() && other.isEmpty();
    }
    const L = this.requireValue("equals");
    if (other.L !== L) {
      return false;
    }
    return withStackCheck(L, "Ref.equals", () => {
      this.pushValueToStack();
      other.pushValueToStack();
      const same = lua.lua_rawequal(L, -1, -2) !== 0;
      lua.lua_pop(L, 2);
      return same;
    });
  }

  /**
   * `tostring` of the referenced value, or `"nil"` (quoted) for an empty Ref.
   */
  debugString(): string {
    if (this.isEmpty() || this.L === undefined) {
      return '"nil"';
    }
    const L = this.L;
    return withStackCheck(L, "Ref.debugString", () => {
      this.pushValueToStack();
      try {
        return anyToString(L, -1);
      } finally {
        lua.lua_pop(L, 1);
      }
    });
  }

  toString(): string {
    return this.debugString();
  }

  protected copyInto<R extends Ref>(target: R): R {
    target.L = this.L;
    target.slot = EMPTY_SLOT;
    if (this.isEmpty() || this.L === undefined) {
      return target;
    }
    const L = this.L;
    withStackCheck(L, "Ref.copy", () => {
      this.pushValueToStack();
      // Known non-nil: no collapse check.
      target.slot = lauxlib.luaL_ref(L, lua.LUA_REGISTRYINDEX);
    });
    target.track();
    return target;
  }

  /**
   * The owning state, after asserting that this Ref holds a value and the state is usable.
   */
  protected requireValue(op: string): LuaState {
    const L = this.L;
    if (L === undefined || this.slot === EMPTY_SLOT) {
      return fatal(`Ref.${op} on an empty Ref`);
    }
    checkState(L);
    return L;
  }

  private track(): void {
    if (this.L === undefined || this.slot === EMPTY_SLOT || !getBridgeConfig().trackLeaks) {
      return;
    }
    leaks.register(this, { L: this.L, slot: this.slot }, this);
  }

  private untrack(): void {
    leaks.unregister(this);
  }
}

/**
 * Converter for Ref itself: lets Refs be stored in and read back from Lua values.
 */
export const RefConverter: Converter<Ref> = {
  name: "Ref",
  push(L, ref) {
    ref.pushInto(L);
  },
  read(L, index) {
    lua.lua_pushvalue(L, index);
    return Ref.fromStack(L);
  },
};
