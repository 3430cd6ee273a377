import { lauxlib, type LuaJsFunction, type LuaString, type lua_State, lua, lualib, to_jsstring, to_luastring } from "fengari";
import { logger } from "../platform/logger";
import { fatal, LuaRuntimeError } from "./errors";
import { checkThread, claimThread } from "./thread";

export type LuaState = lua_State;

export interface LuaStateOptions {
  /** Load the Lua standard libraries (default true) */
  openLibs?: boolean;
}

const closedStates = new WeakSet<LuaState>();

/**
 * Create a fengari state owned by the calling thread.
 */
export function newLuaState(options: LuaStateOptions = {}): LuaState {
  const L = lauxlib.luaL_newstate();
  if (options.openLibs ?? true) {
    lualib.luaL_openlibs(L);
  }
  claimThread(L);
  logger.debug("lua state created");
  return L;
}

/**
 * Close `L`. Refs still holding slots in it become inert: releasing them is a no-op.
 */
export function closeLuaState(L: LuaState): void {
  checkState(L);
  lua.lua_close(L);
  closedStates.add(L);
  logger.debug("lua state closed");
}

export function isLuaStateClosed(L: LuaState): boolean {
  return closedStates.has(L);
}

/**
 * Precondition for any operation touching `L`: open, and owned by this thread.
 */
export function checkState(L: LuaState): void {
  if (closedStates.has(L)) {
    fatal("operation on a closed Lua state");
  }
  checkThread(L);
}

export function stackTop(L: LuaState): number {
  return lua.lua_gettop(L);
}

/**
 * Lua type name (`"nil"`, `"table"`, ...) of the value at `index`.
 */
export function typeNameAt(L: LuaState, index: number): string {
  return decodeLuaString(lauxlib.luaL_typename(L, index));
}

/**
 * Lua strings are byte strings; invalid UTF-8 decodes to U+FFFD.
 */
export function decodeLuaString(bytes: LuaString): string {
  return to_jsstring(bytes, undefined, undefined, true);
}

/**
 * Pop the error value left by a failed call and wrap it.
 */
export function popLuaError(L: LuaState, status: number, context?: string): LuaRuntimeError {
  const message = decodeLuaString(lauxlib.luaL_tolstring(L, -1));
  lua.lua_pop(L, 2);
  return new LuaRuntimeError(context ? `${context}: ${message}` : message, status);
}

/**
 * Compile and run a chunk, discarding its results.
 */
export function execute(L: LuaState, code: string, chunkName = "chunk"): void {
  checkState(L);
  if (logger.isDebugEnabled()) {
    logger.debug(`executing ${chunkName} (${code.length} chars)`);
  }
  const status = lauxlib.luaL_loadstring(L, to_luastring(code));
  if (status !== lua.LUA_OK) {
    throw popLuaError(L, status, chunkName);
  }
  const callStatus = lua.lua_pcall(L, 0, 0, 0);
  if (callStatus !== lua.LUA_OK) {
    throw popLuaError(L, callStatus, chunkName);
  }
}

// Protected: `__tostring` may raise.
const tolstring: LuaJsFunction = (state) => {
  lauxlib.luaL_tolstring(state, 1);
  return 1;
};

/**
 * Render the value at `index` the way Lua's `tostring` does (honours `__tostring`).
 * An error raised by `__tostring` becomes a `LuaRuntimeError`; the stack is left as found.
 */
export function anyToString(L: LuaState, index: number): string {
  const target = lua.lua_absindex(L, index);
  lua.lua_pushjsfunction(L, tolstring);
  lua.lua_pushvalue(L, target);
  const status = lua.lua_pcall(L, 1, 1, 0);
  if (status !== lua.LUA_OK) {
    throw popLuaError(L, status, "tostring");
  }
  const s = lua.lua_tojsstring(L, -1) ?? "";
  lua.lua_pop(L, 1);
  return s;
}
