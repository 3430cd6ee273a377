// fengari ships no type declarations. Only the parts of its API used by this
// package are declared here.

declare module "fengari" {
  export type lua_State = { readonly __brand: "lua_State" };
  export type LuaString = Uint8Array;
  export type LuaJsFunction = (L: lua_State) => number;

  export function to_luastring(str: string, cache?: boolean): LuaString;
  export function to_jsstring(value: LuaString, from?: number, to?: number, replacement_char?: boolean): string;

  export namespace lua {
    export const LUA_OK: number;
    export const LUA_REGISTRYINDEX: number;

    export const LUA_TNONE: number;
    export const LUA_TNIL: number;
    export const LUA_TBOOLEAN: number;
    export const LUA_TNUMBER: number;
    export const LUA_TSTRING: number;
    export const LUA_TTABLE: number;
    export const LUA_TFUNCTION: number;
    export const LUA_TTHREAD: number;

    export function lua_close(L: lua_State): void;

    export function lua_gettop(L: lua_State): number;
    export function lua_settop(L: lua_State, idx: number): void;
    export function lua_pop(L: lua_State, n: number): void;
    export function lua_pushvalue(L: lua_State, idx: number): void;
    export function lua_absindex(L: lua_State, idx: number): number;

    export function lua_type(L: lua_State, idx: number): number;
    export function lua_isnil(L: lua_State, idx: number): boolean;
    export function lua_istable(L: lua_State, idx: number): boolean;
    export function lua_isfunction(L: lua_State, idx: number): boolean;
    export function lua_isinteger(L: lua_State, idx: number): boolean;
    export function lua_rawequal(L: lua_State, idx1: number, idx2: number): number;

    export function lua_toboolean(L: lua_State, idx: number): boolean;
    export function lua_tonumber(L: lua_State, idx: number): number;
    export function lua_tointeger(L: lua_State, idx: number): number;
    export function lua_tojsstring(L: lua_State, idx: number): string | null;

    export function lua_pushnil(L: lua_State): void;
    export function lua_pushboolean(L: lua_State, b: boolean): void;
    export function lua_pushnumber(L: lua_State, n: number): void;
    export function lua_pushinteger(L: lua_State, n: number): void;
    export function lua_pushstring(L: lua_State, s: LuaString): LuaString;
    export function lua_pushjsfunction(L: lua_State, fn: LuaJsFunction): void;
    export function lua_createtable(L: lua_State, narr: number, nrec: number): void;
    export function lua_newtable(L: lua_State): void;

    export function lua_getfield(L: lua_State, idx: number, k: LuaString): number;
    export function lua_rawget(L: lua_State, idx: number): number;
    export function lua_rawgeti(L: lua_State, idx: number, n: number): number;
    export function lua_rawset(L: lua_State, idx: number): void;
    export function lua_rawseti(L: lua_State, idx: number, n: number): void;
    export function lua_rawlen(L: lua_State, idx: number): number;
    export function lua_next(L: lua_State, idx: number): number;
    export function lua_getglobal(L: lua_State, name: LuaString): number;
    export function lua_setglobal(L: lua_State, name: LuaString): void;

    export function lua_getmetatable(L: lua_State, idx: number): boolean;
    export function lua_setmetatable(L: lua_State, idx: number): boolean;

    export function lua_pcall(L: lua_State, nargs: number, nresults: number, msgh: number): number;
  }

  export namespace lauxlib {
    export function luaL_newstate(): lua_State;
    export function luaL_ref(L: lua_State, t: number): number;
    export function luaL_unref(L: lua_State, t: number, ref: number): void;
    export function luaL_tolstring(L: lua_State, idx: number): LuaString;
    export function luaL_typename(L: lua_State, idx: number): LuaString;
    export function luaL_loadstring(L: lua_State, s: LuaString): number;
  }

  export namespace lualib {
    export function luaL_openlibs(L: lua_State): void;
  }
}
