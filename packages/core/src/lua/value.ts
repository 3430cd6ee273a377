import { lua, to_luastring } from "fengari";
import { type Converter, isLuaInteger } from "./converter";
import { Ref } from "./ref";
import type { LuaState } from "./state";
import { TableView } from "./table-view";

///////////////////////////
// Value Model
///////////////////////////

export enum LuaKind {
  Nil = "nil",
  Boolean = "boolean",
  Number = "number",
  String = "string",
  Table = "table",
  Function = "function",
  Userdata = "userdata",
  Thread = "thread",
}

export type NilValue = { t: LuaKind.Nil };
export type BooleanValue = { t: LuaKind.Boolean; v: boolean };
export type NumberValue = { t: LuaKind.Number; v: number; integer: boolean };
export type StringValue = { t: LuaKind.String; v: string };
export type TableValue = { t: LuaKind.Table; v: TableView };
export type FunctionValue = { t: LuaKind.Function; v: Ref };
export type UserdataValue = { t: LuaKind.Userdata; v: Ref }; // full and light userdata
export type ThreadValue = { t: LuaKind.Thread; v: Ref };

/**
 * Any Lua value, as seen from the host. Reference types hold a Ref the caller must release.
 */
export type LuaValue =
  | NilValue
  | BooleanValue
  | NumberValue
  | StringValue
  | TableValue
  | FunctionValue
  | UserdataValue
  | ThreadValue;

export type ReferenceValue = TableValue | FunctionValue | UserdataValue | ThreadValue;

export const NIL_VALUE: NilValue = { t: LuaKind.Nil };
export const TRUE_VALUE: BooleanValue = { t: LuaKind.Boolean, v: true };
export const FALSE_VALUE: BooleanValue = { t: LuaKind.Boolean, v: false };

export function mkBooleanValue(b: boolean): BooleanValue {
  return b ? TRUE_VALUE : FALSE_VALUE;
}
export function mkNumberValue(n: number, integer = isLuaInteger(n)): NumberValue {
  return { t: LuaKind.Number, v: n, integer };
}
export function mkStringValue(s: string): StringValue {
  return { t: LuaKind.String, v: s };
}

export function isReferenceValue(v: LuaValue): v is ReferenceValue {
  return v.t === LuaKind.Table || v.t === LuaKind.Function || v.t === LuaKind.Userdata || v.t === LuaKind.Thread;
}

/**
 * Release the Ref held by a reference value. Primitive values need no release.
 */
export function releaseValue(v: LuaValue): void {
  if (isReferenceValue(v)) {
    v.v.release();
  }
}

/**
 * Read the value at `index` without changing the stack height.
 */
export function readLuaValue(L: LuaState, index: number): LuaValue {
  switch (lua.lua_type(L, index)) {
    case lua.LUA_TNIL:
    case lua.LUA_TNONE:
      return NIL_VALUE;
    case lua.LUA_TBOOLEAN:
      return mkBooleanValue(lua.lua_toboolean(L, index));
    case lua.LUA_TNUMBER:
      return mkNumberValue(lua.lua_tonumber(L, index), lua.lua_isinteger(L, index));
    case lua.LUA_TSTRING:
      return mkStringValue(lua.lua_tojsstring(L, index) ?? "");
    case lua.LUA_TTABLE:
      lua.lua_pushvalue(L, index);
      return { t: LuaKind.Table, v: TableView.fromStack(L) };
    case lua.LUA_TFUNCTION:
      lua.lua_pushvalue(L, index);
      return { t: LuaKind.Function, v: Ref.fromStack(L) };
    case lua.LUA_TTHREAD:
      lua.lua_pushvalue(L, index);
      return { t: LuaKind.Thread, v: Ref.fromStack(L) };
    default:
      lua.lua_pushvalue(L, index);
      return { t: LuaKind.Userdata, v: Ref.fromStack(L) };
  }
}

/**
 * Push `value`; exactly one value is pushed.
 */
export function pushLuaValue(L: LuaState, value: LuaValue): void {
  switch (value.t) {
    case LuaKind.Nil:
      lua.lua_pushnil(L);
      break;
    case LuaKind.Boolean:
      lua.lua_pushboolean(L, value.v);
      break;
    case LuaKind.Number:
      if (value.integer && isLuaInteger(value.v)) {
        lua.lua_pushinteger(L, value.v);
      } else {
        lua.lua_pushnumber(L, value.v);
      }
      break;
    case LuaKind.String:
      lua.lua_pushstring(L, to_luastring(value.v));
      break;
    default:
      value.v.pushInto(L);
  }
}

/**
 * Accepts every Lua value; never throws a mismatch.
 */
export const LuaValueConverter: Converter<LuaValue> = {
  name: "any",
  push: pushLuaValue,
  read: readLuaValue,
};
