import { lua, to_luastring } from "fengari";
import { type Converter, isLuaInteger } from "./converter";
import { TypeMismatchError } from "./errors";
import { type LuaState, typeNameAt } from "./state";

function expectType(L: LuaState, index: number, luaType: number, expected: string): void {
  if (lua.lua_type(L, index) !== luaType) {
    throw new TypeMismatchError(expected, typeNameAt(L, index));
  }
}

// Leaves the stack at `top` if `fn` throws half-way through building a value.
function restoringTop<T>(L: LuaState, fn: () => T): T {
  const top = lua.lua_gettop(L);
  try {
    return fn();
  } catch (err) {
    lua.lua_settop(L, top);
    throw err;
  }
}

export const NilConverter: Converter<undefined> = {
  name: "nil",
  push(L) {
    lua.lua_pushnil(L);
  },
  read(L, index) {
    expectType(L, index, lua.LUA_TNIL, "nil");
    return undefined;
  },
};

export const BooleanConverter: Converter<boolean> = {
  name: "boolean",
  push(L, value) {
    lua.lua_pushboolean(L, value);
  },
  read(L, index) {
    expectType(L, index, lua.LUA_TBOOLEAN, "boolean");
    return lua.lua_toboolean(L, index);
  },
};

/**
 * Any Lua number. Host integers in the 32-bit range go across as Lua integers, everything else as floats.
 */
export const NumberConverter: Converter<number> = {
  name: "number",
  push(L, value) {
    if (isLuaInteger(value)) {
      lua.lua_pushinteger(L, value);
    } else {
      lua.lua_pushnumber(L, value);
    }
  },
  read(L, index) {
    expectType(L, index, lua.LUA_TNUMBER, "number");
    return lua.lua_tonumber(L, index);
  },
};

/**
 * Lua integers, and floats with an exact integral value.
 */
export const IntegerConverter: Converter<number> = {
  name: "integer",
  push(L, value) {
    if (!isLuaInteger(value)) {
      throw new TypeMismatchError("integer", `number ${value}`);
    }
    lua.lua_pushinteger(L, value);
  },
  read(L, index) {
    expectType(L, index, lua.LUA_TNUMBER, "integer");
    if (lua.lua_isinteger(L, index)) {
      return lua.lua_tointeger(L, index);
    }
    const n = lua.lua_tonumber(L, index);
    if (!Number.isInteger(n)) {
      throw new TypeMismatchError("integer", "number");
    }
    return n;
  },
};

/**
 * Lua strings only; numbers are not coerced.
 */
export const StringConverter: Converter<string> = {
  name: "string",
  push(L, value) {
    lua.lua_pushstring(L, to_luastring(value));
  },
  read(L, index) {
    expectType(L, index, lua.LUA_TSTRING, "string");
    return lua.lua_tojsstring(L, index) ?? "";
  },
};

/**
 * `undefined` on the host side, nil on the Lua side.
 */
export function optionalOf<T>(inner: Converter<T>): Converter<T | undefined> {
  return {
    name: `${inner.name}?`,
    push(L, value) {
      if (value === undefined) {
        lua.lua_pushnil(L);
      } else {
        inner.push(L, value);
      }
    },
    read(L, index) {
      return lua.lua_isnil(L, index) ? undefined : inner.read(L, index);
    },
  };
}

/**
 * Host arrays as Lua sequences (keys 1..n).
 */
export function arrayOf<T>(item: Converter<T>): Converter<T[]> {
  const name = `${item.name}[]`;
  return {
    name,
    push(L, values) {
      restoringTop(L, () => {
        lua.lua_createtable(L, values.length, 0);
        for (let i = 0; i < values.length; i++) {
          item.push(L, values[i]);
          lua.lua_rawseti(L, -2, i + 1);
        }
      });
    },
    read(L, index) {
      expectType(L, index, lua.LUA_TTABLE, name);
      const table = lua.lua_absindex(L, index);
      const n = lua.lua_rawlen(L, table);
      const result: T[] = [];
      for (let i = 1; i <= n; i++) {
        lua.lua_rawgeti(L, table, i);
        try {
          result.push(item.read(L, -1));
        } finally {
          lua.lua_pop(L, 1);
        }
      }
      return result;
    },
  };
}

/**
 * String-keyed Lua tables as host records. Reading a table with a non-string key is a mismatch.
 */
export function recordOf<T>(value: Converter<T>): Converter<Record<string, T>> {
  const name = `Record<string, ${value.name}>`;
  return {
    name,
    push(L, record) {
      restoringTop(L, () => {
        const keys = Object.keys(record);
        lua.lua_createtable(L, 0, keys.length);
        for (const key of keys) {
          lua.lua_pushstring(L, to_luastring(key));
          value.push(L, record[key]);
          lua.lua_rawset(L, -3);
        }
      });
    },
    read(L, index) {
      expectType(L, index, lua.LUA_TTABLE, name);
      const table = lua.lua_absindex(L, index);
      const result: Record<string, T> = {};
      restoringTop(L, () => {
        lua.lua_pushnil(L);
        while (lua.lua_next(L, table) !== 0) {
          if (lua.lua_type(L, -2) !== lua.LUA_TSTRING) {
            throw new TypeMismatchError("string key", typeNameAt(L, -2));
          }
          result[lua.lua_tojsstring(L, -2) ?? ""] = value.read(L, -1);
          lua.lua_pop(L, 1);
        }
      });
      return result;
    },
  };
}
