import assert from "node:assert/strict";
import { afterEach, before, beforeEach, describe, test } from "node:test";

import { lua, to_luastring } from "fengari";
import { setLogSink } from "../platform/logger";
import { IntegerConverter, StringConverter } from "./converters";
import { Ref } from "./ref";
import { closeLuaState, execute, type LuaState, newLuaState, stackTop } from "./state";
import { TableView } from "./table-view";
import {
  isReferenceValue,
  LuaKind,
  LuaValueConverter,
  mkNumberValue,
  mkStringValue,
  NIL_VALUE,
  pushLuaValue,
  readLuaValue,
  releaseValue,
  TRUE_VALUE,
} from "./value";

let L: LuaState;

before(() => {
  setLogSink(() => {});
});

beforeEach(() => {
  L = newLuaState();
});

afterEach(() => {
  closeLuaState(L);
});

describe("readLuaValue", () => {
  test("primitives", () => {
    execute(L, "b = true; i = 7; f = 0.5; s = 'str'");
    const read = (name: string) => Ref.fromGlobal(L, name).as(LuaValueConverter);
    assert.deepEqual(read("b"), TRUE_VALUE);
    assert.deepEqual(read("i"), { t: LuaKind.Number, v: 7, integer: true });
    assert.deepEqual(read("f"), { t: LuaKind.Number, v: 0.5, integer: false });
    assert.deepEqual(read("s"), { t: LuaKind.String, v: "str" });
  });

  test("nil, and an index past the top, read as nil", () => {
    lua.lua_pushnil(L);
    assert.deepEqual(readLuaValue(L, -1), NIL_VALUE);
    assert.deepEqual(readLuaValue(L, 2), NIL_VALUE);
    assert.equal(stackTop(L), 1);
    lua.lua_pop(L, 1);
  });

  test("reference kinds hold Refs and leave the stack as found", () => {
    execute(L, "t = { x = 1 }; function g() end; co = coroutine.create(g)");
    lua.lua_getglobal(L, to_luastring("t"));
    lua.lua_getglobal(L, to_luastring("g"));
    lua.lua_getglobal(L, to_luastring("co"));

    const table = readLuaValue(L, 1);
    const fn = readLuaValue(L, 2);
    const thread = readLuaValue(L, 3);
    assert.equal(stackTop(L), 3);
    lua.lua_settop(L, 0);

    assert.equal(table.t, LuaKind.Table);
    if (table.t === LuaKind.Table) {
      assert.ok(table.v instanceof TableView);
      assert.equal(table.v.readField("x").as(IntegerConverter), 1);
    }
    assert.equal(fn.t, LuaKind.Function);
    assert.equal(thread.t, LuaKind.Thread);
    assert.ok(isReferenceValue(fn));

    releaseValue(table);
    releaseValue(fn);
    releaseValue(thread);
    assert.ok(isReferenceValue(fn) && fn.v.isEmpty());
  });
});

describe("pushLuaValue", () => {
  test("numbers keep their integer flag", () => {
    pushLuaValue(L, mkNumberValue(3));
    pushLuaValue(L, mkNumberValue(3, false));
    pushLuaValue(L, mkNumberValue(2 ** 40, true));
    assert.equal(lua.lua_isinteger(L, 1), true);
    assert.equal(lua.lua_isinteger(L, 2), false);
    assert.equal(lua.lua_isinteger(L, 3), false);
    assert.equal(lua.lua_tonumber(L, 3), 2 ** 40);
    lua.lua_settop(L, 0);
  });

  test("strings and nil", () => {
    assert.equal(Ref.fromHost(L, mkStringValue("hi"), LuaValueConverter).as(StringConverter), "hi");
    assert.ok(Ref.fromHost(L, NIL_VALUE, LuaValueConverter).isEmpty());
    assert.equal(stackTop(L), 0);
  });

  test("a table read back pushes the same table", () => {
    const original = Ref.fromHost(L, {});
    const value = original.as(LuaValueConverter);
    const again = Ref.fromHost(L, value, LuaValueConverter);
    assert.ok(again.equals(original));
    releaseValue(value);
  });

  test("primitive values are not reference values", () => {
    assert.equal(isReferenceValue(NIL_VALUE), false);
    assert.equal(isReferenceValue(mkStringValue("x")), false);
    releaseValue(mkStringValue("x"));
  });
});
