/**
 * Ref lifetime and conversion tests.
 *
 * Every test also checks that the operand stack is left as found.
 */

import assert from "node:assert/strict";
import { afterEach, before, beforeEach, describe, test } from "node:test";

import { lua } from "fengari";
import { setLogSink } from "../platform/logger";
import { arrayOf, BooleanConverter, IntegerConverter, NumberConverter, StringConverter } from "./converters";
import { BridgeAssertionError, LuaRuntimeError, TypeMismatchError } from "./errors";
import { EMPTY_SLOT, Ref, RefConverter } from "./ref";
import { closeLuaState, execute, type LuaState, newLuaState, stackTop } from "./state";

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

describe("Ref -- capture", () => {
  test("default Ref is empty", () => {
    const r = new Ref();
    assert.ok(r.isEmpty());
    assert.equal(r.isPresent(), false);
    assert.equal(r.registrySlot, EMPTY_SLOT);
    assert.equal(r.lua, undefined);
  });

  test("fromStack registers the top value and pops it", () => {
    lua.lua_pushinteger(L, 7);
    const r = Ref.fromStack(L);
    assert.equal(stackTop(L), 0);
    assert.ok(r.isPresent());
    assert.notEqual(r.registrySlot, EMPTY_SLOT);
    assert.equal(r.as(IntegerConverter), 7);
  });

  test("fromStack collapses nil to an empty Ref", () => {
    lua.lua_pushnil(L);
    const r = Ref.fromStack(L);
    assert.equal(stackTop(L), 0);
    assert.ok(r.isEmpty());
    assert.equal(r.isEmpty(), new Ref().isEmpty());
  });

  test("fromStack on an empty stack is fatal", () => {
    assert.throws(() => Ref.fromStack(L), BridgeAssertionError);
  });

  test("fromHost of undefined is empty", () => {
    assert.ok(Ref.fromHost(L, undefined).isEmpty());
    assert.equal(stackTop(L), 0);
  });

  test("fromGlobal captures a global variable", () => {
    execute(L, "answer = 42");
    assert.equal(Ref.fromGlobal(L, "answer").as(IntegerConverter), 42);
    assert.ok(Ref.fromGlobal(L, "missing").isEmpty());
    assert.equal(stackTop(L), 0);
  });
});

describe("Ref -- round-trips", () => {
  test("string", () => {
    assert.equal(Ref.fromHost(L, "hello", StringConverter).as(StringConverter), "hello");
  });

  test("integer and float numbers", () => {
    assert.equal(Ref.fromHost(L, 42, NumberConverter).as(NumberConverter), 42);
    assert.equal(Ref.fromHost(L, 1.5, NumberConverter).as(NumberConverter), 1.5);
  });

  test("boolean", () => {
    assert.equal(Ref.fromHost(L, false, BooleanConverter).as(BooleanConverter), false);
  });

  test("array", () => {
    const conv = arrayOf(NumberConverter);
    assert.deepEqual(Ref.fromHost(L, [1, 2.5, 3], conv).as(conv), [1, 2.5, 3]);
    assert.equal(stackTop(L), 0);
  });
});

describe("Ref -- conversion failures", () => {
  test("as throws a type mismatch naming both kinds", () => {
    const r = Ref.fromHost(L, 5);
    assert.throws(
      () => r.as(StringConverter),
      (err: unknown) => err instanceof TypeMismatchError && err.expected === "string" && err.actual === "number"
    );
    assert.equal(stackTop(L), 0);
  });

  test("tryAs returns undefined on mismatch", () => {
    const r = Ref.fromHost(L, 5);
    assert.equal(r.tryAs(StringConverter), undefined);
    assert.equal(r.tryAs(IntegerConverter), 5);
    assert.equal(stackTop(L), 0);
  });

  test("a converter failing half-way still leaves the stack balanced", () => {
    const r = Ref.fromHost(L, [1, "two", 3]);
    assert.throws(() => r.as(arrayOf(NumberConverter)), TypeMismatchError);
    assert.equal(stackTop(L), 0);
  });

  test("as on an empty Ref is fatal", () => {
    assert.throws(() => new Ref().as(StringConverter), BridgeAssertionError);
  });

  test("pushValueToStack on an empty Ref is fatal", () => {
    assert.throws(() => new Ref().pushValueToStack(), BridgeAssertionError);
    assert.equal(stackTop(L), 0);
  });
});

describe("Ref -- copy and move", () => {
  test("clone holds an independent registration", () => {
    const a = Ref.fromHost(L, "first");
    const b = a.clone();
    assert.notEqual(b.registrySlot, a.registrySlot);

    a.assign(Ref.fromHost(L, "second"));
    assert.equal(a.as(StringConverter), "second");
    assert.equal(b.as(StringConverter), "first");
    assert.equal(stackTop(L), 0);
  });

  test("releasing the original keeps the clone alive", () => {
    const a = Ref.fromHost(L, { k: 1 });
    const b = a.clone();
    a.release();
    assert.ok(a.isEmpty());
    assert.equal(b.typeName(), "table");
  });

  test("clone of an empty Ref is empty", () => {
    assert.ok(new Ref().clone().isEmpty());
  });

  test("self-assignment keeps the registration", () => {
    const a = Ref.fromHost(L, "same");
    const slot = a.registrySlot;
    a.assign(a);
    assert.equal(a.registrySlot, slot);
    assert.equal(a.as(StringConverter), "same");
  });

  test("assigning an empty Ref empties the target", () => {
    const a = Ref.fromHost(L, 1);
    a.assign(new Ref());
    assert.ok(a.isEmpty());
  });

  test("move hands the slot over and empties the source", () => {
    const a = Ref.fromHost(L, "moved");
    const slot = a.registrySlot;
    const b = a.move();
    assert.ok(a.isEmpty());
    assert.equal(a.lua, undefined);
    assert.equal(b.registrySlot, slot);
    assert.equal(b.as(StringConverter), "moved");
  });

  test("moveFrom releases the previous value of the target", () => {
    const a = Ref.fromHost(L, "a");
    const b = Ref.fromHost(L, "b");
    b.moveFrom(a);
    assert.ok(a.isEmpty());
    assert.equal(b.as(StringConverter), "a");
  });

  test("release is idempotent", () => {
    const a = Ref.fromHost(L, 1);
    a.release();
    a.release();
    assert.ok(a.isEmpty());
  });

  test("scoped releases after the callback returns or throws", () => {
    const a = Ref.fromHost(L, 3);
    assert.equal(Ref.scoped(a, (r) => r.as(IntegerConverter)), 3);
    assert.ok(a.isEmpty());

    const b = Ref.fromHost(L, 4);
    assert.throws(() =>
      Ref.scoped(b, () => {
        throw new Error("inside");
      })
    );
    assert.ok(b.isEmpty());
  });
});

describe("Ref -- inspection", () => {
  test("isCallable", () => {
    execute(L, "function f() end");
    assert.equal(Ref.fromGlobal(L, "f").isCallable(), true);
    assert.equal(Ref.fromHost(L, "f").isCallable(), false);
    assert.equal(stackTop(L), 0);
  });

  test("typeName", () => {
    assert.equal(Ref.fromHost(L, "s").typeName(), "string");
    assert.equal(Ref.fromHost(L, [1]).typeName(), "table");
    assert.equal(new Ref().typeName(), "nil");
  });

  test("debugString", () => {
    assert.equal(new Ref().debugString(), '"nil"');
    assert.equal(Ref.fromHost(L, 42).debugString(), "42");
    assert.equal(Ref.fromHost(L, 1.5).debugString(), "1.5");
    assert.equal(Ref.fromHost(L, true).debugString(), "true");
    assert.equal(Ref.fromHost(L, "text").debugString(), "text");
    assert.match(Ref.fromHost(L, {}).debugString(), /^table: /);
    assert.equal(stackTop(L), 0);
  });

  test("debugString honours __tostring", () => {
    execute(L, "obj = setmetatable({}, { __tostring = function() return 'custom' end })");
    assert.equal(Ref.fromGlobal(L, "obj").debugString(), "custom");
  });

  test("debugString of a string that is not valid UTF-8", () => {
    execute(L, 's = "\\255\\254"');
    assert.equal(Ref.fromGlobal(L, "s").debugString().includes("\uFFFD"), true);
    assert.equal(stackTop(L), 0);
  });

  test("an error raised by __tostring becomes a LuaRuntimeError", () => {
    execute(L, "obj = setmetatable({}, { __tostring = function() error('no text') end })");
    assert.throws(
      () => Ref.fromGlobal(L, "obj").debugString(),
      (err: unknown) => err instanceof LuaRuntimeError && /^tostring: .*no text$/.test(err.message)
    );
    assert.equal(stackTop(L), 0);
  });

  test("equals compares Lua identity", () => {
    const a = Ref.fromHost(L, {});
    const b = a.clone();
    const c = Ref.fromHost(L, {});
    assert.equal(typeof a.equals(b), "boolean");
    assert.equal(a.equals(b), true);
    assert.equal(a.equals(c), false);
    assert.equal(new Ref().equals(new Ref()), true);
    assert.equal(a.equals(new Ref()), false);
    assert.equal(stackTop(L), 0);
  });
});

describe("Ref -- metatables", () => {
  test("setMetatable then metatable yields the same table", () => {
    const t = Ref.fromHost(L, {});
    const m = Ref.fromHost(L, { __index: { x: 1 } });
    t.setMetatable(m);
    const got = t.metatable();
    assert.equal(got.debugString(), m.debugString());
    assert.ok(got.equals(m));
    assert.equal(stackTop(L), 0);
  });

  test("metatable of a plain table is empty", () => {
    assert.ok(Ref.fromHost(L, {}).metatable().isEmpty());
  });

  test("setting an empty Ref removes the metatable", () => {
    const t = Ref.fromHost(L, {});
    t.setMetatable(Ref.fromHost(L, {}));
    t.setMetatable(new Ref());
    assert.ok(t.metatable().isEmpty());
  });

  test("a non-table metatable is rejected without touching the stack", () => {
    const t = Ref.fromHost(L, {});
    assert.throws(() => t.setMetatable(5), TypeMismatchError);
    assert.equal(stackTop(L), 0);
    assert.ok(t.metatable().isEmpty());
  });
});

describe("RefConverter", () => {
  test("read captures a copy of the value at the index", () => {
    const original = Ref.fromHost(L, {});
    original.pushValueToStack();
    const read = RefConverter.read(L, -1);
    lua.lua_pop(L, 1);
    assert.ok(read.equals(original));
    assert.notEqual(read.registrySlot, original.registrySlot);
  });

  test("an empty Ref pushes nil", () => {
    RefConverter.push(L, new Ref());
    assert.equal(lua.lua_isnil(L, -1), true);
    lua.lua_pop(L, 1);
  });

  test("pushing onto another state is fatal", () => {
    const other = newLuaState();
    const r = Ref.fromHost(L, 1);
    assert.throws(() => RefConverter.push(other, r), BridgeAssertionError);
    assert.equal(stackTop(other), 0);
    closeLuaState(other);
  });
});
