import { lua, to_luastring } from "fengari";
import { type Converter, pushAny } from "./converter";
import { bridgeAssert, TypeMismatchError } from "./errors";
import { Ref } from "./ref";
import { withStackCheck } from "./stack-check";
import { checkState, type LuaState, popLuaError, typeNameAt } from "./state";

export interface RawSetConverters<K, V> {
  key?: Converter<K>;
  value?: Converter<V>;
}

function pushWith<T>(L: LuaState, value: T, converter: Converter<T> | undefined): void {
  if (converter) {
    converter.push(L, value);
  } else {
    pushAny(L, value);
  }
}

/**
 * A Ref to a Lua table, with field access.
 *
 * Operations on a value that is not a table are lenient: reads yield an empty
 * Ref and writes do nothing. Reads go through `__index`, writes are raw.
 */
export class TableView extends Ref {
  /**
   * Adopt the slot of `ref` (which becomes empty). Without `ref` the view is empty.
   */
  constructor(ref?: Ref) {
    super();
    if (ref) {
      this.moveFrom(ref);
    }
  }

  static fromStack(L: LuaState): TableView {
    return new TableView(Ref.fromStack(L));
  }

  /**
   * Create an empty Lua table and view it.
   */
  static newTable(L: LuaState): TableView {
    checkState(L);
    lua.lua_newtable(L);
    return TableView.fromStack(L);
  }

  clone(): TableView {
    return this.copyInto(new TableView());
  }

  move(): TableView {
    return new TableView().moveFrom(this);
  }

  isTable(): boolean {
    if (this.isEmpty()) {
      return false;
    }
    const L = this.requireValue("isTable");
    return withStackCheck(L, "TableView.isTable", () => {
      this.pushValueToStack();
      const table = lua.lua_istable(L, -1);
      lua.lua_pop(L, 1);
      return table;
    });
  }

  /**
   * `t[name]`, honouring `__index`. Empty when the field is nil or this is not a table.
   * An error raised by an `__index` function becomes a `LuaRuntimeError`.
   */
  readField(name: string): Ref {
    const L = this.requireValue("readField");
    return withStackCheck(L, "TableView.readField", () => {
      this.pushValueToStack();
      if (!lua.lua_istable(L, -1)) {
        lua.lua_pop(L, 1);
        return new Ref();
      }
      const key = to_luastring(name);
      // Protected: `__index` may raise.
      lua.lua_pushjsfunction(L, (state) => {
        lua.lua_getfield(state, 1, key);
        return 1;
      });
      lua.lua_pushvalue(L, -2);
      const status = lua.lua_pcall(L, 1, 1, 0);
      if (status !== lua.LUA_OK) {
        const err = popLuaError(L, status, name);
        lua.lua_pop(L, 1);
        throw err;
      }
      const result = Ref.fromStack(L);
      lua.lua_pop(L, 1);
      return result;
    });
  }

  /**
   * `rawset(t, name, value)`. Does nothing when this is not a table.
   */
  writeField<T>(name: string, value: T, converter?: Converter<T>): void {
    this.rawSet(name, value, { value: converter });
  }

  /**
   * `rawset(t, key, value)` with a key of any convertible type. Does nothing when this is not a table.
   * A key that converts to nil is a `TypeMismatchError`.
   */
  rawSet<K, V>(key: K, value: V, converters: RawSetConverters<K, V> = {}): void {
    const L = this.requireValue("rawSet");
    withStackCheck(L, "TableView.rawSet", () => {
      this.pushValueToStack();
      if (!lua.lua_istable(L, -1)) {
        lua.lua_pop(L, 1);
        return;
      }
      try {
        pushWith(L, key, converters.key);
      } catch (err) {
        lua.lua_pop(L, 1);
        throw err;
      }
      if (lua.lua_isnil(L, -1)) {
        lua.lua_pop(L, 2);
        throw new TypeMismatchError("table key", "nil");
      }
      try {
        pushWith(L, value, converters.value);
      } catch (err) {
        lua.lua_pop(L, 2);
        throw err;
      }
      lua.lua_rawset(L, -3);
      lua.lua_pop(L, 1);
    });
  }

  /**
   * `rawget(t, key)`. Empty when the entry is nil or this is not a table.
   */
  rawGet<K>(key: K, keyConverter?: Converter<K>): Ref {
    const L = this.requireValue("rawGet");
    return withStackCheck(L, "TableView.rawGet", () => {
      this.pushValueToStack();
      if (!lua.lua_istable(L, -1)) {
        lua.lua_pop(L, 1);
        return new Ref();
      }
      try {
        pushWith(L, key, keyConverter);
      } catch (err) {
        lua.lua_pop(L, 1);
        throw err;
      }
      lua.lua_rawget(L, -2);
      const result = Ref.fromStack(L);
      lua.lua_pop(L, 1);
      return result;
    });
  }

  /**
   * Raw length (`#t` without `__len`); 0 when this is not a table.
   */
  length(): number {
    const L = this.requireValue("length");
    return withStackCheck(L, "TableView.length", () => {
      this.pushValueToStack();
      const n = lua.lua_istable(L, -1) ? lua.lua_rawlen(L, -1) : 0;
      lua.lua_pop(L, 1);
      return n;
    });
  }

  /**
   * Snapshot of all key/value pairs in `next` order. The caller owns the returned Refs.
   */
  entries(): Array<[Ref, Ref]> {
    const L = this.requireValue("entries");
    return withStackCheck(L, "TableView.entries", () => {
      const result: Array<[Ref, Ref]> = [];
      this.pushValueToStack();
      if (lua.lua_istable(L, -1)) {
        lua.lua_pushnil(L);
        while (lua.lua_next(L, -2) !== 0) {
          const value = Ref.fromStack(L);
          lua.lua_pushvalue(L, -1);
          const key = Ref.fromStack(L);
          result.push([key, value]);
        }
      }
      lua.lua_pop(L, 1);
      return result;
    });
  }

  /**
   * Accessor for `t[name]`. It is only usable while this view holds a value.
   */
  field(name: string): FieldAccessor {
    this.requireValue("field");
    return new FieldAccessor(this, name);
  }
}

/**
 * A transient `t[name]` borrowed from a TableView.
 */
export class FieldAccessor {
  constructor(
    private readonly table: TableView,
    readonly name: string
  ) {}

  get(): Ref {
    this.checkValid();
    return this.table.readField(this.name);
  }

  set<T>(value: T, converter?: Converter<T>): T {
    this.checkValid();
    this.table.writeField(this.name, value, converter);
    return value;
  }

  /**
   * Call the field with `args` if it holds a function; otherwise do nothing.
   * Results are discarded. A Lua error raised by the call becomes a `LuaRuntimeError`.
   */
  invokeNullsafe(...args: unknown[]): void {
    const fn = this.get();
    Ref.scoped(fn, () => {
      if (fn.isEmpty() || !fn.isCallable()) {
        return;
      }
      const L = this.table.lua;
      bridgeAssert(L !== undefined, `${this.name}: accessor of an empty table`);
      withStackCheck(L, "FieldAccessor.invokeNullsafe", () => {
        const top = lua.lua_gettop(L);
        fn.pushValueToStack();
        try {
          for (const arg of args) {
            pushAny(L, arg);
          }
        } catch (err) {
          lua.lua_settop(L, top);
          throw err;
        }
        const status = lua.lua_pcall(L, args.length, 0, 0);
        if (status !== lua.LUA_OK) {
          throw popLuaError(L, status, this.name);
        }
      });
    });
  }

  private checkValid(): void {
    bridgeAssert(this.table.isPresent(), `accessor for field '${this.name}' outlived its table`);
  }
}

/**
 * Converter for TableView: reading anything but a table is a mismatch.
 */
export const TableConverter: Converter<TableView> = {
  name: "table",
  push(L, table) {
    table.pushInto(L);
  },
  read(L, index) {
    if (!lua.lua_istable(L, index)) {
      throw new TypeMismatchError("table", typeNameAt(L, index));
    }
    lua.lua_pushvalue(L, index);
    return TableView.fromStack(L);
  },
};
