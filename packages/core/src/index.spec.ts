import assert from "node:assert/strict";
import { test } from "node:test";

import { closeLuaState, execute, newLuaState, Ref, setLogSink, TableView, lua } from "./index";

test("public entry point", () => {
  setLogSink(() => {});
  const L = newLuaState();
  execute(L, "config = { name = 'demo', retries = 3 }");
  const config = new TableView(Ref.fromGlobal(L, "config"));
  assert.equal(config.readField("name").as(lua.StringConverter), "demo");
  config.field("retries").set(4);
  execute(L, "assert(config.retries == 4)");
  config.release();
  closeLuaState(L);
});
