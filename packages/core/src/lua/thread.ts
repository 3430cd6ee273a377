import { threadId } from "node:worker_threads";
import type { lua_State } from "fengari";
import { getBridgeConfig } from "./config";
import { fatal } from "./errors";

// A Lua state is not safe to share; the first thread to claim it owns it for its lifetime.
const owners = new WeakMap<lua_State, number>();

export function claimThread(L: lua_State, owner: number = threadId): void {
  owners.set(L, owner);
}

export function ownerThreadOf(L: lua_State): number | undefined {
  return owners.get(L);
}

/**
 * Fail fatally unless the calling thread owns `L`. States that were never
 * claimed are claimed by the first thread that checks them.
 */
export function checkThread(L: lua_State): void {
  if (!getBridgeConfig().threadChecks) {
    return;
  }
  const owner = owners.get(L);
  if (owner === undefined) {
    owners.set(L, threadId);
    return;
  }
  if (owner !== threadId) {
    fatal(`Lua state owned by thread ${owner} accessed from thread ${threadId}`);
  }
}
