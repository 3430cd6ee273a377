import { lua } from "fengari";
import { getBridgeConfig } from "./config";
import { fatal } from "./errors";
import type { LuaState } from "./state";

/**
 * Records the operand stack height of `L` at construction; `verify()` fails
 * fatally when the height differs. Inert while `stackChecks` is disabled.
 */
export class StackIntegrityCheck {
  private readonly expected: number;

  constructor(
    private readonly L: LuaState,
    private readonly label: string
  ) {
    this.expected = getBridgeConfig().stackChecks ? lua.lua_gettop(L) : -1;
  }

  verify(): void {
    if (this.expected < 0) {
      return;
    }
    const actual = lua.lua_gettop(this.L);
    if (actual !== this.expected) {
      const delta = actual - this.expected;
      fatal(
        `[${this.label}] stack integrity violated: expected height ${this.expected}, found ${actual} (${delta > 0 ? "+" : ""}${delta})`
      );
    }
  }
}

/**
 * Run `fn` and verify on every exit path that it left the stack of `L` as found.
 */
export function withStackCheck<T>(L: LuaState, label: string, fn: () => T): T {
  const check = new StackIntegrityCheck(L, label);
  try {
    return fn();
  } finally {
    check.verify();
  }
}
