import { LogLevel, logger } from "../platform/logger";

///////////////////////////
// Configuration
///////////////////////////

export interface BridgeConfig {
  /** Verify operand stack height around every Ref / TableView operation */
  stackChecks: boolean;
  /** Verify that a Lua state is only touched from the thread that created it */
  threadChecks: boolean;
  /** Release registry slots of Refs that were garbage collected without `release()`, and warn about them */
  trackLeaks: boolean;
  /** Minimum level of the package logger */
  logLevel: LogLevel;
}

export const DEFAULT_BRIDGE_CONFIG: BridgeConfig = {
  stackChecks: true,
  threadChecks: true,
  trackLeaks: true,
  logLevel: LogLevel.WARN,
};

let current: BridgeConfig = { ...DEFAULT_BRIDGE_CONFIG };

export function getBridgeConfig(): Readonly<BridgeConfig> {
  return current;
}

/**
 * Merge `config` into the active configuration and return the result.
 */
export function configureBridge(config: Partial<BridgeConfig>): Readonly<BridgeConfig> {
  current = { ...current, ...config };
  logger.level = current.logLevel;
  return current;
}

export function resetBridgeConfig(): Readonly<BridgeConfig> {
  return configureBridge(DEFAULT_BRIDGE_CONFIG);
}
