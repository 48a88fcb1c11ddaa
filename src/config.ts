import { z } from "zod";
import { createConsoleLogger, silentLogger } from "./logger";
import type { HostAddrLogger } from "./types/types";

const booleanFlagSchema = z
  .enum(["1", "0", "true", "false"])
  .transform(value => value === "1" || value === "true");

export const hostAddrEnvSchema = z.object({
  HOSTADDR_DEBUG: booleanFlagSchema.optional(),
  HOSTADDR_LOG_PREFIX: z.string().min(1).optional(),
});

export interface HostAddrConfig {
  debug: boolean;
  logPrefix: string;
}

export const DEFAULT_HOSTADDR_CONFIG: HostAddrConfig = {
  debug: false,
  logPrefix: "hostaddr",
};

/**
 * Reads HOSTADDR_DEBUG and HOSTADDR_LOG_PREFIX. Invalid values are reported
 * on the console and the defaults are used instead; this never throws.
 */
export const loadHostAddrConfig = (
  env: NodeJS.ProcessEnv = process.env,
): HostAddrConfig => {
  const result = hostAddrEnvSchema.safeParse(env);
  if (!result.success) {
    const names = result.error.issues.map(issue => issue.path.join("."));
    createConsoleLogger()(
      `ignoring invalid ${[...new Set(names)].join(", ")}; using defaults`,
    );
    return { ...DEFAULT_HOSTADDR_CONFIG };
  }
  return {
    debug: result.data.HOSTADDR_DEBUG ?? DEFAULT_HOSTADDR_CONFIG.debug,
    logPrefix:
      result.data.HOSTADDR_LOG_PREFIX ?? DEFAULT_HOSTADDR_CONFIG.logPrefix,
  };
};

export const loggerFromConfig = (config: HostAddrConfig): HostAddrLogger =>
  config.debug ? createConsoleLogger(config.logPrefix) : silentLogger;
