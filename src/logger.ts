import type { HostAddrLogger } from "./types/types";

/**
 * Console logger; pass as `logger` to trace which interfaces were skipped and why.
 */
export const createConsoleLogger = (prefix = "hostaddr"): HostAddrLogger => {
  return (message: string) => {
    console.log(`[${prefix}] ${message}`);
  };
};

export const silentLogger: HostAddrLogger = () => undefined;
