import net from "node:net";
import os from "node:os";
import { HostAddrError } from "./errors";
import { parseAddress } from "./utils/netUtils";
import type {
  InterfaceEnumerator,
  InterfaceFlag,
  InterfaceRecord,
  IPv6Groups,
} from "./types/types";

export type NetworkInterfacesFn = () => NodeJS.Dict<os.NetworkInterfaceInfo[]>;

/**
 * Canonical IPv6 text as produced by the platform's inet_ntop
 * (zero-compressed, lowercase hex).
 */
export const canonicalIPv6Text = (groups: IPv6Groups): string => {
  const expanded = groups.map(group => group.toString(16)).join(":");
  return new net.SocketAddress({ address: expanded, family: "ipv6" }).address;
};

/**
 * Builds the record for one interface out of Node's per-interface entries.
 * Node only reports interfaces that are up and running, so both flags are
 * always set. One address is read: the first IPv4 entry.
 */
export const toInterfaceRecord = (
  name: string,
  entries: os.NetworkInterfaceInfo[],
): InterfaceRecord => {
  const flags: InterfaceFlag[] = ["up", "running"];
  if (entries.some(entry => entry.internal)) flags.push("loopback");
  const primary = entries.find(
    entry => entry.family === "IPv4" && entry.address,
  );
  if (!primary) return { name, flags };
  return { name, flags, address: parseAddress(primary.address) };
};

export class NodeInterfaceEnumerator implements InterfaceEnumerator {
  private readonly networkInterfaces: NetworkInterfacesFn;

  constructor(networkInterfaces: NetworkInterfacesFn = () => os.networkInterfaces()) {
    this.networkInterfaces = networkInterfaces;
  }

  listInterfaces(): string[] {
    return Object.keys(this.snapshot());
  }

  getInterface(name: string): InterfaceRecord {
    const entries = this.snapshot()[name];
    if (!entries) {
      throw new HostAddrError(
        "E_INTERFACE_NOT_FOUND",
        `Interface "${name}" disappeared while it was being queried`,
      );
    }
    return toInterfaceRecord(name, entries);
  }

  private snapshot(): NodeJS.Dict<os.NetworkInterfaceInfo[]> {
    try {
      return this.networkInterfaces();
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new HostAddrError(
        "E_ENUMERATION_FAILED",
        `Unable to list network interfaces: ${reason}`,
        { cause: err },
      );
    }
  }
}
