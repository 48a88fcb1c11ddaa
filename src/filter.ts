import { formatAddress } from "./format";
import type {
  FormattedAddress,
  HostAddrLogger,
  InterfaceFlags,
  InterfaceRecord,
  RawAddress,
  SkipReason,
} from "./types/types";

export type Usability =
  | { usable: true; address: RawAddress }
  | { usable: false; reason: SkipReason };

/**
 * True for the whole of 127.0.0.0/8 and for ::1 exactly.
 */
export const isLoopbackAddress = (address: RawAddress): boolean => {
  if (address.family === "IPv4") return address.octets[0] === 127;
  const last = address.groups[7];
  return last === 1 && address.groups.slice(0, 7).every(group => group === 0);
};

/**
 * An interface is usable when it is up and its address is not a loopback
 * address. The loopback flag is not consulted: an up interface flagged
 * loopback with a routable address is usable.
 */
export const checkUsability = (
  flags: InterfaceFlags,
  address?: RawAddress,
): Usability => {
  // Some BSDs report interfaces with no address.
  if (!address) return { usable: false, reason: "no-address" };
  if (!flags.includes("up")) return { usable: false, reason: "down" };
  if (isLoopbackAddress(address)) {
    return { usable: false, reason: "loopback-address" };
  }
  return { usable: true, address };
};

export const isUsable = (flags: InterfaceFlags, address?: RawAddress): boolean =>
  checkUsability(flags, address).usable;

export const usableAddress = (
  record: InterfaceRecord,
): FormattedAddress | undefined => {
  const result = checkUsability(record.flags, record.address);
  return result.usable ? formatAddress(result.address) : undefined;
};

export interface CollectOptions {
  logger?: HostAddrLogger;
}

/**
 * Formats every usable record, in enumeration order.
 */
export const collectAddresses = (
  records: Iterable<InterfaceRecord>,
  options: CollectOptions = {},
): FormattedAddress[] => {
  const addresses: FormattedAddress[] = [];
  for (const record of records) {
    const result = checkUsability(record.flags, record.address);
    if (result.usable) {
      addresses.push(formatAddress(result.address));
    } else {
      options.logger?.(`skip ${record.name}: ${result.reason}`);
    }
  }
  return addresses;
};
