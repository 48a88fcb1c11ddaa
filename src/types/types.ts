export type IPv4Octets = readonly [number, number, number, number];
export type IPv6Groups = readonly [
  number,
  number,
  number,
  number,
  number,
  number,
  number,
  number,
];

export interface IPv4Address {
  family: "IPv4";
  octets: IPv4Octets;
}

export interface IPv6Address {
  family: "IPv6";
  groups: IPv6Groups;
}

export type RawAddress = IPv4Address | IPv6Address;

export type InterfaceFlag =
  | "up"
  | "running"
  | "loopback"
  | "broadcast"
  | "multicast"
  | "pointtopoint";

export type InterfaceFlags = readonly InterfaceFlag[];

export interface InterfaceRecord {
  name: string;
  /**
   * Absent when the platform reports no address for the interface.
   */
  address?: RawAddress;
  flags: InterfaceFlags;
}

/**
 * Dotted-decimal for IPv4 ("192.0.2.1"), bracketed colon-hex for IPv6 ("[2001:db8::1]").
 */
export type FormattedAddress = string;

export type HostAddrLogger = (message: string) => void;

/**
 * Platform boundary: interface listing and per-interface lookup.
 */
export interface InterfaceEnumerator {
  listInterfaces(): string[];
  /**
   * Throws when the interface disappeared after it was listed.
   */
  getInterface(name: string): InterfaceRecord;
}

export interface HostAddrResolverOptions {
  enumerator?: InterfaceEnumerator;
  logger?: HostAddrLogger;
  /**
   * Returned when no interface is usable. Never passed through the filter.
   */
  fallbackAddress?: FormattedAddress;
}

export type SkipReason = "no-address" | "down" | "loopback-address";

/**
 * Converts eight IPv6 groups into the platform's canonical text form.
 */
export type IPv6TextFormatter = (groups: IPv6Groups) => string;
