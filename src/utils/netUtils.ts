import net from "node:net";
import { HostAddrError } from "../errors";
import { validateRawAddress } from "../schema/address";
import type { RawAddress } from "../types/types";

const parseHexGroups = (part: string): number[] =>
  part === "" ? [] : part.split(":").map(group => parseInt(group, 16));

// "::ffff:192.0.2.1" -> "::ffff:c000:201"
const foldIPv4Tail = (text: string): string => {
  const lastColon = text.lastIndexOf(":");
  const tail = text.slice(lastColon + 1);
  if (!tail.includes(".")) return text;
  const [a, b, c, d] = tail.split(".").map(Number);
  const high = ((a << 8) | b).toString(16);
  const low = ((c << 8) | d).toString(16);
  return `${text.slice(0, lastColon + 1)}${high}:${low}`;
};

const expandIPv6 = (text: string): number[] => {
  const folded = foldIPv4Tail(text);
  const gap = folded.indexOf("::");
  if (gap === -1) return parseHexGroups(folded);
  const left = parseHexGroups(folded.slice(0, gap));
  const right = parseHexGroups(folded.slice(gap + 2));
  const zeros = new Array<number>(8 - left.length - right.length).fill(0);
  return [...left, ...zeros, ...right];
};

/**
 * Parses an IPv4 or IPv6 address string into a RawAddress. A zone suffix
 * ("fe80::1%eth0") is dropped.
 */
export const parseAddress = (text: string): RawAddress => {
  const [address] = text.trim().split("%");
  switch (net.isIP(address)) {
    case 4:
      return validateRawAddress({
        family: "IPv4",
        octets: address.split(".").map(Number),
      });
    case 6:
      return validateRawAddress({
        family: "IPv6",
        groups: expandIPv6(address),
      });
    default:
      throw new HostAddrError(
        "E_INVALID_ADDRESS",
        `Not an IPv4 or IPv6 address: "${text}"`,
      );
  }
};
