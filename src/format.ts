import { canonicalIPv6Text } from "./platform";
import { validateRawAddress } from "./schema/address";
import { parseAddress } from "./utils/netUtils";
import type {
  FormattedAddress,
  IPv4Octets,
  IPv6Groups,
  IPv6TextFormatter,
  RawAddress,
} from "./types/types";

export const formatIPv4 = (octets: IPv4Octets): FormattedAddress =>
  octets.map(octet => octet.toString(10)).join(".");

/**
 * The text conversion itself belongs to the platform; this only lower-cases
 * and brackets its output.
 */
export const formatIPv6 = (
  groups: IPv6Groups,
  toText: IPv6TextFormatter = canonicalIPv6Text,
): FormattedAddress => `[${toText(groups).toLowerCase()}]`;

/**
 * Formats a raw address for use as a contact address.
 *
 * @throws HostAddrError `E_INVALID_ADDRESS` when the value is not a valid
 * IPv4 or IPv6 address.
 */
export const formatAddress = (
  address: RawAddress,
  toText?: IPv6TextFormatter,
): FormattedAddress => {
  const valid = validateRawAddress(address);
  return valid.family === "IPv4"
    ? formatIPv4(valid.octets)
    : formatIPv6(valid.groups, toText);
};

export const formatAddressText = (text: string): FormattedAddress =>
  formatAddress(parseAddress(text));
