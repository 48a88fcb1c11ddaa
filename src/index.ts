export {
  HostAddressResolver,
  createHostAddressResolver,
  oneAddress,
  allAddresses,
  DEFAULT_FALLBACK_ADDRESS,
} from "./resolver";
export {
  formatAddress,
  formatAddressText,
  formatIPv4,
  formatIPv6,
} from "./format";
export {
  isUsable,
  isLoopbackAddress,
  checkUsability,
  usableAddress,
  collectAddresses,
  type Usability,
  type CollectOptions,
} from "./filter";
export {
  NodeInterfaceEnumerator,
  canonicalIPv6Text,
  toInterfaceRecord,
  type NetworkInterfacesFn,
} from "./platform";
export { parseAddress } from "./utils/netUtils";
export {
  rawAddressSchema,
  ipv4AddressSchema,
  ipv6AddressSchema,
  validateRawAddress,
} from "./schema/address";
export { HostAddrError } from "./errors";
export type { HostAddrErrorCode } from "./errors";
export { createConsoleLogger, silentLogger } from "./logger";
export {
  loadHostAddrConfig,
  loggerFromConfig,
  hostAddrEnvSchema,
  DEFAULT_HOSTADDR_CONFIG,
  type HostAddrConfig,
} from "./config";
export type {
  RawAddress,
  IPv4Address,
  IPv6Address,
  IPv4Octets,
  IPv6Groups,
  InterfaceFlag,
  InterfaceFlags,
  InterfaceRecord,
  InterfaceEnumerator,
  FormattedAddress,
  HostAddrLogger,
  HostAddrResolverOptions,
  IPv6TextFormatter,
  SkipReason,
} from "./types/types";
