import { z } from "zod";
import { HostAddrError } from "./errors";
import { loadHostAddrConfig, loggerFromConfig } from "./config";
import { collectAddresses } from "./filter";
import { silentLogger } from "./logger";
import { NodeInterfaceEnumerator } from "./platform";
import type {
  FormattedAddress,
  HostAddrLogger,
  HostAddrResolverOptions,
  InterfaceEnumerator,
  InterfaceRecord,
} from "./types/types";

export const DEFAULT_FALLBACK_ADDRESS: FormattedAddress = "127.0.0.1";

const fallbackAddressSchema = z.string().min(1);

const resolveFallback = (value: unknown): FormattedAddress => {
  const result = fallbackAddressSchema.safeParse(value);
  if (!result.success) {
    throw new HostAddrError(
      "E_INVALID_ADDRESS",
      "fallbackAddress must be a non-empty string",
    );
  }
  return result.data;
};

/**
 * Resolves the local host's contact address(es). Holds no state between
 * calls: every query lists the interfaces again.
 */
export class HostAddressResolver {
  private readonly enumerator: InterfaceEnumerator;
  private readonly log: HostAddrLogger;
  private readonly fallbackAddress: FormattedAddress;

  constructor(options: HostAddrResolverOptions = {}) {
    this.enumerator = options.enumerator ?? new NodeInterfaceEnumerator();
    this.log = options.logger ?? silentLogger;
    this.fallbackAddress = resolveFallback(
      options.fallbackAddress ?? DEFAULT_FALLBACK_ADDRESS,
    );
  }

  /**
   * Records for every interface. A lookup failure aborts the whole query.
   */
  interfaces(): InterfaceRecord[] {
    return this.enumerator
      .listInterfaces()
      .map(name => this.enumerator.getInterface(name));
  }

  /**
   * First usable address in enumeration order, or the fallback.
   */
  oneAddress(): FormattedAddress {
    const [first] = this.usableAddresses();
    if (first !== undefined) return first;
    this.log(`no usable interface, using ${this.fallbackAddress}`);
    return this.fallbackAddress;
  }

  /**
   * Unique usable addresses in plain string order (not numeric), or just
   * the fallback.
   */
  allAddresses(): FormattedAddress[] {
    const addresses = this.usableAddresses();
    if (addresses.length === 0) {
      this.log(`no usable interface, using ${this.fallbackAddress}`);
      return [this.fallbackAddress];
    }
    return [...new Set(addresses)].sort();
  }

  private usableAddresses(): FormattedAddress[] {
    const addresses = collectAddresses(this.interfaces(), { logger: this.log });
    this.log(`found ${addresses.length} usable address(es)`);
    return addresses;
  }
}

/**
 * Creates a resolver, taking the logger from HOSTADDR_DEBUG / HOSTADDR_LOG_PREFIX
 * unless one is passed in.
 */
export function createHostAddressResolver(
  options: HostAddrResolverOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): HostAddressResolver {
  const logger = options.logger ?? loggerFromConfig(loadHostAddrConfig(env));
  return new HostAddressResolver({ ...options, logger });
}

export const oneAddress = (options?: HostAddrResolverOptions): FormattedAddress =>
  createHostAddressResolver(options).oneAddress();

export const allAddresses = (
  options?: HostAddrResolverOptions,
): FormattedAddress[] => createHostAddressResolver(options).allAddresses();
