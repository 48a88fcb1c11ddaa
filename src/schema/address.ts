import { z } from "zod";
import { HostAddrError } from "../errors";
import type { RawAddress } from "../types/types";

const octetSchema = z.number().int().min(0).max(255);
const groupSchema = z.number().int().min(0).max(0xffff);

export const ipv4AddressSchema = z.object({
  family: z.literal("IPv4"),
  octets: z.tuple([octetSchema, octetSchema, octetSchema, octetSchema]),
});

export const ipv6AddressSchema = z.object({
  family: z.literal("IPv6"),
  groups: z.tuple([
    groupSchema,
    groupSchema,
    groupSchema,
    groupSchema,
    groupSchema,
    groupSchema,
    groupSchema,
    groupSchema,
  ]),
});

export const rawAddressSchema = z.discriminatedUnion("family", [
  ipv4AddressSchema,
  ipv6AddressSchema,
]);

/**
 * Checks an untrusted value against {@link rawAddressSchema}.
 * Throws `E_INVALID_ADDRESS` listing every failing component.
 */
export const validateRawAddress = (value: unknown): RawAddress => {
  const result = rawAddressSchema.safeParse(value);
  if (!result.success) {
    const detail = result.error.issues
      .map(issue => `${issue.path.join(".") || "address"}: ${issue.message}`)
      .join("; ");
    throw new HostAddrError("E_INVALID_ADDRESS", `Invalid address (${detail})`);
  }
  return result.data;
};
