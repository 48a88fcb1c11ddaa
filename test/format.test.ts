import { describe, expect, it, vi } from "vitest";
import fc from "fast-check";
import {
  formatAddress,
  formatAddressText,
  formatIPv4,
  formatIPv6,
} from "../src/format";
import { HostAddrError } from "../src/errors";
import { validateRawAddress } from "../src/schema/address";
import { parseAddress } from "../src/utils/netUtils";
import type { IPv6Groups } from "../src/types/types";

describe("formatAddress", () => {
  it("formats IPv4 as dotted decimal", () => {
    expect(formatAddress({ family: "IPv4", octets: [192, 0, 2, 1] })).toBe(
      "192.0.2.1",
    );
  });

  it("formats IPv6 as bracketed canonical text", () => {
    expect(
      formatAddress({
        family: "IPv6",
        groups: [8193, 1712, 5, 2439, 0, 0, 0, 1],
      }),
    ).toBe("[2001:6b0:5:987::1]");
  });

  it("writes IPv4 octets without leading zeros", () => {
    expect(formatIPv4([10, 0, 0, 7])).toBe("10.0.0.7");
  });

  it("rejects out-of-range components", () => {
    expect(() =>
      formatAddress({ family: "IPv4", octets: [256, 0, 2, 1] }),
    ).toThrow(HostAddrError);
    expect(() =>
      formatAddress({ family: "IPv6", groups: [0x10000, 0, 0, 0, 0, 0, 0, 1] }),
    ).toThrow(HostAddrError);
  });

  it("rejects non-integer components", () => {
    try {
      formatAddress({ family: "IPv4", octets: [192, 0.5, 2, 1] });
      expect.unreachable("formatAddress should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(HostAddrError);
      expect(err).toHaveProperty("code", "E_INVALID_ADDRESS");
    }
  });

  it("always joins IPv4 octets with dots", () => {
    const octet = fc.integer({ min: 0, max: 255 });
    fc.assert(
      fc.property(fc.tuple(octet, octet, octet, octet), octets => {
        expect(formatAddress({ family: "IPv4", octets })).toBe(
          octets.join("."),
        );
      }),
    );
  });

  it("produces IPv6 text that parses back to the same groups", () => {
    const group = fc.oneof(fc.constant(0), fc.integer({ min: 0, max: 0xffff }));
    fc.assert(
      fc.property(
        fc.tuple(group, group, group, group, group, group, group, group),
        groups => {
          const text = formatAddress({ family: "IPv6", groups });
          expect(text.startsWith("[")).toBe(true);
          expect(text.endsWith("]")).toBe(true);
          expect(text).toBe(text.toLowerCase());
          expect(parseAddress(text.slice(1, -1))).toEqual({
            family: "IPv6",
            groups,
          });
        },
      ),
    );
  });
});

describe("formatIPv6", () => {
  it("lower-cases and brackets the platform text", () => {
    const toText = vi.fn((_groups: IPv6Groups) => "2001:DB8::A");
    const groups: IPv6Groups = [0x2001, 0xdb8, 0, 0, 0, 0, 0, 0xa];
    expect(formatIPv6(groups, toText)).toBe("[2001:db8::a]");
    expect(toText).toHaveBeenCalledWith(groups);
  });

  it("is what formatAddress uses for IPv6", () => {
    const toText = vi.fn((_groups: IPv6Groups) => "FE80::1");
    expect(
      formatAddress(
        { family: "IPv6", groups: [0xfe80, 0, 0, 0, 0, 0, 0, 1] },
        toText,
      ),
    ).toBe("[fe80::1]");
    expect(toText).toHaveBeenCalledTimes(1);
  });
});

describe("formatAddressText", () => {
  it("normalises IPv6 text", () => {
    expect(formatAddressText("2001:DB8:0:0:0:0:0:1")).toBe("[2001:db8::1]");
  });

  it("drops the zone from link-local addresses", () => {
    expect(formatAddressText("fe80::1%eth0")).toBe("[fe80::1]");
  });

  it("passes IPv4 through", () => {
    expect(formatAddressText("198.51.100.7")).toBe("198.51.100.7");
  });
});

describe("validateRawAddress", () => {
  it("rejects addresses with the wrong number of components", () => {
    expect(() =>
      validateRawAddress({ family: "IPv4", octets: [192, 0, 2] }),
    ).toThrow(HostAddrError);
    expect(() =>
      validateRawAddress({ family: "IPv4", octets: [192, 0, 2, 1, 5] }),
    ).toThrow(HostAddrError);
    expect(() =>
      validateRawAddress({ family: "IPv6", groups: [0, 0, 0, 1] }),
    ).toThrow(HostAddrError);
  });

  it("rejects an unknown family", () => {
    expect(() =>
      validateRawAddress({ family: "IPX", octets: [1, 2, 3, 4] }),
    ).toThrow(/Invalid address/);
  });

  it("returns the address unchanged when valid", () => {
    expect(
      validateRawAddress({ family: "IPv4", octets: [203, 0, 113, 9] }),
    ).toEqual({ family: "IPv4", octets: [203, 0, 113, 9] });
  });
});
