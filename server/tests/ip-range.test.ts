import { describe, it, expect } from "vitest";
import {
  compareAddresses,
  ipToNumber,
  numberToIp,
  parseAddressRange,
  rangeContains,
  resolveTargets,
  tryParseAddressRange,
} from "../lib/ip-range";
import { InvalidTargetError } from "../lib/errors";

describe("ip-range", () => {
  describe("address conversion", () => {
    it("converts between dotted quads and integers", () => {
      expect(ipToNumber("10.0.0.1")).toBe(167772161);
      expect(ipToNumber("255.255.255.255")).toBe(4294967295);
      expect(numberToIp(167772161)).toBe("10.0.0.1");
      expect(numberToIp(4294967295)).toBe("255.255.255.255");
    });

    it("rejects malformed addresses", () => {
      expect(ipToNumber("10.0.0")).toBeNull();
      expect(ipToNumber("10.0.0.256")).toBeNull();
      expect(ipToNumber("10.0.0.a")).toBeNull();
    });

    it("accepts IPv4-mapped IPv6 notation", () => {
      expect(ipToNumber("::ffff:10.0.0.1")).toBe(167772161);
    });

    it("orders addresses numerically", () => {
      const sorted = ["10.0.0.10", "10.0.0.9", "9.255.255.255", "10.0.0.100"].sort(compareAddresses);
      expect(sorted).toEqual(["9.255.255.255", "10.0.0.9", "10.0.0.10", "10.0.0.100"]);
    });
  });

  describe("resolveTargets", () => {
    it("expands a CIDR block", () => {
      expect(resolveTargets("10.0.0.0/30")).toEqual(["10.0.0.0", "10.0.0.1", "10.0.0.2", "10.0.0.3"]);
    });

    it("aligns a CIDR base that is not on a boundary", () => {
      expect(resolveTargets("10.0.0.5/31")).toEqual(["10.0.0.4", "10.0.0.5"]);
    });

    it("expands full and short dash ranges", () => {
      expect(resolveTargets("10.0.0.250-10.0.1.1")).toEqual(["10.0.0.250", "10.0.0.251", "10.0.0.252", "10.0.0.253", "10.0.0.254", "10.0.0.255", "10.0.1.0", "10.0.1.1"]);
      expect(resolveTargets("10.0.0.3-5")).toEqual(["10.0.0.3", "10.0.0.4", "10.0.0.5"]);
    });

    it("de-duplicates and sorts comma lists", () => {
      expect(resolveTargets("10.0.0.3, 10.0.0.1,10.0.0.2-3")).toEqual(["10.0.0.1", "10.0.0.2", "10.0.0.3"]);
    });

    it("rejects bad specifications", () => {
      expect(() => resolveTargets("")).toThrow(InvalidTargetError);
      expect(() => resolveTargets("10.0.0.0/33")).toThrow(InvalidTargetError);
      expect(() => resolveTargets("10.0.0.9-10.0.0.1")).toThrow(InvalidTargetError);
      expect(() => resolveTargets("scanme.example")).toThrow(InvalidTargetError);
    });

    it("refuses target sets over the limit", () => {
      expect(() => resolveTargets("10.0.0.0/15")).toThrow(/limit is 65536/);
      expect(resolveTargets("10.0.0.0/29", 8)).toHaveLength(8);
      expect(() => resolveTargets("10.0.0.0/29", 7)).toThrow(InvalidTargetError);
    });
  });

  describe("range predicates", () => {
    it("tests membership across merged intervals", () => {
      const range = parseAddressRange("10.0.0.0/31,10.0.0.8");
      expect(range.intervals).toEqual([
        { start: 167772160, end: 167772161 },
        { start: 167772168, end: 167772168 },
      ]);
      expect(rangeContains(range, "10.0.0.1")).toBe(true);
      expect(rangeContains(range, "10.0.0.2")).toBe(false);
      expect(rangeContains(range, "10.0.0.8")).toBe(true);
      expect(rangeContains(range, "not-an-ip")).toBe(false);
    });

    it("treats blank or malformed ownership as owning nothing", () => {
      expect(tryParseAddressRange("")).toBeNull();
      expect(tryParseAddressRange("   ")).toBeNull();
      expect(tryParseAddressRange(null)).toBeNull();
      expect(tryParseAddressRange("10.0.0.0/40")).toBeNull();
      expect(tryParseAddressRange("10.0.0.0/24")?.intervals).toHaveLength(1);
    });
  });
});
