import { InvalidTargetError } from "./errors";

/**
 * IPv4 address ranges.
 *
 * A range specification is a comma separated list of tokens, each one of:
 *   - a single address        10.0.0.5
 *   - a CIDR block            10.0.0.0/24
 *   - a dash range            10.0.0.10-10.0.0.20, or 10.0.0.10-20
 *
 * Ranges are held as merged, sorted inclusive intervals of 32-bit integers.
 */

export const MAX_RESOLVED_TARGETS = 65536;

export interface AddressInterval {
  start: number;
  end: number;
}

export interface AddressRange {
  readonly spec: string;
  readonly intervals: readonly AddressInterval[];
}

const IPV4_SPACE = 2 ** 32;

export function normalizeIp(ip: string): string {
  const trimmed = ip.trim();
  if (trimmed.startsWith("::ffff:")) {
    return trimmed.slice(7);
  }
  return trimmed;
}

export function ipToNumber(ip: string): number | null {
  const parts = normalizeIp(ip).split(".");
  if (parts.length !== 4) {
    return null;
  }

  let num = 0;
  for (const part of parts) {
    if (!/^\d{1,3}$/.test(part)) {
      return null;
    }
    const n = parseInt(part, 10);
    if (n > 255) {
      return null;
    }
    num = num * 256 + n;
  }
  return num;
}

export function numberToIp(num: number): string {
  return [
    Math.floor(num / 16777216) % 256,
    Math.floor(num / 65536) % 256,
    Math.floor(num / 256) % 256,
    num % 256,
  ].join(".");
}

/**
 * Orders addresses numerically; anything that is not an IPv4 literal sorts
 * after every address, lexicographically.
 */
export function compareAddresses(a: string, b: string): number {
  const an = ipToNumber(a);
  const bn = ipToNumber(b);
  if (an !== null && bn !== null) return an - bn;
  if (an !== null) return -1;
  if (bn !== null) return 1;
  return a.localeCompare(b);
}

function parseToken(token: string, spec: string): AddressInterval {
  if (token.includes("/")) {
    const [base, bitsStr] = token.split("/");
    const baseNum = ipToNumber(base);
    if (baseNum === null || !/^\d{1,2}$/.test(bitsStr ?? "")) {
      throw new InvalidTargetError(spec, `malformed CIDR block "${token}"`);
    }
    const bits = parseInt(bitsStr, 10);
    if (bits > 32) {
      throw new InvalidTargetError(spec, `prefix length ${bits} exceeds 32`);
    }
    const size = 2 ** (32 - bits);
    const start = Math.floor(baseNum / size) * size;
    return { start, end: start + size - 1 };
  }

  if (token.includes("-")) {
    const [from, to] = token.split("-").map((part) => part.trim());
    const start = ipToNumber(from);
    if (start === null || !to) {
      throw new InvalidTargetError(spec, `malformed address range "${token}"`);
    }
    let end = ipToNumber(to);
    if (end === null && /^\d{1,3}$/.test(to)) {
      // short form: only the last octet is given
      const lastOctet = parseInt(to, 10);
      end = lastOctet <= 255 ? Math.floor(start / 256) * 256 + lastOctet : null;
    }
    if (end === null) {
      throw new InvalidTargetError(spec, `malformed address range "${token}"`);
    }
    if (end < start) {
      throw new InvalidTargetError(spec, `range "${token}" ends before it starts`);
    }
    return { start, end };
  }

  const single = ipToNumber(token);
  if (single === null) {
    throw new InvalidTargetError(spec, `"${token}" is not an IPv4 address`);
  }
  return { start: single, end: single };
}

function mergeIntervals(intervals: AddressInterval[]): AddressInterval[] {
  const sorted = [...intervals].sort((a, b) => a.start - b.start);
  const merged: AddressInterval[] = [];
  for (const interval of sorted) {
    const last = merged[merged.length - 1];
    if (last && interval.start <= last.end + 1) {
      last.end = Math.max(last.end, interval.end);
    } else {
      merged.push({ ...interval });
    }
  }
  return merged;
}

export function parseAddressRange(spec: string): AddressRange {
  const tokens = spec.split(",").map((t) => t.trim()).filter(Boolean);
  if (tokens.length === 0) {
    throw new InvalidTargetError(spec, "no addresses given");
  }
  return {
    spec,
    intervals: mergeIntervals(tokens.map((token) => parseToken(token, spec))),
  };
}

/**
 * Lenient variant for agent-declared ownership: a blank or malformed
 * declaration owns nothing.
 */
export function tryParseAddressRange(spec: string | null | undefined): AddressRange | null {
  if (!spec || !spec.trim()) return null;
  try {
    return parseAddressRange(spec);
  } catch (error) {
    if (error instanceof InvalidTargetError) return null;
    throw error;
  }
}

export function rangeSize(range: AddressRange): number {
  return range.intervals.reduce((sum, i) => sum + (i.end - i.start + 1), 0);
}

export function expandAddressRange(range: AddressRange, limit = MAX_RESOLVED_TARGETS): string[] {
  const size = rangeSize(range);
  if (size > limit) {
    throw new InvalidTargetError(range.spec, `resolves to ${size} addresses, limit is ${limit}`);
  }
  const addresses: string[] = [];
  for (const { start, end } of range.intervals) {
    for (let n = start; n <= end && n < IPV4_SPACE; n++) {
      addresses.push(numberToIp(n));
    }
  }
  return addresses;
}

/**
 * Resolves a target specification into a de-duplicated list of addresses in
 * numeric order.
 */
export function resolveTargets(spec: string, limit = MAX_RESOLVED_TARGETS): string[] {
  return expandAddressRange(parseAddressRange(spec), limit);
}

export function rangeContains(range: AddressRange, ip: string): boolean {
  const n = ipToNumber(ip);
  if (n === null) return false;
  return range.intervals.some((i) => n >= i.start && n <= i.end);
}
