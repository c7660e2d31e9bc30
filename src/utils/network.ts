/**
 * @module utils/network
 * @fileoverview Name resolution: the crawl preflight and the private-address
 * guard every outbound request passes.
 *
 * ## Preflight
 *
 * Individual fetch failures are never fatal: the fetch chain absorbs them.
 * The one condition no strategy can route around is a host whose resolver is
 * gone entirely. Before a crawl starts, {@link assertResolverAvailable} looks
 * up every seed hostname and throws {@link NetworkUnavailableError} when ALL
 * of them fail with a resolver-level error code.
 *
 * A hostname that simply does not exist (`ENOTFOUND`) proves the resolver
 * answered, so it does not count as a resolver failure.
 *
 * ## Private-address guard
 *
 * The crawler fetches URLs an LLM hands it, and links those pages point at.
 * {@link validateHostname} resolves a host's A and AAAA records and throws
 * {@link SecurityError} if ANY of them is loopback, RFC 1918, link-local,
 * CGNAT or otherwise reserved, so internal services and cloud metadata
 * endpoints stay out of reach.
 *
 * | Range            | Purpose                  |
 * |------------------|--------------------------|
 * | `127.0.0.0/8`    | Loopback                 |
 * | `10.0.0.0/8`     | Private                  |
 * | `172.16.0.0/12`  | Private                  |
 * | `192.168.0.0/16` | Private                  |
 * | `169.254.0.0/16` | Link-local, metadata     |
 * | `0.0.0.0/8`      | "This" network           |
 * | `100.64.0.0/10`  | CGNAT                    |
 * | `192.0.0.0/24`   | IETF protocol assignments|
 * | `198.18.0.0/15`  | Benchmarking             |
 * | `::1`, `::`      | IPv6 loopback, unspecified |
 * | `fc00::/7`       | IPv6 unique local        |
 * | `fe80::/10`      | IPv6 link-local          |
 *
 * IPv4-mapped IPv6 addresses (`::ffff:a.b.c.d`) are checked as IPv4.
 */

import dns from "node:dns/promises";
import { isIP } from "node:net";
import { NetworkUnavailableError, SecurityError } from "./errors.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Types
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Minimal lookup signature, satisfied by `dns.lookup` from `node:dns/promises`.
 * Tests pass a fake.
 */
export type HostLookup = (hostname: string) => Promise<unknown>;

/**
 * Record lookups used by {@link validateHostname}. `node:dns/promises`
 * satisfies it; tests pass fixed answers.
 */
export interface HostResolvers {
  resolve4(hostname: string): Promise<string[]>;
  resolve6(hostname: string): Promise<string[]>;
}

/** Resolves when a host may be contacted, throws {@link SecurityError} otherwise. */
export type HostValidator = (hostname: string) => Promise<void>;

/* ────────────────────────────────────────────────────────────────────────────
 * Resolver Error Classification
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Error codes that mean the resolver could not be asked, as opposed to the
 * resolver answering "no such host".
 */
const RESOLVER_DOWN_CODES: ReadonlySet<string> = new Set([
  "EAI_AGAIN",
  "ECONNREFUSED",
  "ETIMEOUT",
  "ESERVFAIL",
  "ENETUNREACH",
  "EAI_FAIL",
]);

/**
 * Read the `code` property of a system error, if there is one.
 */
export function errorCodeOf(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

/**
 * Whether an error (or the `cause` it wraps, as undici's fetch errors do)
 * means the resolver itself is unreachable.
 *
 * @example
 * ```ts
 * isResolverUnavailable(Object.assign(new Error("x"), { code: "EAI_AGAIN" })); // true
 * isResolverUnavailable(Object.assign(new Error("x"), { code: "ENOTFOUND" })); // false
 * ```
 */
export function isResolverUnavailable(error: unknown): boolean {
  const code = errorCodeOf(error);
  if (code !== undefined && RESOLVER_DOWN_CODES.has(code)) {
    return true;
  }
  if (error instanceof Error && error.cause !== undefined) {
    return isResolverUnavailable(error.cause);
  }
  return false;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Preflight
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Resolve every hostname once and throw when the resolver is unreachable for
 * all of them.
 *
 * @param hostnames - Seed hostnames (duplicates are fine).
 * @param lookup    - Resolver to use. Defaults to `dns.lookup`.
 * @throws {NetworkUnavailableError} If every lookup failed with a resolver-level code.
 */
export async function assertResolverAvailable(
  hostnames: readonly string[],
  lookup: HostLookup = (hostname) => dns.lookup(hostname),
): Promise<void> {
  const unique = [...new Set(hostnames)];
  if (unique.length === 0) {
    return;
  }

  const outcomes = await Promise.allSettled(unique.map((host) => lookup(host)));

  const downCodes: string[] = [];
  for (const outcome of outcomes) {
    if (outcome.status === "fulfilled") {
      return;
    }
    if (!isResolverUnavailable(outcome.reason)) {
      return;
    }
    downCodes.push(errorCodeOf(outcome.reason) ?? "UNKNOWN");
  }

  throw new NetworkUnavailableError(
    `DNS resolver unavailable for all ${unique.length} seed host(s): ` +
      `${unique.join(", ")} (${[...new Set(downCodes)].join(", ")})`,
  );
}

/* ────────────────────────────────────────────────────────────────────────────
 * Private Address Ranges
 * ──────────────────────────────────────────────────────────────────────────── */

interface IPv4Range {
  readonly start: number;
  readonly end: number;
}

/**
 * Dotted quad to an unsigned 32-bit integer.
 */
function ipv4ToInt(ip: string): number {
  const [a, b, c, d] = ip.split(".").map((part) => parseInt(part, 10));
  // >>> 0 keeps addresses from 128.0.0.0 up positive.
  return ((a << 24) | (b << 16) | (c << 8) | d) >>> 0;
}

function range(first: string, last: string): IPv4Range {
  return { start: ipv4ToInt(first), end: ipv4ToInt(last) };
}

const IPV4_PRIVATE_RANGES: readonly IPv4Range[] = [
  range("127.0.0.0", "127.255.255.255"),
  range("10.0.0.0", "10.255.255.255"),
  range("172.16.0.0", "172.31.255.255"),
  range("192.168.0.0", "192.168.255.255"),
  range("169.254.0.0", "169.254.255.255"),
  range("0.0.0.0", "0.255.255.255"),
  range("100.64.0.0", "100.127.255.255"),
  range("192.0.0.0", "192.0.0.255"),
  range("198.18.0.0", "198.19.255.255"),
];

function isIPv4Private(ip: string): boolean {
  const value = ipv4ToInt(ip);
  return IPV4_PRIVATE_RANGES.some((r) => value >= r.start && value <= r.end);
}

/**
 * Expand an IPv6 address to eight four-digit lowercase groups. A trailing
 * dotted quad (`::ffff:127.0.0.1`) is folded into two hex groups first.
 *
 * @example
 * ```ts
 * expandIPv6("fe80::1"); // "fe80:0000:0000:0000:0000:0000:0000:0001"
 * ```
 */
export function expandIPv6(ip: string): string {
  let address = ip.split("%")[0];

  const dotted = /(\d+\.\d+\.\d+\.\d+)$/.exec(address);
  if (dotted) {
    const value = ipv4ToInt(dotted[1]);
    const high = (value >>> 16).toString(16);
    const low = (value & 0xffff).toString(16);
    address = `${address.slice(0, dotted.index)}${high}:${low}`;
  }

  const halves = address.split("::");
  let groups: string[];
  if (halves.length === 2) {
    const left = halves[0] ? halves[0].split(":") : [];
    const right = halves[1] ? halves[1].split(":") : [];
    const missing = new Array<string>(8 - left.length - right.length).fill("0");
    groups = [...left, ...missing, ...right];
  } else {
    groups = address.split(":");
  }

  return groups.map((group) => group.padStart(4, "0").toLowerCase()).join(":");
}

function isIPv6Private(ip: string): boolean {
  const expanded = expandIPv6(ip);

  if (
    expanded === "0000:0000:0000:0000:0000:0000:0000:0001" ||
    expanded === "0000:0000:0000:0000:0000:0000:0000:0000"
  ) {
    return true;
  }

  // fc00::/7
  const prefix = expanded.slice(0, 2);
  if (prefix === "fc" || prefix === "fd") {
    return true;
  }

  // fe80::/10
  const firstGroup = parseInt(expanded.slice(0, 4), 16);
  if (firstGroup >= 0xfe80 && firstGroup <= 0xfebf) {
    return true;
  }

  if (expanded.startsWith("0000:0000:0000:0000:0000:ffff:")) {
    const [high, low] = expanded
      .slice(30)
      .split(":")
      .map((group) => parseInt(group, 16));
    return isIPv4Private(
      `${high >> 8}.${high & 0xff}.${low >> 8}.${low & 0xff}`,
    );
  }

  return false;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Private-Address Guard
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Whether an IP address (v4 or v6) is private or reserved. A colon means IPv6.
 *
 * @example
 * ```ts
 * isPrivateIP("169.254.169.254"); // true
 * isPrivateIP("::ffff:10.0.0.1"); // true
 * isPrivateIP("93.184.216.34");   // false
 * ```
 */
export function isPrivateIP(ip: string): boolean {
  return ip.includes(":") ? isIPv6Private(ip) : isIPv4Private(ip);
}

const systemResolvers: HostResolvers = {
  resolve4: (hostname) => dns.resolve4(hostname),
  resolve6: (hostname) => dns.resolve6(hostname),
};

/**
 * Check that a host may be contacted: every A and AAAA record must be a
 * public address. IP literals are checked as they are; `[::1]`-style
 * brackets from `URL.hostname` are accepted.
 *
 * @throws {SecurityError} If any address is private, or the host has none.
 */
export async function validateHostname(
  hostname: string,
  resolvers: HostResolvers = systemResolvers,
): Promise<void> {
  const host = hostname.replace(/^\[(.*)\]$/, "$1");

  let addresses: string[];
  if (isIP(host) !== 0) {
    addresses = [host];
  } else {
    // A host with only one record family is fine; a failed lookup counts as empty.
    const answers = await Promise.allSettled([
      resolvers.resolve4(host),
      resolvers.resolve6(host),
    ]);
    addresses = answers.flatMap((answer) =>
      answer.status === "fulfilled" ? answer.value : [],
    );
  }

  if (addresses.length === 0) {
    throw new SecurityError(
      `DNS resolution failed for '${host}': no A or AAAA records found`,
    );
  }

  const blocked = addresses.find((address) => isPrivateIP(address));
  if (blocked !== undefined) {
    throw new SecurityError(
      `Hostname '${host}' resolves to private IP ${blocked}; request blocked`,
    );
  }
}
