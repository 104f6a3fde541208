/**
 * Client identity resolution
 *
 * Every throttle, lockout and ban is keyed by the identity resolved here, so
 * the limiter, the brute-force guard and the session monitor must share one
 * resolver instance.
 */

import net from "node:net";

export type HeaderValue = string | string[] | undefined;

/**
 * The request metadata the guard needs. Header names are lower-case.
 */
export interface ClientRequest {
  headers: Record<string, HeaderValue>;
  remoteAddress?: string;
  /** Authenticated user, if the platform has one for this request */
  userId?: string;
  /** Platform session token of the current request */
  sessionToken?: string;
  /** Per-request memo shared by every guard call on the same request */
  lifecycle?: RequestLifecycle;
  path?: string;
}

export interface RequestLifecycle {
  /** Identities a ban check has already confirmed as banned during this request */
  confirmedBans: Set<string>;
}

export function createRequestLifecycle(): RequestLifecycle {
  return { confirmedBans: new Set() };
}

export const LOOPBACK_IDENTITY = "127.0.0.1";

/**
 * Header priority, most trusted first. The direct connection address is
 * always consulted last.
 */
export const DEFAULT_IP_HEADERS: readonly string[] = [
  "cf-connecting-ip",
  "client-ip",
  "x-forwarded-for",
  "x-forwarded",
  "forwarded-for",
  "forwarded",
];

const PRIVATE_RANGES = ["10.0.0.0/8", "172.16.0.0/12", "192.168.0.0/16", "fc00::/7"];

const RESERVED_RANGES = [
  "0.0.0.0/8",
  "127.0.0.0/8",
  "169.254.0.0/16",
  "240.0.0.0/4",
  "::/128",
  "::1/128",
  "::ffff:0:0/96",
  "fe80::/10",
];

type Family = "ipv4" | "ipv6";

// One list per family: an ipv6 rule such as ::ffff:0:0/96 also matches plain
// IPv4 addresses when both share a BlockList
const NON_PUBLIC: Record<Family, net.BlockList> = { ipv4: new net.BlockList(), ipv6: new net.BlockList() };
for (const cidr of [...PRIVATE_RANGES, ...RESERVED_RANGES]) {
  const [prefix, bits] = cidr.split("/");
  const family: Family = net.isIPv6(prefix) ? "ipv6" : "ipv4";
  NON_PUBLIC[family].addSubnet(prefix, Number(bits), family);
}

const IPV4_MAPPED = /^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/i;

/**
 * Syntactic check only: dotted-quad IPv4 or IPv6
 */
export function isValidIp(value: string): boolean {
  return net.isIP(value) !== 0;
}

/**
 * Valid address outside every private and reserved range
 */
export function isPublicIp(value: string): boolean {
  const version = net.isIP(value);
  if (version === 0) return false;
  const family: Family = version === 6 ? "ipv6" : "ipv4";
  return !NON_PUBLIC[family].check(value, family);
}

/**
 * Report IPv4-mapped IPv6 addresses (`::ffff:1.2.3.4`) in dotted form
 */
export function normalizeAddress(value: string): string {
  const mapped = IPV4_MAPPED.exec(value);
  if (mapped && net.isIPv4(mapped[1])) {
    return mapped[1];
  }
  return value;
}

function firstHeaderValue(value: HeaderValue): string | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  if (!raw) return undefined;
  const first = raw.includes(",") ? raw.split(",")[0] : raw;
  const trimmed = first.trim();
  return trimmed || undefined;
}

export function headerString(request: ClientRequest, name: string): string {
  const value = request.headers[name];
  return (Array.isArray(value) ? value[0] : value) ?? "";
}

export class ClientIdentityResolver {
  private readonly headers: readonly string[];

  constructor(headers: readonly string[] = DEFAULT_IP_HEADERS) {
    this.headers = headers.map((h) => h.toLowerCase());
  }

  resolve(request: ClientRequest): string {
    const remote = request.remoteAddress ? normalizeAddress(request.remoteAddress) : undefined;

    for (const header of this.headers) {
      const candidate = firstHeaderValue(request.headers[header]);
      if (candidate && isPublicIp(candidate)) {
        return candidate;
      }
    }

    if (remote) {
      return remote;
    }
    return LOOPBACK_IDENTITY;
  }

  /**
   * User agent as stored in attempt records and session state
   */
  userAgent(request: ClientRequest): string {
    return headerString(request, "user-agent").trim();
  }
}
