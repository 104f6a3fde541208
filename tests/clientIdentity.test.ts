/**
 * Client identity resolution tests
 */

import {
  ClientIdentityResolver,
  isPublicIp,
  isValidIp,
  normalizeAddress,
} from "../src/core/identity/clientIdentity";

describe("ClientIdentityResolver", () => {
  const resolver = new ClientIdentityResolver();

  test("prefers the most trusted header carrying a public address", () => {
    expect(
      resolver.resolve({
        headers: { "cf-connecting-ip": "203.0.113.10", "x-forwarded-for": "198.51.100.20" },
        remoteAddress: "10.0.0.1",
      })
    ).toBe("203.0.113.10");
  });

  test("takes the first entry of a comma-separated header", () => {
    expect(
      resolver.resolve({ headers: { "x-forwarded-for": " 198.51.100.20 , 203.0.113.10" }, remoteAddress: "10.0.0.1" })
    ).toBe("198.51.100.20");
  });

  test("skips private and reserved header values", () => {
    expect(
      resolver.resolve({
        headers: { "client-ip": "192.168.1.4", "x-forwarded-for": "127.0.0.1", forwarded: "198.51.100.7" },
        remoteAddress: "10.0.0.1",
      })
    ).toBe("198.51.100.7");
  });

  test("falls back to the connection address, even when private", () => {
    expect(resolver.resolve({ headers: { "x-forwarded-for": "garbage" }, remoteAddress: "10.0.0.1" })).toBe("10.0.0.1");
  });

  test("clients behind one proxy keep distinct identities", () => {
    const viaProxy = (forwarded: string) =>
      resolver.resolve({ headers: { "x-forwarded-for": forwarded }, remoteAddress: "10.0.0.1" });
    expect(viaProxy("203.0.113.5")).toBe("203.0.113.5");
    expect(viaProxy("198.51.100.77")).toBe("198.51.100.77");
  });

  test("reports IPv4-mapped connection addresses in dotted form", () => {
    expect(resolver.resolve({ headers: {}, remoteAddress: "::ffff:203.0.113.9" })).toBe("203.0.113.9");
  });

  test("defaults to loopback when nothing is known", () => {
    expect(resolver.resolve({ headers: {} })).toBe("127.0.0.1");
  });

  test("honors a custom header list", () => {
    const custom = new ClientIdentityResolver(["X-Real-IP"]);
    expect(
      custom.resolve({
        headers: { "x-real-ip": "203.0.113.50", "cf-connecting-ip": "198.51.100.1" },
        remoteAddress: "10.0.0.1",
      })
    ).toBe("203.0.113.50");
  });

  test("reads the user agent, first value of a repeated header", () => {
    expect(resolver.userAgent({ headers: { "user-agent": "  Browser/1.0 " } })).toBe("Browser/1.0");
    expect(resolver.userAgent({ headers: { "user-agent": ["A/1", "B/2"] } })).toBe("A/1");
    expect(resolver.userAgent({ headers: {} })).toBe("");
  });
});

describe("address helpers", () => {
  test("isValidIp accepts both families", () => {
    expect(isValidIp("203.0.113.1")).toBe(true);
    expect(isValidIp("2001:db8::1")).toBe(true);
    expect(isValidIp("not-an-ip")).toBe(false);
    expect(isValidIp("256.1.1.1")).toBe(false);
  });

  test("isPublicIp rejects private and reserved ranges", () => {
    expect(isPublicIp("8.8.8.8")).toBe(true);
    expect(isPublicIp("10.1.2.3")).toBe(false);
    expect(isPublicIp("172.20.0.1")).toBe(false);
    expect(isPublicIp("169.254.10.10")).toBe(false);
    expect(isPublicIp("::1")).toBe(false);
    expect(isPublicIp("fd00::1")).toBe(false);
    expect(isPublicIp("2606:4700::1111")).toBe(true);
    expect(isPublicIp("::ffff:203.0.113.9")).toBe(false);
    expect(isPublicIp("203.0.113.9")).toBe(true);
    expect(isPublicIp("1.1.1.1")).toBe(true);
  });

  test("normalizeAddress leaves other addresses alone", () => {
    expect(normalizeAddress("2001:db8::1")).toBe("2001:db8::1");
    expect(normalizeAddress("203.0.113.1")).toBe("203.0.113.1");
  });
});
