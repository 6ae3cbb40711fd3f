import { apexOf, isIpLiteral, normalizeHostname } from "../lib/subdomain";

describe("normalizeHostname", () => {
  test("lowercases, trims and strips trailing dots and wildcards", () => {
    expect(normalizeHostname("  WWW.Example.COM. ")).toBe("www.example.com");
    expect(normalizeHostname("*.example.com")).toBe("example.com");
  });

  test("converts internationalized names to punycode", () => {
    expect(normalizeHostname("пример.рф")).toBe("xn--e1afmkfd.xn--p1ai");
  });
});

describe("apexOf", () => {
  test("uses the public suffix list", () => {
    expect(apexOf("www.example.co.uk")).toBe("example.co.uk");
    expect(apexOf("example.co.uk")).toBe("example.co.uk");
    expect(apexOf("a.b.example.com")).toBe("example.com");
  });

  test("wildcard certificate names resolve to their apex", () => {
    expect(apexOf("*.example.org")).toBe("example.org");
  });

  test("single-label hosts are their own apex", () => {
    expect(apexOf("intranet")).toBe("intranet");
  });

  test("names under an unlisted suffix are their own apex", () => {
    expect(apexOf("www.foo.internal")).toBe("www.foo.internal");
  });

  test("IP literals are their own apex", () => {
    expect(apexOf("192.0.2.1")).toBe("192.0.2.1");
    expect(apexOf("2001:db8::1")).toBe("2001:db8::1");
    expect(apexOf("[2001:db8::1]")).toBe("[2001:db8::1]");
  });

  test("keeps the encoding of the hostname", () => {
    expect(apexOf("www.пример.рф")).toBe("пример.рф");
    expect(apexOf("www.xn--e1afmkfd.xn--p1ai")).toBe("xn--e1afmkfd.xn--p1ai");
  });
});

test("isIpLiteral", () => {
  expect(isIpLiteral("10.0.0.1")).toBe(true);
  expect(isIpLiteral("[::1]")).toBe(true);
  expect(isIpLiteral("example.com")).toBe(false);
});
