import {
  buildHostnameRecords,
  describeSecurityConfig,
  groupByApex,
  indexCertificatesByApex,
  summarizeEnrollment,
} from "../lib/aggregator";

const target = { propertyId: "prp_1", propertyName: "www-site", version: 3 };

describe("buildHostnameRecords / groupByApex", () => {
  test("one frozen record per hostname", () => {
    const records = buildHostnameRecords(target, ["www.example.com"]);
    expect(records).toEqual([
      { apex: "example.com", hostname: "www.example.com", propertyName: "www-site", propertyId: "prp_1", propertyVersion: 3 },
    ]);
    expect(Object.isFrozen(records[0])).toBe(true);
  });

  test("groups by apex keeping discovery order", () => {
    const records = buildHostnameRecords(target, ["www.example.com", "shop.example.co.uk", "api.example.com"]);
    const byApex = groupByApex(records);
    expect(Array.from(byApex.keys())).toEqual(["example.com", "example.co.uk"]);
    expect(byApex.get("example.com")?.map((r) => r.hostname)).toEqual(["www.example.com", "api.example.com"]);
  });
});

describe("summarizeEnrollment", () => {
  test("prefers the CSR", () => {
    const summary = summarizeEnrollment({
      id: 101,
      csr: { cn: "www.example.com", sans: ["www.example.com", "api.example.com"] },
      certificate: { cn: "ignored.example.com" },
      status: "active",
      deploymentSchedule: { network: "production" },
    });
    expect(summary).toEqual({
      id: 101,
      commonName: "www.example.com",
      sans: ["www.example.com", "api.example.com"],
      status: "active",
      network: "production",
    });
  });

  test("falls back to the certificate and network configuration", () => {
    const summary = summarizeEnrollment({
      id: 7,
      certificate: { cn: "example.net" },
      networkConfiguration: { sanEntries: ["example.net", "www.example.net"] },
    });
    expect(summary).toEqual({ id: 7, commonName: "example.net", sans: ["example.net", "www.example.net"], status: "", network: "" });
  });
});

test("indexCertificatesByApex lists the common name before the SANs", () => {
  const index = indexCertificatesByApex([
    { id: 1, commonName: "www.example.com", sans: ["*.example.com", "example.org"], status: "", network: "" },
  ]);
  expect(index.get("example.com")).toEqual(["www.example.com", "*.example.com"]);
  expect(index.get("example.org")).toEqual(["example.org"]);
});

describe("describeSecurityConfig", () => {
  test("reads latestVersion from an object", () => {
    expect(describeSecurityConfig({ id: 55, name: "waf", latestVersion: { version: 9 } })).toEqual({
      configId: 55,
      configName: "waf",
      latestVersion: 9,
    });
  });

  test("accepts a bare version and the alternate keys", () => {
    expect(describeSecurityConfig({ configId: "cfg-1", configName: "edge", latestVersion: 2 })).toEqual({
      configId: "cfg-1",
      configName: "edge",
      latestVersion: 2,
    });
  });
});
