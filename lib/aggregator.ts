import type { CertificateSummary, HostnameRecord, PropertyTarget, SecurityConfigSummary } from "./types";
import { apexOf } from "./subdomain";
import { idField, isRecord, JsonObject, recordField, stringField, stringList, versionField } from "./sources/envelope";

export function buildHostnameRecords(target: PropertyTarget, hostnames: string[]): HostnameRecord[] {
  return hostnames.map((hostname) =>
    Object.freeze({
      apex: apexOf(hostname),
      hostname,
      propertyName: target.propertyName,
      propertyId: target.propertyId,
      propertyVersion: target.version,
    }),
  );
}

/** Records grouped by apex, keeping discovery order within each group. */
export function groupByApex(records: HostnameRecord[]): Map<string, HostnameRecord[]> {
  const byApex = new Map<string, HostnameRecord[]>();
  for (const record of records) {
    const list = byApex.get(record.apex);
    if (list) list.push(record);
    else byApex.set(record.apex, [record]);
  }
  return byApex;
}

/**
 * Summary row for one CPS enrollment.
 * - common name: `csr.cn`, else `certificate.cn`
 * - SANs: `csr.sans`, else `networkConfiguration.sanEntries`
 */
export function summarizeEnrollment(enrollment: JsonObject): CertificateSummary {
  const csr = recordField(enrollment, "csr");
  const csrSans = stringList(csr.sans);
  const sans = csrSans.length ? csrSans : stringList(recordField(enrollment, "networkConfiguration").sanEntries);
  return {
    id: idField(enrollment, "id"),
    commonName: stringField(csr, "cn") ?? stringField(recordField(enrollment, "certificate"), "cn") ?? "",
    sans,
    status: stringField(enrollment, "status") ?? "",
    network: stringField(recordField(enrollment, "deploymentSchedule"), "network") ?? "",
  };
}

/** apex -> every certified name (common name first, then SANs) under that apex. */
export function indexCertificatesByApex(summaries: CertificateSummary[]): Map<string, string[]> {
  const byApex = new Map<string, string[]>();
  for (const cert of summaries) {
    const names = cert.commonName ? [cert.commonName, ...cert.sans] : [...cert.sans];
    for (const name of names) {
      if (!name) continue;
      const apex = apexOf(name);
      const list = byApex.get(apex);
      if (list) list.push(name);
      else byApex.set(apex, [name]);
    }
  }
  return byApex;
}

/**
 * Identity of a security configuration. `latestVersion` is either a number or
 * an object carrying `version`.
 */
export function describeSecurityConfig(config: JsonObject): Omit<SecurityConfigSummary, "policyCount"> {
  const latest = config.latestVersion;
  return {
    configId: idField(config, "id", "configId"),
    configName: stringField(config, "name", "configName") ?? "",
    latestVersion: isRecord(latest) ? versionField(latest, "version") : versionField(config, "latestVersion"),
  };
}
