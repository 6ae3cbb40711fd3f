/**
 * Report orchestration: list properties, collect hostnames (and rules),
 * certificates, security configs and optionally the wider product set, then
 * write every report. Strictly sequential; each run starts from scratch.
 */
import path from 'path';
import logger from './logger';
import type { ContractGroupPair, HostnameRecord, ParsedRulesIndex, Property, PropertyTarget, SecurityConfigSummary } from './types';
import type { SourceContext } from './sources/fetchSource';
import { listProperties } from './discovery';
import { getHostnames, getRules, listPropertyVersions } from './sources/papi';
import { listEnrollments } from './sources/cps';
import { listSecurityConfigs, listSecurityPolicies } from './sources/appsec';
import { buildHostnameRecords, describeSecurityConfig, groupByApex, indexCertificatesByApex, summarizeEnrollment } from './aggregator';
import { parseBehaviors, rulesKey } from './rules';
import { generateChecklist } from './checklist';
import { collectProducts, exportGtmDomain, writeProductReports } from './report/productReports';
import { safeFileName, writeCsv, writeJson, writeText } from './report/writers';

export interface ReportOptions {
  outDir: string;
  includeRules: boolean;
  includeProducts: boolean;
}

export interface ReportSummary {
  outDir: string;
  pair: ContractGroupPair | null;
  properties: number;
  hostnames: number;
  apexes: string[];
  files: string[];
}

export const HOSTNAME_COLUMNS = ['hostname', 'apex', 'property_name', 'property_id', 'property_version'];
export const USAGE_COLUMNS = ['apex', 'hostname', 'property_name', 'property_id', 'property_version'];
export const CERT_COLUMNS = ['enrollment_id', 'common_name', 'sans', 'status', 'network'];
export const APPSEC_COLUMNS = ['config_id', 'config_name', 'latest_version', 'num_policies'];

/**
 * Version to report on: latest, else production, else staging. When the
 * listing carries none of them the version list is asked for its highest.
 */
async function resolveTarget(ctx: SourceContext, prop: Property, pair: ContractGroupPair | null): Promise<PropertyTarget | null> {
  let version = prop.latestVersion ?? prop.productionVersion ?? prop.stagingVersion;
  if (version === undefined) {
    const versions = await listPropertyVersions(ctx, prop.propertyId);
    version = versions.value[0];
  }
  if (version === undefined) {
    logger.debug({ propertyId: prop.propertyId }, 'property has no version, skipped');
    return null;
  }
  return {
    propertyId: prop.propertyId,
    propertyName: prop.propertyName,
    version,
    contractId: prop.contractId ?? pair?.contractId,
    groupId: prop.groupId ?? pair?.groupId,
  };
}

async function summarizeSecurity(ctx: SourceContext): Promise<SecurityConfigSummary[]> {
  const configs = await listSecurityConfigs(ctx);
  const summaries: SecurityConfigSummary[] = [];
  for (const config of configs.value) {
    const base = describeSecurityConfig(config);
    let policyCount = 0;
    if (base.configId !== undefined && base.latestVersion !== undefined) {
      policyCount = (await listSecurityPolicies(ctx, base.configId, base.latestVersion)).value.length;
    }
    summaries.push({ ...base, policyCount });
  }
  return summaries;
}

/**
 * Run a full report into `options.outDir`.
 * Throws PropertyListingError when the property listing itself fails; every
 * other resource degrades to an empty section.
 */
export async function runReport(ctx: SourceContext, options: ReportOptions): Promise<ReportSummary> {
  const outDir = path.resolve(options.outDir);
  const { pair, properties } = await listProperties(ctx);
  logger.info({ count: properties.length }, `Found ${properties.length} properties`);

  const records: HostnameRecord[] = [];
  const parsedRules: ParsedRulesIndex = new Map();

  for (const prop of properties) {
    const target = await resolveTarget(ctx, prop, pair);
    if (!target) continue;

    const hostnames = await getHostnames(ctx, target);
    records.push(...buildHostnameRecords(target, hostnames.value));

    if (options.includeRules) {
      const rules = await getRules(ctx, target);
      if (rules.ok && rules.value) {
        parsedRules.set(rulesKey(target.propertyId, target.version), parseBehaviors(rules.value));
      }
    }
  }

  const certificates = (await listEnrollments(ctx)).value.map(summarizeEnrollment);
  const certNamesByApex = indexCertificatesByApex(certificates);
  const security = await summarizeSecurity(ctx);
  const inventory = options.includeProducts ? await collectProducts(ctx) : null;

  const files: string[] = [];
  const csv = async (name: string, headers: string[], rows: Array<Array<string | number | undefined>>) => {
    const file = path.join(outDir, name);
    await writeCsv(file, headers, rows);
    files.push(file);
  };

  await csv(
    'usage_summary.csv',
    USAGE_COLUMNS,
    records.map((r) => [r.apex, r.hostname, r.propertyName, r.propertyId, r.propertyVersion]),
  );
  await csv(
    'hostnames.csv',
    HOSTNAME_COLUMNS,
    records.map((r) => [r.hostname, r.apex, r.propertyName, r.propertyId, r.propertyVersion]),
  );
  await csv(
    'cps_certs.csv',
    CERT_COLUMNS,
    certificates.map((c) => [c.id, c.commonName, c.sans.join(';'), c.status, c.network]),
  );
  await csv(
    'appsec_summary.csv',
    APPSEC_COLUMNS,
    security.map((s) => [s.configId, s.configName, s.latestVersion, s.policyCount]),
  );

  for (const [key, parsed] of parsedRules) {
    const file = path.join(outDir, 'rules', `${safeFileName(key.replace(':', '_v'))}.json`);
    await writeJson(file, parsed);
    files.push(file);
  }

  if (inventory) {
    files.push(...(await writeProductReports(outDir, inventory)));
    for (const domain of inventory.gtmDomains) {
      files.push(...(await exportGtmDomain(ctx, outDir, domain)));
    }
  }

  const byApex = groupByApex(records);
  for (const [apex, apexRecords] of byApex) {
    const file = path.join(outDir, 'checklists', `${apex}.md`);
    await writeText(file, generateChecklist(apex, apexRecords, parsedRules, certNamesByApex));
    files.push(file);
  }

  ctx.metrics?.hostnames.set(records.length);

  return {
    outDir,
    pair,
    properties: properties.length,
    hostnames: records.length,
    apexes: Array.from(byApex.keys()),
    files,
  };
}
