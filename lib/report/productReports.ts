/**
 * Reports for the wider product set (--include-products): one CSV per product
 * plus a per-domain tree of GTM sub-resources as CSV and JSON snapshots.
 */
import path from 'path';
import logger from '../logger';
import type { SourceContext } from '../sources/fetchSource';
import { isRecord, JsonObject, recordField, stringField, stringList } from '../sources/envelope';
import { listZones } from '../sources/edgedns';
import { getGtmProperty, GtmSubResource, listGtmDomains, listGtmResource } from '../sources/gtm';
import { listEdgeWorkers } from '../sources/edgeworkers';
import { listCloudletPolicies } from '../sources/cloudlets';
import { listCloudWrapper } from '../sources/cloudwrapper';
import { CsvCell, ensureDir, safeFileName, writeCsv, writeJson } from './writers';

export interface ProductInventory {
  zones: JsonObject[];
  gtmDomains: string[];
  edgeWorkers: JsonObject[];
  cloudletPolicies: JsonObject[];
  cloudWrapper: JsonObject[];
}

interface CsvReport {
  file: string;
  headers: string[];
  rows: CsvCell[][];
}

/** Scalar cell for an arbitrary JSON value; lists are `;`-joined. */
export function cell(value: unknown): CsvCell {
  if (value === null || value === undefined) return undefined;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (Array.isArray(value)) return value.map((v) => (isRecord(v) ? JSON.stringify(v) : String(v))).join(';');
  return JSON.stringify(value);
}

/** First of `keys` holding a non-empty value. */
function pick(obj: JsonObject, ...keys: string[]): CsvCell {
  for (const key of keys) {
    const v = obj[key];
    if (v !== undefined && v !== null && v !== '') return cell(v);
  }
  return undefined;
}

function columns(obj: JsonObject, keys: string[]): CsvCell[] {
  return keys.map((k) => cell(obj[k]));
}

export async function collectProducts(ctx: SourceContext): Promise<ProductInventory> {
  const zones = await listZones(ctx);
  const gtmDomains = await listGtmDomains(ctx);
  const edgeWorkers = await listEdgeWorkers(ctx);
  const cloudletPolicies = await listCloudletPolicies(ctx);
  const cloudWrapper = await listCloudWrapper(ctx);

  for (const [resource, outcome] of Object.entries({ zones, gtmDomains, edgeWorkers, cloudletPolicies, cloudWrapper })) {
    if (!outcome.ok) logger.info({ resource, reason: outcome.reason }, `${resource} unavailable, report will be empty`);
  }

  return {
    zones: zones.value,
    gtmDomains: gtmDomains.value,
    edgeWorkers: edgeWorkers.value,
    cloudletPolicies: cloudletPolicies.value,
    cloudWrapper: cloudWrapper.value,
  };
}

export function productReports(inv: ProductInventory): CsvReport[] {
  return [
    {
      file: 'edgedns_zones.csv',
      headers: ['zone', 'type_or_contract', 'status'],
      rows: inv.zones.map((z) => [pick(z, 'zone', 'name'), pick(z, 'type', 'contractId'), pick(z, 'status') ?? '']),
    },
    {
      file: 'gtm_domains.csv',
      headers: ['gtm_domain'],
      rows: inv.gtmDomains.map((d) => [d]),
    },
    {
      file: 'edgeworkers.csv',
      headers: ['edgeworker_id', 'name', 'group_id', 'last_modified'],
      rows: inv.edgeWorkers.map((ew) => columns(ew, ['edgeWorkerId', 'name', 'groupId', 'lastModifiedTime'])),
    },
    {
      file: 'cloudlets_policies.csv',
      headers: ['policy_id', 'name', 'cloudlet_type', 'status'],
      rows: inv.cloudletPolicies.map((cl) => columns(cl, ['policyId', 'name', 'cloudletType', 'status'])),
    },
    {
      file: 'cloud_wrapper.csv',
      headers: ['id', 'name', 'status'],
      rows: inv.cloudWrapper.map((c) => [pick(c, 'id', 'containerId'), pick(c, 'name'), pick(c, 'status', 'state')]),
    },
  ];
}

export async function writeProductReports(outDir: string, inv: ProductInventory): Promise<string[]> {
  const files: string[] = [];
  for (const report of productReports(inv)) {
    const file = path.join(outDir, report.file);
    await writeCsv(file, report.headers, report.rows);
    files.push(file);
  }
  return files;
}

const DATACENTER_COLUMNS = [
  'datacenterId',
  'nickname',
  'city',
  'stateOrProvince',
  'country',
  'continent',
  'latitude',
  'longitude',
  'virtual',
  'cloneOf',
  'scorePenalty',
  'weight',
];

const LIVENESS_COLUMNS = [
  'name',
  'testInterval',
  'testObject',
  'testObjectProtocol',
  'testObjectPort',
  'testTimeout',
  'httpError3xx',
  'httpError4xx',
  'httpError5xx',
  'requestString',
  'responseString',
  'peerCertificateVerification',
];

const MAP_HEADERS = ['name', 'defaultDatacenter', 'assignmentsCount'];

const PROPERTY_HEADERS = [
  'propertyName',
  'type',
  'ipv6',
  'handoutMode',
  'failoverOrder',
  'healthThreshold',
  'geoMap',
  'asMap',
  'cidrMap',
  'ttl',
  'trafficTargetsCount',
];

const TARGET_HEADERS = ['datacenterId', 'enabled', 'weight', 'servers', 'handoutCName', 'name'];

function mapRow(m: JsonObject): CsvCell[] {
  const assignments = Array.isArray(m.assignments) ? m.assignments : [];
  return [cell(m.name), cell(recordField(m, 'defaultDatacenter').datacenterId), assignments.length];
}

function trafficTargets(property: JsonObject): JsonObject[] {
  return Array.isArray(property.trafficTargets) ? property.trafficTargets.filter(isRecord) : [];
}

/**
 * Deep export of one GTM domain into `<outDir>/gtm/<domain>/`. Every
 * sub-resource is best-effort; a failed fetch leaves a header-only CSV.
 */
export async function exportGtmDomain(ctx: SourceContext, outDir: string, domain: string): Promise<string[]> {
  const baseDir = path.join(outDir, 'gtm', safeFileName(domain));
  await ensureDir(baseDir);
  const files: string[] = [];
  const csv = async (name: string, headers: string[], rows: CsvCell[][]) => {
    const file = path.join(baseDir, name);
    await writeCsv(file, headers, rows);
    files.push(file);
  };
  const json = async (name: string, value: unknown) => {
    const file = path.join(baseDir, name);
    await writeJson(file, value);
    files.push(file);
  };
  const fetchList = async (resource: GtmSubResource) => (await listGtmResource(ctx, domain, resource)).value;

  const datacenters = await fetchList('datacenters');
  await csv('datacenters.csv', DATACENTER_COLUMNS, datacenters.map((dc) => columns(dc, DATACENTER_COLUMNS)));
  await json('datacenters.json', datacenters);

  const livenessTests = await fetchList('liveness-tests');
  await csv('liveness_tests.csv', LIVENESS_COLUMNS, livenessTests.map((lt) => columns(lt, LIVENESS_COLUMNS)));
  await json('liveness_tests.json', livenessTests);

  const maps: Array<[string, GtmSubResource]> = [
    ['cidr_maps', 'cidr-maps'],
    ['as_maps', 'as-maps'],
    ['geo_maps', 'geo-maps'],
  ];
  for (const [name, resource] of maps) {
    const items = await fetchList(resource);
    await csv(`${name}.csv`, MAP_HEADERS, items.map(mapRow));
    await json(`${name}.json`, items);
  }

  const propertyRows: CsvCell[][] = [];
  for (const p of await fetchList('properties')) {
    const name = stringField(p, 'propertyName', 'name');
    const detail = name ? (await getGtmProperty(ctx, domain, name)).value : {};
    const targets = trafficTargets(detail);
    propertyRows.push([
      name,
      cell(p.type),
      cell(p.ipv6),
      cell(p.handoutMode),
      cell(p.failoverOrder),
      cell(p.healthThreshold),
      cell(recordField(p, 'geoMap').name),
      cell(recordField(p, 'asMap').name),
      cell(recordField(p, 'cidrMap').name),
      cell(p.ttl),
      targets.length,
    ]);
    if (!name) continue;
    await csv(
      `property_${safeFileName(name)}_targets.csv`,
      TARGET_HEADERS,
      targets.map((t) => [
        cell(t.datacenterId),
        cell(t.enabled),
        cell(t.weight),
        stringList(t.servers).join(';'),
        cell(t.handoutCName),
        cell(t.name),
      ]),
    );
    await json(`property_${safeFileName(name)}.json`, detail);
  }
  await csv('properties.csv', PROPERTY_HEADERS, propertyRows);

  return files;
}
