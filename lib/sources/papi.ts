/**
 * Property Manager (PAPI) — contracts, groups, properties and per-version
 * hostnames/rules. Contracts, groups and property listing throw: they are the
 * root of every report. Versions, hostnames and rules are best-effort.
 */
import type { Contract, ContractGroupPair, Group, Property, PropertyTarget } from '../types';
import type { FetchOutcome } from '../result';
import { fetchSource, SourceContext } from './fetchSource';
import {
  isRecord,
  JsonObject,
  listAt,
  recordField,
  recordsOf,
  stringField,
  stringList,
  versionField,
} from './envelope';

export const PAPI_PATHS = {
  contracts: 'papi/v1/contracts',
  groups: 'papi/v1/groups',
  properties: 'papi/v1/properties',
  versions: (propertyId: string) => `papi/v1/properties/${encodeURIComponent(propertyId)}/versions`,
  hostnames: (propertyId: string, version: number) =>
    `papi/v1/properties/${encodeURIComponent(propertyId)}/versions/${version}/hostnames`,
  rules: (propertyId: string, version: number) =>
    `papi/v1/properties/${encodeURIComponent(propertyId)}/versions/${version}/rules`,
};

function parseContract(obj: JsonObject): Contract | null {
  const contractId = stringField(obj, 'contractId');
  if (!contractId) return null;
  return { contractId, contractTypeName: stringField(obj, 'contractTypeName') };
}

function parseGroup(obj: JsonObject): Group | null {
  const groupId = stringField(obj, 'groupId');
  if (!groupId) return null;
  return { groupId, groupName: stringField(obj, 'groupName'), contractIds: stringList(obj.contractIds) };
}

export function parseProperty(obj: JsonObject): Property | null {
  const propertyId = stringField(obj, 'propertyId');
  if (!propertyId) return null;
  return {
    propertyId,
    propertyName: stringField(obj, 'propertyName') ?? propertyId,
    contractId: stringField(obj, 'contractId'),
    groupId: stringField(obj, 'groupId'),
    latestVersion: versionField(obj, 'latestVersion'),
    productionVersion: versionField(obj, 'productionVersion'),
    stagingVersion: versionField(obj, 'stagingVersion'),
  };
}

function notNull<T>(v: T | null): v is T {
  return v !== null;
}

export async function listContracts(ctx: SourceContext): Promise<Contract[]> {
  const body = await ctx.client.get(PAPI_PATHS.contracts);
  return recordsOf(listAt(body, 'contracts', 'items')).map(parseContract).filter(notNull);
}

export async function listGroups(ctx: SourceContext): Promise<Group[]> {
  const body = await ctx.client.get(PAPI_PATHS.groups);
  return recordsOf(listAt(body, 'groups', 'items')).map(parseGroup).filter(notNull);
}

/** Properties visible for one contract/group pair. Throws on failure. */
export async function listPropertiesFor(ctx: SourceContext, pair: ContractGroupPair): Promise<Property[]> {
  const body = await ctx.client.get(PAPI_PATHS.properties, { contractId: pair.contractId, groupId: pair.groupId });
  return recordsOf(listAt(body, 'properties', 'items')).map(parseProperty).filter(notNull);
}

/** Version numbers of a property, highest first. */
export async function listPropertyVersions(ctx: SourceContext, propertyId: string): Promise<FetchOutcome<number[]>> {
  return fetchSource(
    ctx,
    PAPI_PATHS.versions(propertyId),
    (data) =>
      recordsOf(listAt(data, 'versions', 'items'))
        .map((v) => versionField(v, 'propertyVersion'))
        .filter((v): v is number => v !== undefined)
        .sort((a, b) => b - a),
    [],
    'papi-versions',
  );
}

/** Hostnames served by a property version (`cnameFrom`, falling back to `hostname`). */
export async function getHostnames(ctx: SourceContext, target: PropertyTarget): Promise<FetchOutcome<string[]>> {
  return fetchSource(
    ctx,
    PAPI_PATHS.hostnames(target.propertyId, target.version),
    (data) =>
      recordsOf(listAt(data, 'hostnames', 'items'))
        .map((hn) => stringField(hn, 'cnameFrom', 'hostname'))
        .filter((h): h is string => h !== undefined),
    [],
    'papi-hostnames',
    { params: { contractId: target.contractId, groupId: target.groupId } },
  );
}

/** Root rule node of a property version, or null when the body has none. */
export async function getRules(ctx: SourceContext, target: PropertyTarget): Promise<FetchOutcome<JsonObject | null>> {
  return fetchSource<JsonObject | null>(
    ctx,
    PAPI_PATHS.rules(target.propertyId, target.version),
    (data) => (isRecord(data) && isRecord(data.rules) ? recordField(data, 'rules') : null),
    null,
    'papi-rules',
    { params: { contractId: target.contractId, groupId: target.groupId } },
  );
}
