/**
 * Contract/group discovery.
 *
 * Listing properties needs a contract and a group the API client may use
 * together. Groups name the contracts they belong to, but that alone does not
 * guarantee access, so candidate pairs are probed against the properties
 * endpoint until one answers with at least one property.
 */
import type { Contract, ContractGroupPair, Group, Property } from './types';
import logger from './logger';
import { errorMessage, PropertyListingError } from './errors';
import { listContracts, listGroups, listPropertiesFor } from './sources/papi';
import type { SourceContext } from './sources/fetchSource';

export interface DiscoveryResult extends ContractGroupPair {
  properties: Property[];
  probes: number;
}

export interface CombinationReport extends ContractGroupPair {
  contractTypeName?: string;
  groupName?: string;
  ok: boolean;
  propertiesCount: number;
  error?: string;
}

/** Pairs in provider order (contracts outer, groups inner) where the group lists the contract. */
export function candidatePairs(contracts: Contract[], groups: Group[]): Array<{ contract: Contract; group: Group }> {
  const pairs: Array<{ contract: Contract; group: Group }> = [];
  for (const contract of contracts) {
    for (const group of groups) {
      if (group.contractIds.includes(contract.contractId)) pairs.push({ contract, group });
    }
  }
  return pairs;
}

/**
 * First pair whose probe returns a non-empty property list, or null.
 * A probe that fails counts as empty; each pair is probed at most once.
 */
export async function discoverContractGroup(
  ctx: SourceContext,
  contracts: Contract[],
  groups: Group[],
): Promise<DiscoveryResult | null> {
  let probes = 0;
  for (const { contract, group } of candidatePairs(contracts, groups)) {
    const pair = { contractId: contract.contractId, groupId: group.groupId };
    logger.info(pair, `Testing contract ${pair.contractId} with group ${pair.groupId}`);
    probes++;
    try {
      const properties = await listPropertiesFor(ctx, pair);
      if (properties.length) {
        logger.info(
          { ...pair, propertiesCount: properties.length },
          `Found working combination: ${pair.contractId} + ${pair.groupId} (${properties.length} properties)`,
        );
        return { ...pair, properties, probes };
      }
    } catch (err) {
      logger.debug({ err, ...pair }, 'properties probe failed');
    }
  }
  return null;
}

/**
 * Property listing for the whole run. Failing to read contracts or groups is
 * fatal; finding no usable pair is not and yields an empty list.
 */
export async function listProperties(ctx: SourceContext): Promise<{ pair: ContractGroupPair | null; properties: Property[] }> {
  logger.info('Fetching properties');
  let contracts: Contract[];
  let groups: Group[];
  try {
    contracts = await listContracts(ctx);
    if (!contracts.length) {
      logger.warn('No contracts found');
      return { pair: null, properties: [] };
    }
    groups = await listGroups(ctx);
    if (!groups.length) {
      logger.warn('No groups found');
      return { pair: null, properties: [] };
    }
  } catch (err) {
    throw new PropertyListingError(`Error fetching properties: ${errorMessage(err)}`, err);
  }

  const found = await discoverContractGroup(ctx, contracts, groups);
  if (!found) {
    logger.warn('No working contract-group combinations found');
    return { pair: null, properties: [] };
  }
  logger.info({ propertiesCount: found.properties.length }, `Using contract: ${found.contractId} with group: ${found.groupId}`);
  return { pair: { contractId: found.contractId, groupId: found.groupId }, properties: found.properties };
}

/** Probe every candidate pair, without stopping at the first hit. */
export async function findAllCombinations(ctx: SourceContext): Promise<CombinationReport[]> {
  const contracts = await listContracts(ctx);
  const groups = await listGroups(ctx);
  const reports: CombinationReport[] = [];
  for (const { contract, group } of candidatePairs(contracts, groups)) {
    const base = {
      contractId: contract.contractId,
      groupId: group.groupId,
      contractTypeName: contract.contractTypeName,
      groupName: group.groupName,
    };
    try {
      const properties = await listPropertiesFor(ctx, base);
      reports.push({ ...base, ok: true, propertiesCount: properties.length });
    } catch (err) {
      reports.push({ ...base, ok: false, propertiesCount: 0, error: errorMessage(err) });
    }
  }
  return reports;
}
