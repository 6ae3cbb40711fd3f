import type { JsonObject } from './sources/envelope';

export interface Contract {
  contractId: string;
  contractTypeName?: string;
}

export interface Group {
  groupId: string;
  groupName?: string;
  contractIds: string[]; // contracts this group may be used with
}

export interface ContractGroupPair {
  contractId: string;
  groupId: string;
}

export interface Property {
  propertyId: string;
  propertyName: string;
  contractId?: string;
  groupId?: string;
  latestVersion?: number;
  productionVersion?: number;
  stagingVersion?: number;
}

/** A property pinned to the version whose hostnames and rules are read. */
export interface PropertyTarget {
  propertyId: string;
  propertyName: string;
  version: number;
  contractId?: string;
  groupId?: string;
}

export interface HostnameRecord {
  readonly apex: string; // registrable domain, or the hostname itself
  readonly hostname: string;
  readonly propertyName: string;
  readonly propertyId: string;
  readonly propertyVersion: number;
}

export type BehaviorOptions = JsonObject;

export interface HeaderDirective {
  directive: string;
  [key: string]: unknown;
}

export interface ParsedRules {
  cache: BehaviorOptions[];
  redirects: BehaviorOptions[];
  headers: HeaderDirective[];
  hsts: BehaviorOptions[];
}

/** Keyed `"<propertyId>:<version>"`. */
export type ParsedRulesIndex = Map<string, ParsedRules>;

export interface CertificateSummary {
  id: string | number | undefined;
  commonName: string;
  sans: string[];
  status: string;
  network: string;
}

export interface SecurityConfigSummary {
  configId: string | number | undefined;
  configName: string;
  latestVersion: number | undefined;
  policyCount: number;
}
