import type { HostnameRecord, ParsedRulesIndex } from './types';
import { rulesKey } from './rules';

const PREAMBLE_HEAD = [
  '- Create zone in Cloudflare',
  '- Set DNS nameservers or use partial (CNAME) setup as applicable',
  '- Enable Universal SSL or upload cert matching SANs',
];

const PREAMBLE_TAIL = [
  '- Enable WAF managed rules; recreate custom WAF rules',
  '- Recreate cache rules and overrides',
  '- Recreate redirects (Transform or Rulesets)',
  '- Recreate header rules; enable HSTS if present',
];

// Code-unit order, so output does not depend on the host's locale.
function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Markdown migration checklist for one apex domain: the fixed action list,
 * certified names under the apex, hostnames sorted by name, then one rules
 * summary per configuration version sorted by (name, version).
 */
export function generateChecklist(
  apex: string,
  records: HostnameRecord[],
  parsedRules: ParsedRulesIndex,
  certNamesByApex: Map<string, string[]>,
): string {
  const lines: string[] = [`# Cloudflare migration checklist for ${apex}`, '', ...PREAMBLE_HEAD];

  const certNames = certNamesByApex.get(apex);
  if (certNames?.length) {
    const sans = Array.from(new Set(certNames)).sort(compareStrings);
    lines.push(`  - CPS SANs: ${sans.join(', ')}`);
  }
  lines.push(...PREAMBLE_TAIL, '', '## Hostnames');

  for (const r of [...records].sort((a, b) => compareStrings(a.hostname, b.hostname))) {
    lines.push(`- ${r.hostname} (property ${r.propertyName} v${r.propertyVersion})`);
  }

  lines.push('', '## Rules summary');
  const seen = new Set<string>();
  const byConfig = [...records].sort(
    (a, b) => compareStrings(a.propertyName, b.propertyName) || a.propertyVersion - b.propertyVersion,
  );
  for (const r of byConfig) {
    const key = rulesKey(r.propertyId, r.propertyVersion);
    const parsed = parsedRules.get(key);
    if (!parsed || seen.has(key)) continue;
    seen.add(key);
    lines.push(`### ${r.propertyName} v${r.propertyVersion}`);
    if (parsed.cache.length) lines.push('- Cache behaviors present');
    if (parsed.redirects.length) lines.push('- Redirect rules present');
    if (parsed.headers.length) lines.push('- Header modifications present');
    if (parsed.hsts.length) lines.push('- HSTS present');
    lines.push('');
  }

  return lines.join('\n');
}
