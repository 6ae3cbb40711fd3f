import { generateChecklist } from '../lib/checklist';
import { buildHostnameRecords } from '../lib/aggregator';
import { emptyParsedRules } from '../lib/rules';
import type { ParsedRulesIndex } from '../lib/types';

const records = [
  ...buildHostnameRecords({ propertyId: 'prp_2', propertyName: 'www-site', version: 5 }, ['www.example.com', 'api.example.com']),
  ...buildHostnameRecords({ propertyId: 'prp_1', propertyName: 'assets', version: 2 }, ['cdn.example.com']),
];

describe('generateChecklist', () => {
  test('writes the preamble, sorted hostnames and one section per configuration', () => {
    const parsed: ParsedRulesIndex = new Map([
      ['prp_2:5', { ...emptyParsedRules(), cache: [{ ttl: 300 }], hsts: [{}] }],
      ['prp_1:2', { ...emptyParsedRules(), redirects: [{ destinationHostname: 'example.org' }], headers: [{ directive: 'modifyOutgoingResponseHeader' }] }],
    ]);
    const certs = new Map([['example.com', ['www.example.com', 'api.example.com', 'www.example.com']]]);

    expect(generateChecklist('example.com', records, parsed, certs).split('\n')).toEqual([
      '# Cloudflare migration checklist for example.com',
      '',
      '- Create zone in Cloudflare',
      '- Set DNS nameservers or use partial (CNAME) setup as applicable',
      '- Enable Universal SSL or upload cert matching SANs',
      '  - CPS SANs: api.example.com, www.example.com',
      '- Enable WAF managed rules; recreate custom WAF rules',
      '- Recreate cache rules and overrides',
      '- Recreate redirects (Transform or Rulesets)',
      '- Recreate header rules; enable HSTS if present',
      '',
      '## Hostnames',
      '- api.example.com (property www-site v5)',
      '- cdn.example.com (property assets v2)',
      '- www.example.com (property www-site v5)',
      '',
      '## Rules summary',
      '### assets v2',
      '- Redirect rules present',
      '- Header modifications present',
      '',
      '### www-site v5',
      '- Cache behaviors present',
      '- HSTS present',
      '',
    ]);
  });

  test('omits SANs and rule sections when nothing is known', () => {
    const text = generateChecklist('example.com', records.slice(2), new Map(), new Map());
    expect(text.endsWith('## Hostnames\n- cdn.example.com (property assets v2)\n\n## Rules summary')).toBe(true);
    expect(text).not.toContain('CPS SANs');
  });
});
