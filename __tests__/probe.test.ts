import { classifyProbeError, formatProbeResults, probeApis } from '../lib/probe';
import { HttpError } from '../lib/errors';
import { FakeApiClient } from './helpers/fakeClient';

const endpoints = [
  { api: 'Contracts API', path: 'papi/v1/contracts' },
  { api: 'Edge DNS', path: 'edgedns/v1/zones' },
  { api: 'Cloudlets', path: 'cloudlets/v2/policies' },
  { api: 'Cloud Wrapper', path: 'cloud-wrapper/v1/locations' },
  { api: 'EdgeWorkers', path: 'edgeworkers/v1/ids' },
];

describe('probeApis', () => {
  test('classifies 200, 403, 400 and other failures', async () => {
    const client = new FakeApiClient({
      'papi/v1/contracts': { contracts: { items: [] } },
      'edgedns/v1/zones': new HttpError(403, '/edgedns/v1/zones', ''),
      'cloudlets/v2/policies': new HttpError(400, '/cloudlets/v2/policies', ''),
      'cloud-wrapper/v1/locations': new HttpError(500, '/cloud-wrapper/v1/locations', ''),
      'edgeworkers/v1/ids': new Error('socket hang up'),
    });
    const results = await probeApis(client, endpoints);
    expect(results.map((r) => [r.api, r.status, r.detail])).toEqual([
      ['Contracts API', 'accessible', undefined],
      ['Edge DNS', 'forbidden', 'HTTP 403'],
      ['Cloudlets', 'bad-request', 'HTTP 400'],
      ['Cloud Wrapper', 'failed', 'HTTP 500'],
      ['EdgeWorkers', 'failed', 'socket hang up'],
    ]);
    expect(client.paths()).toEqual(endpoints.map((e) => e.path));
  });

  test('formats one line per API', () => {
    expect(
      formatProbeResults([
        { api: 'Contracts API', path: 'papi/v1/contracts', status: 'accessible' },
        { api: 'Edge DNS', path: 'edgedns/v1/zones', status: 'forbidden', detail: 'HTTP 403' },
      ]),
    ).toBe('accessible  Contracts API\nforbidden   Edge DNS (HTTP 403)');
  });
});

test('classifyProbeError treats non-HTTP errors as failures', () => {
  expect(classifyProbeError('boom')).toEqual({ status: 'failed', detail: 'boom' });
});
