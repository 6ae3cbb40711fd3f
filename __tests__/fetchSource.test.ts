import { fetchSource } from '../lib/sources/fetchSource';
import { HttpError } from '../lib/errors';
import { createRunMetrics } from '../lib/metrics';
import { FakeApiClient } from './helpers/fakeClient';

describe('fetchSource', () => {
  test('returns the parsed value', async () => {
    const client = new FakeApiClient({ 'cps/v2/enrollments': { enrollments: [1, 2] } });
    const outcome = await fetchSource(
      { client },
      'cps/v2/enrollments',
      (data) => (data && typeof data === 'object' && 'enrollments' in data ? data.enrollments : []),
      [],
      'test-source',
    );
    expect(outcome).toEqual({ ok: true, value: [1, 2] });
  });

  test('passes query params through', async () => {
    const client = new FakeApiClient({ 'papi/v1/properties': {} });
    await fetchSource({ client }, 'papi/v1/properties', () => null, null, 'test-source', { params: { contractId: 'C1' } });
    expect(client.calls).toEqual([{ path: 'papi/v1/properties', params: { contractId: 'C1' } }]);
  });

  test('a failed request degrades to the empty value and is counted', async () => {
    const metrics = createRunMetrics();
    const client = new FakeApiClient({ 'appsec/v1/configs': new HttpError(403, '/appsec/v1/configs', 'forbidden') });
    const outcome = await fetchSource({ client, metrics }, 'appsec/v1/configs', () => ['never'], [], 'appsec-configs');

    expect(outcome).toEqual({ ok: false, value: [], reason: 'GET /appsec/v1/configs failed with HTTP 403' });
    const text = await metrics.registry.getSingleMetricAsString('cdn_reporter_fetch_failures_total');
    expect(text).toContain('cdn_reporter_fetch_failures_total{resource="appsec-configs"} 1');
  });

  test('a parser that throws degrades as well', async () => {
    const client = new FakeApiClient({ 'gtm/v1/domains': {} });
    const outcome = await fetchSource(
      { client },
      'gtm/v1/domains',
      () => {
        throw new Error('unexpected shape');
      },
      [],
      'gtm-domains',
    );
    expect(outcome).toEqual({ ok: false, value: [], reason: 'unexpected shape' });
  });
});
