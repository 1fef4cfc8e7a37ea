import assert from 'node:assert/strict';
import test from 'node:test';
import { BenchClient } from '../src/client.ts';
import { extractMetrics, fetchMetrics } from '../src/metrics.ts';
import { installFetchMock, sequenceClock } from './cli-test-helpers.ts';

const target = { name: 'jvm-cloud-sql', url: 'https://jvm.example.test' };

function valueOf(samples: { field: string; value: number | string }[], field: string): number | string | undefined {
  return samples.find(s => s.field === field)?.value;
}

test('fetchMetrics reads numeric strings, nested memory and categories', async () => {
  const mock = installFetchMock(() => ({
    body: {
      startupTimeSeconds: '3.250',
      memory: { usedMB: '182.40', totalMB: '256.00' },
      imageType: 'JVM',
      connectionPool: 'Cloud SQL Connector',
      profile: 'cloudsql',
    },
  }));
  try {
    const client = new BenchClient({ now: sequenceClock([1000, 1250]) });
    const outcome = await fetchMetrics(client, target);
    assert.ok(outcome.ok);
    assert.equal(mock.calls[0].url, 'https://jvm.example.test/metrics');
    assert.equal(outcome.value.responseSeconds, 0.25);
    assert.deepEqual(outcome.value.samples, [
      { target: 'jvm-cloud-sql', field: 'startupTimeSeconds', value: 3.25, unit: 's' },
      { target: 'jvm-cloud-sql', field: 'memoryUsedMB', value: 182.4, unit: 'MB' },
      { target: 'jvm-cloud-sql', field: 'imageType', value: 'JVM', unit: '' },
      { target: 'jvm-cloud-sql', field: 'connectionPool', value: 'Cloud SQL Connector', unit: '' },
      { target: 'jvm-cloud-sql', field: 'profile', value: 'cloudsql', unit: '' },
    ]);
  } finally {
    mock.restore();
  }
});

test('fetchMetrics reports a missing memory.usedMB as N/A without failing', async () => {
  const mock = installFetchMock(() => ({
    body: { startupTimeSeconds: 0.12, imageType: 'Native (GraalVM)', memory: { totalMB: '64.00' } },
  }));
  try {
    const outcome = await fetchMetrics(new BenchClient(), target);
    assert.ok(outcome.ok);
    assert.equal(valueOf(outcome.value.samples, 'memoryUsedMB'), 'N/A');
    assert.equal(valueOf(outcome.value.samples, 'startupTimeSeconds'), 0.12);
    assert.equal(valueOf(outcome.value.samples, 'connectionPool'), 'N/A');
  } finally {
    mock.restore();
  }
});

test('fetchMetrics returns a FetchError on an error status', async () => {
  const mock = installFetchMock(() => ({ status: 503, body: 'Service Unavailable' }));
  try {
    const outcome = await fetchMetrics(new BenchClient(), target);
    assert.ok(!outcome.ok);
    assert.equal(outcome.error.statusCode, 503);
    assert.equal(outcome.error.target, 'jvm-cloud-sql');
  } finally {
    mock.restore();
  }
});

test('fetchMetrics returns a FetchError for a body that is not a JSON object', async () => {
  const mock = installFetchMock((url) => ({ body: url.includes('jvm') ? '<html>' : [1, 2] }));
  try {
    const html = await fetchMetrics(new BenchClient(), target);
    assert.ok(!html.ok);
    assert.equal(html.error.detail, 'response is not valid JSON');

    const array = await fetchMetrics(new BenchClient(), { name: 'native', url: 'https://native.example.test' });
    assert.ok(!array.ok);
    assert.equal(array.error.detail, 'response is not a JSON object');
  } finally {
    mock.restore();
  }
});

test('fetchMetrics returns a FetchError when the connection fails', async () => {
  const mock = installFetchMock(() => ({ networkError: true }));
  try {
    const outcome = await fetchMetrics(new BenchClient(), target);
    assert.ok(!outcome.ok);
    assert.equal(outcome.error.detail, 'fetch failed');
  } finally {
    mock.restore();
  }
});

test('extractMetrics treats unparsable numbers and empty strings as N/A', () => {
  const samples = extractMetrics('t', { startupTimeSeconds: 'soon', imageType: '', memory: 'lots' });
  assert.equal(valueOf(samples, 'startupTimeSeconds'), 'N/A');
  assert.equal(valueOf(samples, 'imageType'), 'N/A');
  assert.equal(valueOf(samples, 'memoryUsedMB'), 'N/A');
});
