import assert from 'node:assert/strict';
import test from 'node:test';
import { FetchError, ProbeError } from '../src/errors.ts';
import { extractMetrics, unavailableMetrics } from '../src/metrics.ts';
import { buildReport, categoriesFromName, renderReport, reportColumns, rowCells } from '../src/report.ts';
import type { LatencySample, RunResult, TargetResult } from '../src/types.ts';

function latency(target: string, durations: number[]): LatencySample[] {
  return durations.map((duration, index) => ({ target, index, duration }));
}

function result(name: string, payload: Record<string, unknown>, durations: number[]): TargetResult {
  return {
    target: { name, url: `https://${name}.example.test` },
    metrics: extractMetrics(name, payload),
    metricsResponseSeconds: 0.2,
    latency: latency(name, durations),
    errors: [],
  };
}

function run(results: TargetResult[]): RunResult {
  return { results: new Map(results.map(r => [r.target.name, r])), configurationErrors: [] };
}

const ALL_METRICS = ['startupSeconds', 'memoryMB', 'responseSeconds', 'coldSeconds', 'warmSeconds'] as const;

const fourServices = () => run([
  result('jvm-direct', { imageType: 'JVM', startupTimeSeconds: '4.0', memory: { usedMB: '200' } }, [2, 0.4, 0.4]),
  result('jvm-pooled', { imageType: 'JVM', startupTimeSeconds: '4.0', memory: {} }, [3, 0.6, 0.6]),
  result('native-direct', { imageType: 'Native (GraalVM)', startupTimeSeconds: '1.0', memory: { usedMB: '50' } }, [1, 0.2, 0.2]),
  result('native-pooled', { imageType: 'Native (GraalVM)', startupTimeSeconds: '1.0', memory: { usedMB: '70' } }, [1, 0.3, 0.3]),
]);

test('group means count only targets with a defined value', () => {
  const report = buildReport(fourServices(), { metrics: ['memoryMB'], groupBy: 'imageType', failed: [] });
  assert.equal(report.baseline, 'JVM');
  assert.deepEqual(report.comparisons[0].groups, [
    { key: 'JVM', mean: 200, count: 1 },
    { key: 'Native (GraalVM)', mean: 60, count: 2 },
  ]);
  assert.deepEqual(report.comparisons[0].deltas, [{ group: 'Native (GraalVM)', percent: 70, speedup: undefined }]);
});

test('startup comparison reports percent delta and speedup against the baseline group', () => {
  const report = buildReport(fourServices(), { metrics: ['startupSeconds'], groupBy: 'imageType', failed: [] });
  assert.deepEqual(report.comparisons[0].deltas, [{ group: 'Native (GraalVM)', percent: 75, speedup: 4 }]);
});

test('an explicit baseline flips the comparison', () => {
  const report = buildReport(fourServices(), {
    metrics: ['startupSeconds'],
    groupBy: 'imageType',
    baseline: 'Native (GraalVM)',
    failed: [],
  });
  assert.deepEqual(report.comparisons[0].deltas, [{ group: 'JVM', percent: -300, speedup: 0.25 }]);
});

test('rankings find extremes per metric with ties to the first target', () => {
  const report = buildReport(fourServices(), { metrics: [...ALL_METRICS], groupBy: 'imageType', failed: [] });
  const byMetric = Object.fromEntries(report.rankings.map(r => [r.metric, [r.min.target, r.max.target]]));
  assert.deepEqual(byMetric, {
    startupSeconds: ['native-direct', 'jvm-direct'],
    memoryMB: ['native-direct', 'jvm-direct'],
    responseSeconds: ['jvm-direct', 'jvm-direct'],
    coldSeconds: ['native-direct', 'jvm-pooled'],
    warmSeconds: ['native-direct', 'jvm-pooled'],
  });
});

test('table cells show N/A for missing values and never fail', () => {
  const failedFetch: TargetResult = {
    target: { name: 'down_service', url: 'https://down.example.test' },
    metrics: unavailableMetrics('down_service'),
    latency: [],
    errors: [new FetchError('down_service', 'fetch failed'), new ProbeError('down_service', 1, 'fetch failed')],
  };
  const report = buildReport(run([failedFetch]), { metrics: [...ALL_METRICS], groupBy: 'imageType', failed: ['down_service'] });

  assert.deepEqual(reportColumns(report), [
    'Service', 'Type', 'Pool', 'Startup (s)', 'Memory (MB)', 'Metrics Response (s)', 'Cold (s)', 'Warm (s)', 'Warm Requests',
  ]);
  assert.deepEqual(rowCells(report), [{
    'Service': 'down-service',
    'Type': 'N/A',
    'Pool': 'N/A',
    'Startup (s)': 'N/A',
    'Memory (MB)': 'N/A',
    'Metrics Response (s)': 'N/A',
    'Cold (s)': 'N/A',
    'Warm (s)': 'N/A',
    'Warm Requests': '0',
  }]);
  assert.deepEqual(report.rankings, []);
  assert.deepEqual(report.comparisons, []);
  assert.equal(typeof renderReport(report, 'table'), 'string');
});

test('warm cell is N/A when only the cold request was made', () => {
  const single = result('one-shot', { imageType: 'JVM' }, [1.5]);
  const report = buildReport(run([single]), { metrics: ['coldSeconds', 'warmSeconds'], groupBy: 'imageType', failed: [] });
  const [cells] = rowCells(report);
  assert.equal(cells['Cold (s)'], '1.500');
  assert.equal(cells['Warm (s)'], 'N/A');
  assert.equal(cells['Warm Requests'], '0');
});

test('csv output has a header and one line per target', () => {
  const report = buildReport(fourServices(), { metrics: ['startupSeconds', 'memoryMB'], groupBy: 'imageType', failed: [] });
  assert.equal(renderReport(report, 'csv'), [
    'Service,Type,Pool,Startup (s),Memory (MB)',
    'jvm-direct,JVM,N/A,4.000,200.0',
    'jvm-pooled,JVM,N/A,4.000,N/A',
    'native-direct,Native (GraalVM),N/A,1.000,50.0',
    'native-pooled,Native (GraalVM),N/A,1.000,70.0',
  ].join('\n'));
});

test('json output uses null for unavailable values', () => {
  const report = buildReport(fourServices(), { metrics: ['memoryMB'], groupBy: 'imageType', failed: [] });
  const parsed = JSON.parse(renderReport(report, 'json'));
  assert.deepEqual(parsed.targets[1], {
    name: 'jvm-pooled',
    imageType: 'JVM',
    connectionPool: 'N/A',
    profile: 'N/A',
    memoryMB: null,
    warmCount: 2,
    ok: true,
  });
  assert.equal(parsed.comparisons[0].deltas[0].percent, 70);
});

test('within compares groups separately inside each value of a second field', () => {
  const report = buildReport(run([
    result('jvm-direct', { imageType: 'JVM', connectionPool: 'Cloud SQL Connector' }, [2]),
    result('jvm-pooled', { imageType: 'JVM', connectionPool: 'PgBouncer' }, [1]),
    result('native-direct', { imageType: 'Native (GraalVM)', connectionPool: 'Cloud SQL Connector' }, [1]),
    result('native-pooled', { imageType: 'Native (GraalVM)', connectionPool: 'PgBouncer' }, [0.5]),
  ]), { metrics: ['coldSeconds'], groupBy: 'connectionPool', within: 'imageType', failed: [] });

  assert.equal(report.baseline, 'Cloud SQL Connector');
  assert.deepEqual(report.comparisons, [
    {
      metric: 'coldSeconds',
      within: 'JVM',
      groups: [
        { key: 'Cloud SQL Connector', mean: 2, count: 1 },
        { key: 'PgBouncer', mean: 1, count: 1 },
      ],
      baseline: 'Cloud SQL Connector',
      deltas: [{ group: 'PgBouncer', percent: 50, speedup: 2 }],
    },
    {
      metric: 'coldSeconds',
      within: 'Native (GraalVM)',
      groups: [
        { key: 'Cloud SQL Connector', mean: 1, count: 1 },
        { key: 'PgBouncer', mean: 0.5, count: 1 },
      ],
      baseline: 'Cloud SQL Connector',
      deltas: [{ group: 'PgBouncer', percent: 50, speedup: 2 }],
    },
  ]);
  assert.equal(JSON.parse(renderReport(report, 'json')).comparisons[1].within, 'Native (GraalVM)');
});

test('categoriesFromName reads image type and pool from the service name', () => {
  assert.deepEqual(categoriesFromName('jvm-cloud-sql'), { imageType: 'JVM', connectionPool: 'Direct' });
  assert.deepEqual(categoriesFromName('native_cloud_sql_pgbouncer'), { imageType: 'Native (GraalVM)', connectionPool: 'PgBouncer' });
  assert.deepEqual(categoriesFromName('down_service'), {});
});

test('inferred categories let latency-only runs compare image types per pool', () => {
  const probed = (name: string, durations: number[]): TargetResult => ({
    target: { name, url: `https://${name}.example.test` },
    metrics: [],
    latency: latency(name, durations),
    errors: [],
  });
  const report = buildReport(run([
    probed('jvm-cloud-sql', [2, 1, 1]),
    probed('jvm-cloud-sql-pgbouncer', [2, 0.5, 0.5]),
    probed('native-cloud-sql', [1, 0.25, 0.25]),
    probed('native-cloud-sql-pgbouncer', [1, 0.25, 0.25]),
  ]), { metrics: ['warmSeconds'], groupBy: 'imageType', within: 'connectionPool', inferCategories: true, failed: [] });

  assert.deepEqual(report.rows.map(r => [r.imageType, r.connectionPool, r.profile]), [
    ['JVM', 'Direct', 'N/A'],
    ['JVM', 'PgBouncer', 'N/A'],
    ['Native (GraalVM)', 'Direct', 'N/A'],
    ['Native (GraalVM)', 'PgBouncer', 'N/A'],
  ]);
  assert.deepEqual(report.comparisons.map(c => [c.within, c.deltas]), [
    ['Direct', [{ group: 'Native (GraalVM)', percent: 75, speedup: 4 }]],
    ['PgBouncer', [{ group: 'Native (GraalVM)', percent: 50, speedup: 2 }]],
  ]);
});

test('without inferred categories a latency-only run has nothing to group', () => {
  const report = buildReport(run([
    { target: { name: 'jvm-cloud-sql', url: 'https://jvm.example.test' }, metrics: [], latency: latency('jvm-cloud-sql', [1, 1]), errors: [] },
    { target: { name: 'native-cloud-sql', url: 'https://native.example.test' }, metrics: [], latency: latency('native-cloud-sql', [1, 1]), errors: [] },
  ]), { metrics: ['warmSeconds'], groupBy: 'imageType', failed: [] });
  assert.equal(report.baseline, undefined);
  assert.deepEqual(report.comparisons, []);
});
