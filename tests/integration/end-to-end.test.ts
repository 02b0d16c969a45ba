/**
 * End-to-end runs of the built-in catalog over datasets on disk.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { consistentTables, recordOf, writeDataset } from '../helpers/dataset-fixture.js';
import { resolveExitCode } from '../../src/sanity/exit-status.js';
import { NOT_LOADED_REASON } from '../../src/sanity/report.js';
import { scanDatasets } from '../../src/sanity/runner.js';
import { datasetStatus, summarize } from '../../src/sanity/summary.js';
import type { Report, SanityResult } from '../../src/types/sanity.js';

function only<T>(items: readonly T[]): T {
  expect(items).toHaveLength(1);
  return items[0];
}

function reportOf(result: SanityResult, id: string): Report {
  const report = result.reports.find((r) => r.id === id);
  if (!report) throw new Error(`no report for ${id}`);
  return report;
}

describe('sanity run end to end', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), 'sanity-e2e-test-'));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it('passes a consistent dataset', async () => {
    await writeDataset(join(tmpDir, 'ds', '0'));

    const outcome = await scanDatasets(join(tmpDir, 'ds'));
    const result = only(outcome.results);

    expect(result.datasetId).toBe('ds');
    expect(result.version).toBe(0);
    expect(result.reports).toHaveLength(74);
    expect(summarize(result.reports)).toEqual({ passed: 65, failed: 0, skipped: 9, warnings: 0, fixed: 0 });
    expect(result.reports.filter((r) => r.status === 'SKIPPED').map((r) => r.id)).toEqual([
      'REF012',
      'REF015',
      'REF021',
      'REF022',
      'REF023',
      'REF024',
      'REF026',
      'REF027',
      'REF030',
    ]);
    expect(datasetStatus(result.reports)).toBe('SUCCESS');
    expect(resolveExitCode(outcome.results, false)).toBe(0);
    expect(resolveExitCode(outcome.results, true)).toBe(0);
    expect(outcome.cancelled).toBe(false);
  });

  it('keeps structure rules running when annotation/ is missing', async () => {
    const dataRoot = join(tmpDir, 'ds', '0');
    await writeDataset(dataRoot);
    await rm(join(dataRoot, 'annotation'), { recursive: true });

    const outcome = await scanDatasets(join(tmpDir, 'ds'));
    const result = only(outcome.results);

    expect(reportOf(result, 'STR002')).toMatchObject({
      status: 'FAILED',
      reasons: [`Missing 'annotation' under ${dataRoot}`],
    });
    expect(reportOf(result, 'STR007')).toMatchObject({
      status: 'SKIPPED',
      reasons: ["Missing 'annotation' directory"],
    });
    expect(reportOf(result, 'TIV001')).toMatchObject({
      status: 'FAILED',
      reasons: [`Annotation directory not found: ${join(dataRoot, 'annotation')}`],
    });
    for (const report of result.reports.filter((r) => ['REC', 'REF', 'FMT'].includes(r.id.slice(0, 3)))) {
      expect(report).toMatchObject({ status: 'SKIPPED', reasons: [NOT_LOADED_REASON] });
    }
    expect(summarize(result.reports)).toEqual({ passed: 7, failed: 2, skipped: 65, warnings: 0, fixed: 0 });
    expect(datasetStatus(result.reports)).toBe('FAILURE');
    expect(resolveExitCode(outcome.results, false)).toBe(1);
  });

  it('reports a dangling foreign key once and fails the run', async () => {
    const tables = consistentTables();
    recordOf(tables, 'sample_data', 'sd-2').ego_pose_token = 'ep-missing';
    await writeDataset(join(tmpDir, 'ds', '0'), tables);

    const { results } = await scanDatasets(join(tmpDir, 'ds'));
    const result = only(results);

    expect(result.reports.filter((r) => r.status === 'FAILED').map((r) => r.id)).toEqual(['REF006']);
    expect(reportOf(result, 'REF006').reasons).toEqual([
      "sample_data sd-2: ego_pose_token 'ep-missing' not found in 'ego_pose'",
    ]);
    expect(resolveExitCode(results, false)).toBe(1);
  });

  it('repairs stale counts on disk with fix enabled', async () => {
    const dataRoot = join(tmpDir, 'ds', '0');
    const tables = consistentTables();
    recordOf(tables, 'scene', 'scene-1').nbr_samples = 9;
    await writeDataset(dataRoot, tables);

    const unfixed = only((await scanDatasets(join(tmpDir, 'ds'))).results);
    expect(reportOf(unfixed, 'REC009').status).toBe('FAILED');
    expect(resolveExitCode([unfixed], false)).toBe(0);
    expect(resolveExitCode([unfixed], true)).toBe(1);

    const fixed = only((await scanDatasets(join(tmpDir, 'ds'), { fix: true })).results);
    expect(reportOf(fixed, 'REC009')).toMatchObject({
      status: 'PASSED',
      fixed: true,
      reasons: ['scene scene-1: nbr_samples is 9 but 3 sample record(s) refer to it'],
    });
    expect(summarize(fixed.reports)).toMatchObject({ failed: 0, warnings: 1, fixed: 1 });
    expect(resolveExitCode([fixed], true)).toBe(0);

    const scene: unknown = JSON.parse(await readFile(join(dataRoot, 'annotation', 'scene.json'), 'utf-8'));
    expect(scene).toMatchObject([{ token: 'scene-1', nbr_samples: 3 }]);

    const rerun = only((await scanDatasets(join(tmpDir, 'ds'))).results);
    expect(reportOf(rerun, 'REC009')).toMatchObject({ status: 'PASSED', fixed: false, reasons: null });
  });

  it('orders results by dataset id regardless of completion order', async () => {
    await writeDataset(join(tmpDir, 'zeta', '1'));
    await writeDataset(join(tmpDir, 'alpha', '0'));
    await writeDataset(join(tmpDir, 'mid'));

    const completed: string[] = [];
    const outcome = await scanDatasets(tmpDir, {
      concurrency: 3,
      onResult: (result) => completed.push(result.datasetId),
    });

    expect(outcome.results.map((r) => [r.datasetId, r.version])).toEqual([
      ['alpha', 0],
      ['mid', null],
      ['zeta', 1],
    ]);
    expect([...completed].sort()).toEqual(['alpha', 'mid', 'zeta']);
    // Unversioned dataset: only the version-directory warning fails
    expect(reportOf(outcome.results[1], 'STR001').status).toBe('FAILED');
    expect(resolveExitCode(outcome.results, false)).toBe(0);
  });

  it('checks the requested version instead of the latest', async () => {
    await writeDataset(join(tmpDir, 'ds', '0'));
    await writeDataset(join(tmpDir, 'ds', '1'));

    const latest = await scanDatasets(join(tmpDir, 'ds'));
    expect(only(latest.results).version).toBe(1);

    const pinned = await scanDatasets(join(tmpDir, 'ds'), { version: 0 });
    expect(only(pinned.results).version).toBe(0);

    const missing = await scanDatasets(join(tmpDir, 'ds'), { version: 4 });
    const result = only(missing.results);
    expect(reportOf(result, 'STR001').status).toBe('FAILED');
    expect(reportOf(result, 'TIV001').reasons).toEqual([`Dataset directory not found: ${join(tmpDir, 'ds', '4')}`]);
  });

  it('stops scheduling when cancelled', async () => {
    await writeDataset(join(tmpDir, 'a', '0'));
    await writeDataset(join(tmpDir, 'b', '0'));

    const controller = new AbortController();
    const outcome = await scanDatasets(tmpDir, {
      concurrency: 1,
      signal: controller.signal,
      onResult: () => controller.abort(),
    });

    expect(outcome.cancelled).toBe(true);
    expect(outcome.results.map((r) => r.datasetId)).toEqual(['a']);
  });

  it('returns exclude warnings alongside results', async () => {
    await writeDataset(join(tmpDir, 'ds', '0'));

    const outcome = await scanDatasets(join(tmpDir, 'ds'), { excludes: ['REF', 'FMT999'] });
    const result = only(outcome.results);

    expect(outcome.warnings.map((w) => w.target)).toEqual(['FMT999']);
    expect(reportOf(result, 'REF001')).toMatchObject({ status: 'SKIPPED', reasons: ['excluded by configuration'] });
    expect(result.reports).toHaveLength(74);
  });
});
