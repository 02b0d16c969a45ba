import { describe, it, expect, vi } from 'vitest';
import { SnapshotWriter, DatasetSnapshot } from '../dataset/snapshot.js';
import type { TableName, TableRecord } from '../dataset/tables.js';
import { contextFor, consistentTables, targetFor } from '../../tests/helpers/dataset-fixture.js';
import { defineChecker, type Checker } from './checker.js';
import { SanityContext } from './context.js';
import { runCheckers } from './engine.js';
import { LoadError } from './errors.js';
import { RuleRegistry } from './registry.js';
import { EXCLUDED_REASON, NOT_LOADED_REASON } from './report.js';

function passing(id: string): Checker {
  return defineChecker({ id, name: `rule-${id}`, severity: 'ERROR', description: 'passes', check: () => null });
}

function failing(id: string, severity: 'ERROR' | 'WARNING' = 'ERROR'): Checker {
  return defineChecker({
    id,
    name: `rule-${id}`,
    severity,
    description: 'fails',
    check: () => [`${id} violated`],
  });
}

function selectionOf(checkers: Checker[], excludes: string[] = []) {
  const registry = new RuleRegistry();
  registry.registerAll(checkers);
  return registry.resolve(excludes);
}

describe('runCheckers', () => {
  const context = contextFor(consistentTables());

  it('produces one report per rule in registry order', async () => {
    const selection = selectionOf([failing('REF001'), passing('STR001'), passing('REC001')]);
    const reports = await runCheckers(context, selection);
    expect(reports.map((r) => [r.id, r.status])).toEqual([
      ['STR001', 'PASSED'],
      ['REC001', 'PASSED'],
      ['REF001', 'FAILED'],
    ]);
  });

  it('is deterministic for a fixed snapshot and exclude set', async () => {
    const selection = selectionOf([passing('STR001'), failing('REF001'), failing('FMT001', 'WARNING')], ['REC']);
    const first = await runCheckers(context, selection);
    const second = await runCheckers(context, selection);
    expect(second).toEqual(first);
  });

  it('keeps reasons null only for passed reports', async () => {
    const reports = await runCheckers(context, selectionOf([passing('STR001'), failing('REF001')]));
    expect(reports[0].reasons).toBeNull();
    expect(reports[1].reasons).toEqual(['REF001 violated']);
  });

  it('materializes excluded rules as SKIPPED without running them', async () => {
    const check = vi.fn(() => ['should not run']);
    const excludedRule = defineChecker({ id: 'REF002', name: 'x', severity: 'ERROR', description: '', check });
    const selection = selectionOf([passing('STR001'), failing('REF001'), excludedRule], ['REF']);

    const reports = await runCheckers(context, selection);

    expect(check).not.toHaveBeenCalled();
    const refReports = reports.filter((r) => r.id.startsWith('REF'));
    expect(refReports).toHaveLength(2);
    for (const report of refReports) {
      expect(report.status).toBe('SKIPPED');
      expect(report.reasons).toEqual([EXCLUDED_REASON]);
    }
  });

  it('converts a throwing checker into a FAILED report and continues', async () => {
    const broken = defineChecker({
      id: 'REC002',
      name: 'broken',
      severity: 'WARNING',
      description: '',
      check: () => {
        throw new TypeError('boom');
      },
    });
    const reports = await runCheckers(context, selectionOf([broken, passing('REF001')]));

    expect(reports[0]).toMatchObject({
      id: 'REC002',
      status: 'FAILED',
      reasons: ['REC002 raised an internal error: TypeError: boom'],
    });
    expect(reports[1].status).toBe('PASSED');
  });

  it('skips table rules when the dataset did not load', async () => {
    const notLoaded = new SanityContext(
      targetFor('/nonexistent/ds/0'),
      null,
      new LoadError('Annotation directory not found', 'not-found', '/nonexistent/ds/0/annotation'),
    );
    const structural = defineChecker({
      id: 'STR002',
      name: 'structural',
      severity: 'ERROR',
      description: '',
      requiresSnapshot: false,
      check: (ctx) => (ctx.loadError ? [ctx.loadError.message] : null),
    });

    const reports = await runCheckers(notLoaded, selectionOf([structural, passing('REF001')]));

    expect(reports[0]).toMatchObject({ status: 'FAILED', reasons: ['Annotation directory not found'] });
    expect(reports[1]).toMatchObject({ status: 'SKIPPED', reasons: [NOT_LOADED_REASON] });
  });

  it('reports SKIPPED with the reason a checker gives', async () => {
    const conditional = defineChecker({
      id: 'REF012',
      name: 'conditional',
      severity: 'ERROR',
      description: '',
      skipReason: () => 'Missing lidarseg.json',
      check: () => ['unreachable'],
    });
    const [report] = await runCheckers(context, selectionOf([conditional]));
    expect(report).toMatchObject({ status: 'SKIPPED', reasons: ['Missing lidarseg.json'], fixed: false });
  });
});

describe('runCheckers fix cycle', () => {
  function fixableRule(fixResult: boolean | 'throw') {
    const state = { broken: true };
    const fix = vi.fn(async () => {
      if (fixResult === 'throw') throw new Error('nope');
      if (fixResult) state.broken = false;
      return fixResult;
    });
    const checker = defineChecker({
      id: 'REC007',
      name: 'fixable',
      severity: 'ERROR',
      description: '',
      check: () => (state.broken ? ['index missing on cat-2'] : null),
      fix,
    });
    return { checker, fix };
  }

  function writerContext() {
    const snapshot = new DatasetSnapshot('/nonexistent/ds/0', new Map());
    const ctx = new SanityContext(targetFor('/nonexistent/ds/0'), snapshot);
    return { ctx, writer: new SnapshotWriter(snapshot) };
  }

  it('marks a repaired failure fixed and keeps the original reasons', async () => {
    const { checker } = fixableRule(true);
    const { ctx, writer } = writerContext();

    const [report] = await runCheckers(ctx, selectionOf([checker]), { fix: true, writer });

    expect(report).toMatchObject({ status: 'PASSED', fixed: true, reasons: ['index missing on cat-2'] });
    expect(checker.check(ctx)).toBeNull();
  });

  it('does not call fix unless requested', async () => {
    const { checker, fix } = fixableRule(true);
    const { ctx, writer } = writerContext();

    const [report] = await runCheckers(ctx, selectionOf([checker]), { fix: false, writer });

    expect(fix).not.toHaveBeenCalled();
    expect(report).toMatchObject({ status: 'FAILED', fixed: false });
  });

  it('leaves the report FAILED when fix reports no repair', async () => {
    const { checker } = fixableRule(false);
    const { ctx, writer } = writerContext();

    const [report] = await runCheckers(ctx, selectionOf([checker]), { fix: true, writer });

    expect(report).toMatchObject({ status: 'FAILED', fixed: false, reasons: ['index missing on cat-2'] });
  });

  it('appends the error when fix throws', async () => {
    const { checker } = fixableRule('throw');
    const { ctx, writer } = writerContext();

    const [report] = await runCheckers(ctx, selectionOf([checker]), { fix: true, writer });

    expect(report).toMatchObject({
      status: 'FAILED',
      fixed: false,
      reasons: ['index missing on cat-2', 'fix failed: Error: nope'],
    });
  });

  it('undoes the changes of a fix that does not repair or throws', async () => {
    const tables = new Map<TableName, readonly TableRecord[]>([['category', [{ token: 'cat-1', index: null }]]]);
    const snapshot = new DatasetSnapshot('/nonexistent/ds/0', tables);
    const ctx = new SanityContext(targetFor('/nonexistent/ds/0'), snapshot);
    const writer = new SnapshotWriter(snapshot);
    const halfFix = (id: string, outcome: 'unrepaired' | 'throw') =>
      defineChecker({
        id,
        name: `half-fix-${id}`,
        severity: 'ERROR',
        description: '',
        check: () => ['still broken'],
        fix: async (w) => {
          w.update('category', 0, { index: 3 });
          if (outcome === 'throw') throw new Error('half done');
          return false;
        },
      });

    const reports = await runCheckers(ctx, selectionOf([halfFix('REC007', 'unrepaired'), halfFix('REC009', 'throw')]), {
      fix: true,
      writer,
    });

    expect(reports.map((r) => r.status)).toEqual(['FAILED', 'FAILED']);
    expect(snapshot.get('category', 'cat-1')).toEqual({ token: 'cat-1', index: null });
    expect(writer.pending()).toEqual([]);
  });
});
