/**
 * Sanity runs over one dataset version or every dataset under a root.
 *
 * Dataset versions share no state, so they are checked in parallel
 * chunks; rules within one version always run sequentially.
 *
 * @module sanity/runner
 */

import { availableParallelism } from 'os';
import { discoverTargets, type DatasetTarget } from '../dataset/discovery.js';
import { loadSnapshot } from '../dataset/loader.js';
import { SnapshotWriter, type DatasetSnapshot } from '../dataset/snapshot.js';
import type { SanityResult } from '../types/sanity.js';
import { SanityContext } from './context.js';
import { runCheckers } from './engine.js';
import { LoadError, UnknownExcludeTargetError, describeError } from './errors.js';
import type { RuleRegistry, RuleSelection } from './registry.js';
import { createDefaultRegistry } from './rules/index.js';
import { sortResults } from './summary.js';

export interface SanityOptions {
  /** Rule ids or group tags to skip. */
  excludes?: readonly string[];
  /** Attempt fixes for fixable rules. */
  fix?: boolean;
  /** Defaults to the built-in catalog. */
  registry?: RuleRegistry;
}

export interface ScanOptions extends SanityOptions {
  /** Version to check instead of the latest. */
  version?: number;
  /** Dataset versions checked at once. Defaults to the CPU count. */
  concurrency?: number;
  /** Stops scheduling further dataset versions. */
  signal?: AbortSignal;
  /** Called as each dataset version completes. */
  onResult?: (result: SanityResult) => void;
}

export interface ScanOutcome {
  /** Sorted by dataset id, then version. */
  results: SanityResult[];
  warnings: UnknownExcludeTargetError[];
  /** True when the signal aborted before every target ran. */
  cancelled: boolean;
}

async function load(target: DatasetTarget): Promise<DatasetSnapshot | LoadError> {
  try {
    const loaded = await loadSnapshot(target.dataRoot);
    return loaded.ok ? loaded.snapshot : loaded.error;
  } catch (err) {
    return new LoadError(`Could not load dataset: ${describeError(err)}`, 'not-found', target.dataRoot);
  }
}

/**
 * Check one dataset version against a resolved selection.
 */
export async function checkTarget(
  target: DatasetTarget,
  selection: RuleSelection,
  options: { fix?: boolean } = {},
): Promise<SanityResult> {
  const loaded = await load(target);
  const snapshot = loaded instanceof LoadError ? null : loaded;
  const context = new SanityContext(target, snapshot, loaded instanceof LoadError ? loaded : null);
  const reports = await runCheckers(context, selection, {
    fix: options.fix ?? false,
    writer: snapshot ? new SnapshotWriter(snapshot) : null,
  });
  return { datasetId: target.datasetId, version: target.version, reports };
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Discover and check every dataset version under `scanRoot`.
 */
export async function scanDatasets(scanRoot: string, options: ScanOptions = {}): Promise<ScanOutcome> {
  const registry = options.registry ?? createDefaultRegistry();
  const selection = registry.resolve(options.excludes ?? []);
  const targets = await discoverTargets(scanRoot, { version: options.version });
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? availableParallelism()));

  const results: SanityResult[] = [];
  let cancelled = false;
  for (const batch of chunk(targets, concurrency)) {
    if (options.signal?.aborted) {
      cancelled = true;
      break;
    }
    const done = await Promise.all(
      batch.map(async (target) => {
        const result = await checkTarget(target, selection, { fix: options.fix });
        options.onResult?.(result);
        return result;
      }),
    );
    results.push(...done);
  }

  return { results: sortResults(results), warnings: selection.warnings, cancelled };
}
