/**
 * Result aggregation: per-version counts, overall status and ordering.
 *
 * @module sanity/summary
 */

import type { DatasetStatus, Report, SanityResult, Summary } from '../types/sanity.js';
import { isUnresolvedFailure } from './report.js';

/**
 * Count reports. A fixed WARNING counts in both `warnings` and `fixed`.
 */
export function summarize(reports: readonly Report[]): Summary {
  const summary: Summary = { passed: 0, failed: 0, skipped: 0, warnings: 0, fixed: 0 };
  for (const report of reports) {
    if (report.status === 'PASSED') summary.passed++;
    else if (isUnresolvedFailure(report)) summary.failed++;
    else if (report.status === 'SKIPPED') summary.skipped++;

    if (report.fixed) summary.fixed++;
    if (report.severity === 'WARNING' && report.status !== 'SKIPPED' && report.reasons !== null) {
      summary.warnings++;
    }
  }
  return summary;
}

/** FAILURE when any ERROR rule failed and was not fixed. */
export function datasetStatus(reports: readonly Report[]): DatasetStatus {
  const hasErrorFail = reports.some((r) => r.severity === 'ERROR' && isUnresolvedFailure(r));
  return hasErrorFail ? 'FAILURE' : 'SUCCESS';
}

/** Stable order: dataset id, then version (unversioned first). */
export function sortResults(results: readonly SanityResult[]): SanityResult[] {
  return [...results].sort((a, b) => {
    if (a.datasetId !== b.datasetId) return a.datasetId < b.datasetId ? -1 : 1;
    return (a.version ?? -1) - (b.version ?? -1);
  });
}
