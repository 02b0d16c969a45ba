/**
 * Report constructors.
 *
 * @module sanity/report
 */

import type { Report, Rule } from '../types/sanity.js';

export const EXCLUDED_REASON = 'excluded by configuration';
export const NOT_LOADED_REASON = 'dataset not loaded';

function base(rule: Rule): Pick<Report, 'id' | 'name' | 'severity' | 'description'> {
  return {
    id: rule.id,
    name: rule.name,
    severity: rule.severity,
    description: rule.description,
  };
}

export function passedReport(rule: Rule): Report {
  return { ...base(rule), status: 'PASSED', reasons: null, fixed: false };
}

export function failedReport(rule: Rule, reasons: readonly string[]): Report {
  if (reasons.length === 0) {
    throw new RangeError(`A failed report for ${rule.id} needs at least one reason`);
  }
  return { ...base(rule), status: 'FAILED', reasons: [...reasons], fixed: false };
}

export function skippedReport(rule: Rule, reason: string): Report {
  return { ...base(rule), status: 'SKIPPED', reasons: [reason], fixed: false };
}

/** A failure that was repaired and re-verified. Original reasons are kept. */
export function fixedReport(failed: Report): Report {
  return { ...failed, status: 'PASSED', fixed: true };
}

/** Whether the report counts as a failure after any fix. */
export function isUnresolvedFailure(report: Report): boolean {
  return report.status === 'FAILED' && !report.fixed;
}
