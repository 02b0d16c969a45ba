/**
 * Shared value types for sanity rules, reports and results.
 *
 * @module types/sanity
 */

// ============================================================================
// Rules
// ============================================================================

/** Severity of a rule violation. */
export type Severity = 'ERROR' | 'WARNING';

/** Built-in rule groups in execution order. */
export const RULE_GROUPS = ['STR', 'REC', 'REF', 'FMT', 'TIV'] as const;

export type BuiltinRuleGroup = (typeof RULE_GROUPS)[number];

/**
 * Rule identifier: a three-letter group tag followed by a zero-padded
 * three-digit number, e.g. `REF017`.
 */
export type RuleId = string;

/** Pattern every rule identifier must match. */
export const RULE_ID_PATTERN = /^([A-Z]{3})(\d{3})$/;

/**
 * Static metadata of one rule.
 */
export interface Rule {
  readonly id: RuleId;
  /** Kebab-case name, e.g. `sample-data-to-ego-pose`. */
  readonly name: string;
  readonly severity: Severity;
  readonly fixable: boolean;
  readonly description: string;
  /** Group tag derived from the id prefix. */
  readonly group: string;
}

// ============================================================================
// Reports
// ============================================================================

export type ReportStatus = 'PASSED' | 'FAILED' | 'SKIPPED';

/**
 * Outcome of one rule against one dataset version.
 *
 * `reasons` is null only for a PASSED report that was not fixed.
 */
export interface Report {
  readonly id: RuleId;
  readonly name: string;
  readonly severity: Severity;
  readonly description: string;
  readonly status: ReportStatus;
  readonly reasons: readonly string[] | null;
  readonly fixed: boolean;
}

/**
 * All reports for one dataset version. `version` is null when the
 * dataset has no version directories.
 */
export interface SanityResult {
  readonly datasetId: string;
  readonly version: number | null;
  readonly reports: readonly Report[];
}

/** Per-version counts used for display and exit codes. */
export interface Summary {
  passed: number;
  failed: number;
  skipped: number;
  warnings: number;
  fixed: number;
}

export type DatasetStatus = 'SUCCESS' | 'FAILURE';
