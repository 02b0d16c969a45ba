/**
 * Execution engine: runs the selected checkers against one dataset
 * version in registry order and produces one report per rule.
 *
 * @module sanity/engine
 */

import type { SnapshotWriter } from '../dataset/snapshot.js';
import type { Report } from '../types/sanity.js';
import type { Checker } from './checker.js';
import type { SanityContext } from './context.js';
import { RuleInternalError, describeError } from './errors.js';
import type { RuleSelection } from './registry.js';
import {
  EXCLUDED_REASON,
  NOT_LOADED_REASON,
  failedReport,
  fixedReport,
  passedReport,
  skippedReport,
} from './report.js';

export interface RunOptions {
  /** Attempt fixes for failed fixable rules. */
  fix?: boolean;
  /** Writer for fixes; required for fixes to run. */
  writer?: SnapshotWriter | null;
}

/**
 * Run every checker of the selection.
 *
 * Excluded rules become SKIPPED without running. When the snapshot is
 * missing, only rules that do not read tables run. A checker that
 * throws yields a FAILED report naming the internal error.
 */
export async function runCheckers(
  context: SanityContext,
  selection: RuleSelection,
  options: RunOptions = {},
): Promise<Report[]> {
  const reports: Report[] = [];
  for (const checker of selection.checkers) {
    if (selection.excluded.has(checker.rule.id)) {
      reports.push(skippedReport(checker.rule, EXCLUDED_REASON));
      continue;
    }
    reports.push(await runChecker(checker, context, options));
  }
  return reports;
}

async function runChecker(
  checker: Checker,
  context: SanityContext,
  options: RunOptions,
): Promise<Report> {
  const { rule } = checker;

  if (checker.requiresSnapshot && !context.isLoaded()) {
    return skippedReport(rule, NOT_LOADED_REASON);
  }

  let reasons: string[] | null;
  try {
    const skip = checker.skipReason?.(context) ?? null;
    if (skip !== null) {
      return skippedReport(rule, skip);
    }
    reasons = checker.check(context);
  } catch (err) {
    return failedReport(rule, [new RuleInternalError(rule.id, err).message]);
  }

  if (reasons === null || reasons.length === 0) {
    return passedReport(rule);
  }

  const failed = failedReport(rule, reasons);
  const writer = options.writer ?? null;
  if (!options.fix || !rule.fixable || !checker.fix || writer === null) {
    return failed;
  }

  try {
    const repaired = await checker.fix(writer, context);
    if (!repaired) {
      writer.rollback();
      return failed;
    }
    await writer.flush();
    const recheck = checker.check(context);
    if (recheck === null || recheck.length === 0) {
      return fixedReport(failed);
    }
    return failed;
  } catch (err) {
    // A partial fix must not reach disk with the next rule's flush
    writer.rollback();
    return failedReport(rule, [...reasons, `fix failed: ${describeError(err)}`]);
  }
}
