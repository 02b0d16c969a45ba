/**
 * Process exit code from the results of a whole scan.
 *
 * @module sanity/exit-status
 */

import type { SanityResult } from '../types/sanity.js';
import { isUnresolvedFailure } from './report.js';

export interface FailureFlags {
  hasErrorFail: boolean;
  hasWarnFail: boolean;
}

/** Unfixed failures by severity across every dataset version. */
export function collectFailureFlags(results: readonly SanityResult[]): FailureFlags {
  let hasErrorFail = false;
  let hasWarnFail = false;
  for (const result of results) {
    for (const report of result.reports) {
      if (!isUnresolvedFailure(report)) continue;
      if (report.severity === 'ERROR') hasErrorFail = true;
      else hasWarnFail = true;
    }
  }
  return { hasErrorFail, hasWarnFail };
}

/**
 * 1 on any unfixed ERROR failure, or on an unfixed WARNING failure in
 * strict mode; otherwise 0.
 */
export function exitCodeFor(flags: FailureFlags, strict: boolean): 0 | 1 {
  if (flags.hasErrorFail) return 1;
  if (strict && flags.hasWarnFail) return 1;
  return 0;
}

export function resolveExitCode(results: readonly SanityResult[], strict: boolean): 0 | 1 {
  return exitCodeFor(collectFailureFlags(results), strict);
}
