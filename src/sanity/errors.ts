/**
 * Error types raised by the dataset loader, the rule registry and the
 * execution engine.
 *
 * Per-rule and per-dataset errors are converted into reports; only
 * registry errors escape to the caller.
 *
 * @module sanity/errors
 */

import type { RuleId } from '../types/sanity.js';

// ============================================================================
// Dataset errors
// ============================================================================

export type LoadErrorKind = 'not-found' | 'malformed-json' | 'invalid-table';

/**
 * The dataset snapshot could not be constructed.
 */
export class LoadError extends Error {
  constructor(
    message: string,
    public readonly kind: LoadErrorKind,
    public readonly path: string,
  ) {
    super(message);
    this.name = 'LoadError';
  }
}

// ============================================================================
// Rule errors
// ============================================================================

/**
 * A checker threw while checking or fixing. Caught at the rule boundary
 * and turned into a FAILED report.
 */
export class RuleInternalError extends Error {
  constructor(
    public readonly ruleId: RuleId,
    public readonly error: unknown,
  ) {
    super(`${ruleId} raised an internal error: ${describeError(error)}`);
    this.name = 'RuleInternalError';
  }
}

/** Two checkers were registered under the same rule id. */
export class DuplicateRuleError extends Error {
  constructor(public readonly ruleId: RuleId) {
    super(`Rule ${ruleId} is already registered`);
    this.name = 'DuplicateRuleError';
  }
}

/** A checker's metadata is unusable (bad id, fixable without fix). */
export class InvalidRuleError extends Error {
  constructor(
    message: string,
    public readonly ruleId: RuleId,
  ) {
    super(message);
    this.name = 'InvalidRuleError';
  }
}

/**
 * An exclude entry matched no rule id or group. Reported as a warning.
 */
export class UnknownExcludeTargetError extends Error {
  constructor(public readonly target: string) {
    super(`Exclude target '${target}' does not match any rule id or group`);
    this.name = 'UnknownExcludeTargetError';
  }
}

// ============================================================================
// Helpers
// ============================================================================

/** Render any thrown value as a one-line message. */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return `${err.name}: ${err.message}`;
  }
  return String(err);
}

/** Narrow a thrown value to a Node.js system error. */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
