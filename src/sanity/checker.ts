/**
 * Checker protocol and helpers shared by the rule catalog.
 *
 * A checker owns one {@link Rule}. `check` is pure over the context and
 * returns null when the rule holds, or the reasons it does not. A
 * fixable checker also implements `fix`, which receives the privileged
 * {@link SnapshotWriter} and is never handed to `check`.
 *
 * @module sanity/checker
 */

import type { SnapshotWriter } from '../dataset/snapshot.js';
import type { TableRecord } from '../dataset/tables.js';
import { RULE_ID_PATTERN, type Rule, type RuleId, type Severity } from '../types/sanity.js';
import type { SanityContext } from './context.js';
import { InvalidRuleError } from './errors.js';

// ============================================================================
// Protocol
// ============================================================================

export interface Checker {
  readonly rule: Rule;
  /** Whether the rule reads dataset tables (skipped when loading failed). */
  readonly requiresSnapshot: boolean;
  /** Reason to skip this rule for the dataset, or null to run it. */
  skipReason?(context: SanityContext): string | null;
  check(context: SanityContext): string[] | null;
  /**
   * Repair the violation in place.
   *
   * @returns Whether the repair is believed to have succeeded
   */
  fix?(writer: SnapshotWriter, context: SanityContext): Promise<boolean>;
}

export interface CheckerDefinition {
  id: RuleId;
  name: string;
  severity: Severity;
  description: string;
  /** Defaults to true. */
  requiresSnapshot?: boolean;
  skipReason?: (context: SanityContext) => string | null;
  check: (context: SanityContext) => string[] | null;
  fix?: (writer: SnapshotWriter, context: SanityContext) => Promise<boolean>;
}

/** Group tag of a rule id, e.g. `REF` for `REF017`. */
export function ruleGroupOf(id: RuleId): string {
  const match = RULE_ID_PATTERN.exec(id);
  if (!match) {
    throw new InvalidRuleError(`Rule id '${id}' must be a 3-letter group and 3 digits`, id);
  }
  return match[1];
}

/**
 * Build a checker from its definition. Fixability follows from the
 * presence of `fix`.
 */
export function defineChecker(definition: CheckerDefinition): Checker {
  const { id, name, severity, description, skipReason, check, fix } = definition;
  const rule: Rule = {
    id,
    name,
    severity,
    description,
    fixable: fix !== undefined,
    group: ruleGroupOf(id),
  };
  return {
    rule,
    requiresSnapshot: definition.requiresSnapshot ?? true,
    ...(skipReason ? { skipReason } : {}),
    check,
    ...(fix ? { fix } : {}),
  };
}

// ============================================================================
// Record helpers
// ============================================================================

/** A string field, or undefined when missing or of another type. */
export function stringField(record: TableRecord, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

/** Display token used in reasons. */
export function tokenLabel(record: TableRecord): string {
  return stringField(record, 'token') ?? '<no token>';
}

/** Collapse an empty reason list to null. */
export function toReasons(reasons: string[]): string[] | null {
  return reasons.length > 0 ? reasons : null;
}
