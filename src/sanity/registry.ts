/**
 * Catalog of checkers keyed by rule id.
 *
 * Populated once before a run; `override` is the only way to replace a
 * registered checker. An alias is a second id for a registered rule:
 * looking it up or excluding it acts on the target, and reports carry
 * the target id.
 *
 * @module sanity/registry
 */

import { RULE_GROUPS, type RuleId } from '../types/sanity.js';
import type { Checker } from './checker.js';
import { ruleGroupOf } from './checker.js';
import { DuplicateRuleError, InvalidRuleError, UnknownExcludeTargetError } from './errors.js';

/** Result of applying an exclude set to the registry. */
export interface RuleSelection {
  /** Every registered checker in execution order. */
  checkers: Checker[];
  /** Ids removed by the exclude set. */
  excluded: ReadonlySet<RuleId>;
  /** Exclude entries that matched nothing. */
  warnings: UnknownExcludeTargetError[];
}

function groupRank(group: string): number {
  const index = (RULE_GROUPS as readonly string[]).indexOf(group);
  // Extension groups run after the built-in ones
  return index === -1 ? RULE_GROUPS.length : index;
}

/** Ordering of rule ids: built-in group order, then group tag, then id. */
export function compareRuleIds(a: RuleId, b: RuleId): number {
  const ga = ruleGroupOf(a);
  const gb = ruleGroupOf(b);
  const byRank = groupRank(ga) - groupRank(gb);
  if (byRank !== 0) return byRank;
  if (ga !== gb) return ga < gb ? -1 : 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

export class RuleRegistry {
  private readonly checkers = new Map<RuleId, Checker>();
  private readonly aliases = new Map<RuleId, RuleId>();

  /**
   * @throws {DuplicateRuleError} When the id is already registered
   * @throws {InvalidRuleError} When the checker's metadata is inconsistent
   */
  register(checker: Checker): void {
    this.validate(checker);
    if (this.checkers.has(checker.rule.id) || this.aliases.has(checker.rule.id)) {
      throw new DuplicateRuleError(checker.rule.id);
    }
    this.checkers.set(checker.rule.id, checker);
  }

  registerAll(checkers: readonly Checker[]): void {
    for (const checker of checkers) {
      this.register(checker);
    }
  }

  /**
   * Replace (or add) the checker for an id. Intended for deliberate
   * customization of built-in rules.
   */
  override(checker: Checker): void {
    this.validate(checker);
    this.checkers.set(checker.rule.id, checker);
  }

  /**
   * @throws {DuplicateRuleError} When the alias is already an id or alias
   * @throws {InvalidRuleError} When the alias is malformed or the target unknown
   */
  alias(alias: RuleId, target: RuleId): void {
    ruleGroupOf(alias);
    if (this.checkers.has(alias) || this.aliases.has(alias)) {
      throw new DuplicateRuleError(alias);
    }
    if (!this.checkers.has(target)) {
      throw new InvalidRuleError(`Alias ${alias} refers to unregistered rule ${target}`, alias);
    }
    this.aliases.set(alias, target);
  }

  /** The registered id an id or alias stands for. */
  canonicalId(id: RuleId): RuleId {
    return this.aliases.get(id) ?? id;
  }

  get(id: RuleId): Checker | undefined {
    return this.checkers.get(this.canonicalId(id));
  }

  has(id: RuleId): boolean {
    return this.checkers.has(this.canonicalId(id));
  }

  get size(): number {
    return this.checkers.size;
  }

  /** Registered group tags in execution order. */
  groups(): string[] {
    const groups = new Set([...this.checkers.values()].map((c) => c.rule.group));
    return [...groups].sort((a, b) => groupRank(a) - groupRank(b) || (a < b ? -1 : a > b ? 1 : 0));
  }

  /** All checkers in execution order. */
  all(): Checker[] {
    return [...this.checkers.values()].sort((a, b) => compareRuleIds(a.rule.id, b.rule.id));
  }

  /**
   * Apply an exclude set. Entries match a rule id or a group tag,
   * case-insensitively.
   */
  resolve(excludes: Iterable<string>): RuleSelection {
    const checkers = this.all();
    const groups = new Set(checkers.map((c) => c.rule.group));
    const excluded = new Set<RuleId>();
    const warnings: UnknownExcludeTargetError[] = [];

    const seen = new Set<string>();
    for (const entry of excludes) {
      const target = entry.trim().toUpperCase();
      if (target.length === 0 || seen.has(target)) continue;
      seen.add(target);

      const id = this.canonicalId(target);
      if (this.checkers.has(id)) {
        excluded.add(id);
      } else if (groups.has(target)) {
        for (const checker of checkers) {
          if (checker.rule.group === target) excluded.add(checker.rule.id);
        }
      } else {
        warnings.push(new UnknownExcludeTargetError(entry));
      }
    }

    return { checkers, excluded, warnings };
  }

  private validate(checker: Checker): void {
    const { id, group, fixable } = checker.rule;
    if (ruleGroupOf(id) !== group) {
      throw new InvalidRuleError(`Rule ${id} declares group '${group}'`, id);
    }
    if (fixable && checker.fix === undefined) {
      throw new InvalidRuleError(`Rule ${id} is marked fixable but has no fix`, id);
    }
  }
}

/** Active (non-excluded) checkers of a selection. */
export function activeCheckers(selection: RuleSelection): Checker[] {
  return selection.checkers.filter((c) => !selection.excluded.has(c.rule.id));
}
