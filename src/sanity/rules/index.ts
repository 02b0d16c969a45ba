/**
 * Built-in rule catalog.
 *
 * @module sanity/rules
 */

import type { RuleId } from '../../types/sanity.js';
import type { Checker } from '../checker.js';
import { RuleRegistry } from '../registry.js';
import { FORMAT_RULES } from './format.js';
import { RECORD_RULES } from './record.js';
import { REFERENCE_RULES } from './reference.js';
import { STRUCTURE_RULES } from './structure.js';
import { TIER_RULES } from './tier.js';

export { STRUCTURE_RULES } from './structure.js';
export { RECORD_RULES, REC007 } from './record.js';
export { REFERENCE_RULES, walkChain } from './reference.js';
export { FORMAT_RULES } from './format.js';
export { TIER_RULES, TIV001 } from './tier.js';

export const BUILTIN_RULES: readonly Checker[] = [
  ...STRUCTURE_RULES,
  ...RECORD_RULES,
  ...REFERENCE_RULES,
  ...FORMAT_RULES,
  ...TIER_RULES,
];

/**
 * Second ids of rules that were once published under two ids. They
 * stay valid in exclude lists and lookups.
 */
export const RULE_ALIASES: ReadonlyArray<readonly [alias: RuleId, target: RuleId]> = [
  ['REF016', 'REF101'],
  ['REF017', 'REF102'],
  ['REF020', 'REF105'],
  ['REF201', 'REF014'],
];

/**
 * A registry holding every built-in rule and its aliases.
 *
 * @throws {DuplicateRuleError} If the catalog repeats an id
 */
export function createDefaultRegistry(): RuleRegistry {
  const registry = new RuleRegistry();
  registry.registerAll(BUILTIN_RULES);
  for (const [alias, target] of RULE_ALIASES) {
    registry.alias(alias, target);
  }
  return registry;
}
