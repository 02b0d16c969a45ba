/**
 * CLI command: `dataset-sanity rules`
 *
 * Lists the rule catalog in execution order.
 *
 * @module cli/commands/rules
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import type { Rule } from '../../types/sanity.js';
import { createDefaultRegistry } from '../../sanity/rules/index.js';

/** One padded line per rule: id, severity, fix marker, name. */
export function formatRuleLines(rules: readonly Rule[]): string[] {
  const nameWidth = Math.max(0, ...rules.map((r) => r.name.length));
  return rules.map((rule) => {
    const severity = rule.severity === 'ERROR' ? pc.red(rule.severity.padEnd(7)) : pc.yellow(rule.severity.padEnd(7));
    const fixable = rule.fixable ? pc.cyan('fix') : '   ';
    return `${rule.id}  ${severity}  ${fixable}  ${rule.name.padEnd(nameWidth)}  ${pc.dim(rule.description)}`;
  });
}

/**
 * @param args - CLI arguments after `rules`
 * @returns Exit code
 */
export async function rulesCommand(args: string[]): Promise<number> {
  const rules = createDefaultRegistry()
    .all()
    .map((checker) => checker.rule);
  const group = args.find((a) => a.startsWith('--group='))?.slice('--group='.length).toUpperCase();
  const selected = group ? rules.filter((r) => r.group === group) : rules;

  if (selected.length === 0) {
    p.log.warn(`No rules in group '${group ?? ''}'`);
    return 1;
  }

  if (args.includes('--json')) {
    console.log(JSON.stringify(selected, null, 2));
    return 0;
  }

  p.log.message(formatRuleLines(selected).join('\n'));
  p.log.info(`${selected.length} rule(s), ${selected.filter((r) => r.fixable).length} fixable`);
  return 0;
}
