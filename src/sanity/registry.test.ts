import { describe, it, expect } from 'vitest';
import { defineChecker, type Checker } from './checker.js';
import { DuplicateRuleError, InvalidRuleError, UnknownExcludeTargetError } from './errors.js';
import { RuleRegistry, activeCheckers, compareRuleIds } from './registry.js';
import { BUILTIN_RULES, RULE_ALIASES, createDefaultRegistry } from './rules/index.js';

function stub(id: string, description = 'stub'): Checker {
  return defineChecker({ id, name: `stub-${id}`, severity: 'WARNING', description, check: () => null });
}

describe('RuleRegistry', () => {
  it('rejects a second checker with the same id', () => {
    const registry = new RuleRegistry();
    registry.register(stub('REF001'));
    expect(() => registry.register(stub('REF001'))).toThrow(DuplicateRuleError);
    expect(() => registry.register(stub('REF001'))).toThrow('Rule REF001 is already registered');
  });

  it('replaces a checker only through override', () => {
    const registry = new RuleRegistry();
    registry.register(stub('REF001', 'original'));
    registry.override(stub('REF001', 'custom'));
    expect(registry.get('REF001')?.rule.description).toBe('custom');
    expect(registry.size).toBe(1);
  });

  it('orders by group STR < REC < REF < FMT < TIV, then id, extensions last', () => {
    const registry = new RuleRegistry();
    registry.registerAll(['TIV001', 'FMT002', 'XYZ001', 'REF101', 'STR009', 'REF002', 'REC001', 'STR001'].map((id) => stub(id)));
    expect(registry.all().map((c) => c.rule.id)).toEqual([
      'STR001',
      'STR009',
      'REC001',
      'REF002',
      'REF101',
      'FMT002',
      'TIV001',
      'XYZ001',
    ]);
    expect(registry.groups()).toEqual(['STR', 'REC', 'REF', 'FMT', 'TIV', 'XYZ']);
  });

  it('compares ids by group rank before lexical order', () => {
    expect(compareRuleIds('TIV001', 'FMT001')).toBeGreaterThan(0);
    expect(compareRuleIds('STR002', 'STR010')).toBeLessThan(0);
    expect(compareRuleIds('REC003', 'REC003')).toBe(0);
  });

  it('rejects malformed ids', () => {
    expect(() => stub('REF1')).toThrow(InvalidRuleError);
    expect(() => stub('ref001')).toThrow("Rule id 'ref001' must be a 3-letter group and 3 digits");
  });

  it('rejects a checker marked fixable without a fix', () => {
    const registry = new RuleRegistry();
    const inconsistent: Checker = {
      rule: { id: 'REC007', name: 'x', severity: 'ERROR', fixable: true, description: '', group: 'REC' },
      requiresSnapshot: true,
      check: () => null,
    };
    expect(() => registry.register(inconsistent)).toThrow('Rule REC007 is marked fixable but has no fix');
  });
});

describe('RuleRegistry.alias', () => {
  it('looks up the target through the alias', () => {
    const registry = new RuleRegistry();
    registry.register(stub('REF101'));
    registry.alias('REF016', 'REF101');
    expect(registry.get('REF016')?.rule.id).toBe('REF101');
    expect(registry.has('REF016')).toBe(true);
    expect(registry.canonicalId('REF016')).toBe('REF101');
    expect(registry.size).toBe(1);
    expect(registry.all().map((c) => c.rule.id)).toEqual(['REF101']);
  });

  it('rejects an alias that collides with an id or another alias', () => {
    const registry = new RuleRegistry();
    registry.registerAll([stub('REF101'), stub('REF102')]);
    registry.alias('REF016', 'REF101');
    expect(() => registry.alias('REF102', 'REF101')).toThrow(DuplicateRuleError);
    expect(() => registry.alias('REF016', 'REF102')).toThrow(DuplicateRuleError);
    expect(() => registry.register(stub('REF016'))).toThrow('Rule REF016 is already registered');
  });

  it('rejects an alias of an unregistered rule', () => {
    const registry = new RuleRegistry();
    expect(() => registry.alias('REF016', 'REF101')).toThrow(InvalidRuleError);
    expect(() => registry.alias('REF016', 'REF101')).toThrow('Alias REF016 refers to unregistered rule REF101');
  });
});

describe('RuleRegistry.resolve', () => {
  function registry(): RuleRegistry {
    const r = new RuleRegistry();
    r.registerAll(['STR001', 'STR002', 'REF001', 'REF002', 'FMT001'].map((id) => stub(id)));
    return r;
  }

  it('excludes by rule id and by group, case-insensitively', () => {
    const selection = registry().resolve(['str001', 'REF']);
    expect([...selection.excluded].sort()).toEqual(['REF001', 'REF002', 'STR001']);
    expect(activeCheckers(selection).map((c) => c.rule.id)).toEqual(['STR002', 'FMT001']);
    expect(selection.checkers).toHaveLength(5);
    expect(selection.warnings).toEqual([]);
  });

  it('excludes the target of an alias', () => {
    const r = registry();
    r.alias('REF020', 'REF002');
    const selection = r.resolve(['ref020']);
    expect([...selection.excluded]).toEqual(['REF002']);
    expect(selection.warnings).toEqual([]);
  });

  it('warns about entries matching nothing', () => {
    const selection = registry().resolve(['REF999', 'REF', 'ABC']);
    expect(selection.warnings.map((w) => w.target)).toEqual(['REF999', 'ABC']);
    expect(selection.warnings[0]).toBeInstanceOf(UnknownExcludeTargetError);
    expect(selection.warnings[0].message).toBe("Exclude target 'REF999' does not match any rule id or group");
  });
});

describe('built-in catalog', () => {
  it('registers every built-in rule without duplicates', () => {
    const registry = createDefaultRegistry();
    expect(registry.size).toBe(BUILTIN_RULES.length);
    expect(registry.size).toBe(74);
  });

  it('keeps the earlier ids of the pointer and filename rules as aliases', () => {
    const registry = createDefaultRegistry();
    expect(registry.get('REF016')?.rule.name).toBe('sample-next-to-another');
    expect(registry.get('REF017')?.rule.name).toBe('sample-prev-to-another');
    expect(registry.get('REF020')?.rule.name).toBe('sample-data-next-to-another');
    expect(registry.get('REF201')?.rule.name).toBe('sample-data-filename-presence');
    expect(RULE_ALIASES).toHaveLength(4);
  });

  it('marks the repairable rules fixable', () => {
    const fixable = createDefaultRegistry()
      .all()
      .filter((c) => c.rule.fixable)
      .map((c) => c.rule.id);
    expect(fixable).toEqual(['REC007', 'REC009', 'REC010']);
  });

  it('uses unique kebab-case names', () => {
    const names = BUILTIN_RULES.map((c) => c.rule.name);
    expect(new Set(names).size).toBe(names.length);
    for (const name of names) {
      expect(name).toMatch(/^[a-z0-9]+(-[a-z0-9]+)*$/);
    }
  });
});
