/**
 * REC rules: table cardinality and uniqueness.
 *
 * @module sanity/rules/record
 */

import { ALL_TABLES, type TableName, type TableRecord } from '../../dataset/tables.js';
import type { SnapshotWriter } from '../../dataset/snapshot.js';
import {
  defineChecker,
  stringField,
  tokenLabel,
  toReasons,
  type Checker,
} from '../checker.js';
import type { SanityContext } from '../context.js';

function notEmpty(id: string, name: string, table: TableName): Checker {
  return defineChecker({
    id,
    name,
    severity: 'ERROR',
    description: `'${table}' table has at least one record.`,
    check: (context) => (context.table(table).length > 0 ? null : [`'${table}' table is empty`]),
  });
}

export const REC001 = defineChecker({
  id: 'REC001',
  name: 'scene-single',
  severity: 'ERROR',
  description: "'scene' table has exactly one record.",
  check: (context) => {
    const count = context.table('scene').length;
    return count === 1 ? null : [`Expected exactly 1 scene record, found ${count}`];
  },
});

export const REC002 = notEmpty('REC002', 'sample-not-empty', 'sample');
export const REC003 = notEmpty('REC003', 'sample-data-not-empty', 'sample_data');
export const REC004 = notEmpty('REC004', 'ego-pose-not-empty', 'ego_pose');
export const REC005 = notEmpty('REC005', 'calibrated-sensor-not-empty', 'calibrated_sensor');

export const REC006 = defineChecker({
  id: 'REC006',
  name: 'instance-not-empty',
  severity: 'ERROR',
  description: "'instance' table is not empty when 3D or 2D annotations exist.",
  check: (context) => {
    const annotations = context.table('sample_annotation').length + context.table('object_ann').length;
    if (annotations === 0 || context.table('instance').length > 0) return null;
    return [`'instance' table is empty but ${annotations} annotation record(s) exist`];
  },
});

// ============================================================================
// REC007: category indices
// ============================================================================

function isIndexSet(record: TableRecord): boolean {
  return record.index !== null && record.index !== undefined;
}

function indexKey(record: TableRecord): string {
  return JSON.stringify(record.index);
}

function checkCategoryIndices(context: SanityContext): string[] | null {
  const categories = context.table('category');
  const unset = categories.filter((c) => !isIndexSet(c));
  if (unset.length === categories.length) return null;

  if (unset.length > 0) {
    return [
      `Category index is set on ${categories.length - unset.length} of ${categories.length} records; ` +
        `missing on: ${unset.map(tokenLabel).join(', ')}`,
    ];
  }

  const byIndex = new Map<string, string[]>();
  for (const category of categories) {
    const key = indexKey(category);
    byIndex.set(key, [...(byIndex.get(key) ?? []), tokenLabel(category)]);
  }
  return toReasons(
    [...byIndex.entries()]
      .filter(([, tokens]) => tokens.length > 1)
      .map(([key, tokens]) => `Category index ${key} is shared by: ${tokens.join(', ')}`),
  );
}

/**
 * Give every category without a usable index a fresh one, numbered
 * after the highest index already in use, in record order.
 */
async function fixCategoryIndices(writer: SnapshotWriter, context: SanityContext): Promise<boolean> {
  const categories = context.table('category');
  const used = new Set<number>();
  const reassign: number[] = [];

  categories.forEach((category, position) => {
    const index = category.index;
    if (typeof index === 'number' && Number.isInteger(index) && index >= 0 && !used.has(index)) {
      used.add(index);
    } else {
      reassign.push(position);
    }
  });

  let next = used.size > 0 ? Math.max(...used) + 1 : 0;
  for (const position of reassign) {
    writer.update('category', position, { index: next++ });
  }
  return reassign.length > 0;
}

export const REC007 = defineChecker({
  id: 'REC007',
  name: 'category-indices-consistent',
  severity: 'ERROR',
  description: "Every category has a unique 'index', or every category has a null 'index'.",
  check: checkCategoryIndices,
  fix: fixCategoryIndices,
});

// ============================================================================
// REC008: token uniqueness
// ============================================================================

export const REC008 = defineChecker({
  id: 'REC008',
  name: 'record-token-unique',
  severity: 'ERROR',
  description: 'Record tokens are unique within each table.',
  check: (context) => {
    const reasons: string[] = [];
    for (const table of ALL_TABLES) {
      const counts = new Map<string, number>();
      for (const record of context.table(table)) {
        const token = stringField(record, 'token');
        if (token !== undefined) counts.set(token, (counts.get(token) ?? 0) + 1);
      }
      for (const [token, count] of counts) {
        if (count > 1) reasons.push(`'${table}' token ${token} is used by ${count} records`);
      }
    }
    return toReasons(reasons);
  },
});

// ============================================================================
// REC009 / REC010: denormalized counts
// ============================================================================

interface CountField {
  /** Table holding the stored count. */
  owner: TableName;
  field: string;
  /** Table whose records are counted. */
  counted: TableName;
  /** Field of the counted records pointing at the owner. */
  reference: string;
}

function countMismatches(context: SanityContext, count: CountField): Array<{ position: number; actual: number; reason: string }> {
  const counts = new Map<string, number>();
  for (const record of context.table(count.counted)) {
    const owner = stringField(record, count.reference);
    if (owner !== undefined) counts.set(owner, (counts.get(owner) ?? 0) + 1);
  }

  const mismatches: Array<{ position: number; actual: number; reason: string }> = [];
  context.table(count.owner).forEach((record, position) => {
    const stored = record[count.field];
    const token = stringField(record, 'token');
    if (typeof stored !== 'number' || token === undefined) return;
    const actual = counts.get(token) ?? 0;
    if (stored !== actual) {
      mismatches.push({
        position,
        actual,
        reason: `${count.owner} ${token}: ${count.field} is ${stored} but ${actual} ${count.counted} record(s) refer to it`,
      });
    }
  });
  return mismatches;
}

function countChecker(
  id: string,
  name: string,
  description: string,
  count: CountField,
): Checker {
  return defineChecker({
    id,
    name,
    severity: 'WARNING',
    description,
    check: (context) => toReasons(countMismatches(context, count).map((m) => m.reason)),
    fix: async (writer, context) => {
      const mismatches = countMismatches(context, count);
      for (const { position, actual } of mismatches) {
        writer.update(count.owner, position, { [count.field]: actual });
      }
      return mismatches.length > 0;
    },
  });
}

export const REC009 = countChecker(
  'REC009',
  'scene-sample-count',
  "'scene.nbr_samples' equals the number of samples in the scene.",
  { owner: 'scene', field: 'nbr_samples', counted: 'sample', reference: 'scene_token' },
);

export const REC010 = countChecker(
  'REC010',
  'instance-annotation-count',
  "'instance.nbr_annotations' equals the number of its sample annotations.",
  { owner: 'instance', field: 'nbr_annotations', counted: 'sample_annotation', reference: 'instance_token' },
);

export const RECORD_RULES: readonly Checker[] = [
  REC001,
  REC002,
  REC003,
  REC004,
  REC005,
  REC006,
  REC007,
  REC008,
  REC009,
  REC010,
];
