/**
 * REF rules: foreign keys, file references, next/prev pointers and the
 * chains they form.
 *
 * An empty token means "unset" and always resolves.
 *
 * @module sanity/rules/reference
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { isMandatoryTable, type TableName, type TableRecord } from '../../dataset/tables.js';
import type { Severity } from '../../types/sanity.js';
import {
  defineChecker,
  stringField,
  tokenLabel,
  toReasons,
  type Checker,
} from '../checker.js';
import type { SanityContext } from '../context.js';
import { describeError } from '../errors.js';

function missingTableReason(context: SanityContext, table: TableName): string | null {
  if (isMandatoryTable(table) || context.hasTable(table)) return null;
  return `Missing ${table}.json`;
}

// ============================================================================
// Foreign keys
// ============================================================================

interface ForeignKey {
  source: TableName;
  field: string;
  target: TableName;
  /** The field holds a list of tokens. */
  list?: boolean;
  /** Only records passing this filter are checked. */
  filter?: (record: TableRecord) => boolean;
}

function referencedTokens(record: TableRecord, key: ForeignKey): string[] {
  const value = record[key.field];
  if (key.list) {
    return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
  }
  return typeof value === 'string' ? [value] : [];
}

function foreignKey(
  id: string,
  name: string,
  key: ForeignKey,
  severity: Severity = 'ERROR',
): Checker {
  return defineChecker({
    id,
    name,
    severity,
    description: `'${key.source}.${key.field}' refers to '${key.target}' records.`,
    skipReason: (context) => missingTableReason(context, key.source),
    check: (context) => {
      const reasons: string[] = [];
      for (const record of context.table(key.source)) {
        if (key.filter && !key.filter(record)) continue;
        for (const token of referencedTokens(record, key)) {
          if (token !== '' && context.byToken(key.target, token) === undefined) {
            reasons.push(
              `${key.source} ${tokenLabel(record)}: ${key.field} '${token}' not found in '${key.target}'`,
            );
          }
        }
      }
      return toReasons(reasons);
    },
  });
}

/** Records flagged `is_valid: false` carry no usable sample link. */
const isValidRecord = (record: TableRecord): boolean => record.is_valid !== false;

export const REF001 = foreignKey('REF001', 'scene-to-log', { source: 'scene', field: 'log_token', target: 'log' });
export const REF002 = foreignKey('REF002', 'scene-to-first-sample', {
  source: 'scene',
  field: 'first_sample_token',
  target: 'sample',
});
export const REF003 = foreignKey('REF003', 'scene-to-last-sample', {
  source: 'scene',
  field: 'last_sample_token',
  target: 'sample',
});
export const REF004 = foreignKey('REF004', 'sample-to-scene', { source: 'sample', field: 'scene_token', target: 'scene' });
export const REF005 = foreignKey('REF005', 'sample-data-to-sample', {
  source: 'sample_data',
  field: 'sample_token',
  target: 'sample',
  filter: isValidRecord,
});
export const REF006 = foreignKey('REF006', 'sample-data-to-ego-pose', {
  source: 'sample_data',
  field: 'ego_pose_token',
  target: 'ego_pose',
});
export const REF007 = foreignKey('REF007', 'sample-data-to-calibrated-sensor', {
  source: 'sample_data',
  field: 'calibrated_sensor_token',
  target: 'calibrated_sensor',
});
export const REF008 = foreignKey('REF008', 'calibrated-sensor-to-sensor', {
  source: 'calibrated_sensor',
  field: 'sensor_token',
  target: 'sensor',
});
export const REF009 = foreignKey('REF009', 'instance-to-category', {
  source: 'instance',
  field: 'category_token',
  target: 'category',
});
export const REF010 = foreignKey('REF010', 'instance-to-first-sample-annotation', {
  source: 'instance',
  field: 'first_annotation_token',
  target: 'sample_annotation',
});
export const REF011 = foreignKey('REF011', 'instance-to-last-sample-annotation', {
  source: 'instance',
  field: 'last_annotation_token',
  target: 'sample_annotation',
});
export const REF012 = foreignKey('REF012', 'lidarseg-to-sample-data', {
  source: 'lidarseg',
  field: 'sample_data_token',
  target: 'sample_data',
});
export const REF018 = foreignKey('REF018', 'sample-annotation-to-visibility', {
  source: 'sample_annotation',
  field: 'visibility_token',
  target: 'visibility',
});
export const REF019 = foreignKey('REF019', 'sample-annotation-to-attribute', {
  source: 'sample_annotation',
  field: 'attribute_tokens',
  target: 'attribute',
  list: true,
});
export const REF021 = foreignKey('REF021', 'object-ann-to-instance', {
  source: 'object_ann',
  field: 'instance_token',
  target: 'instance',
});
export const REF022 = foreignKey('REF022', 'object-ann-to-category', {
  source: 'object_ann',
  field: 'category_token',
  target: 'category',
});
export const REF023 = foreignKey('REF023', 'surface-ann-to-sample-data', {
  source: 'surface_ann',
  field: 'sample_data_token',
  target: 'sample_data',
});
export const REF024 = foreignKey('REF024', 'surface-ann-to-category', {
  source: 'surface_ann',
  field: 'category_token',
  target: 'category',
});
export const REF025 = foreignKey('REF025', 'map-to-log', {
  source: 'map',
  field: 'log_tokens',
  target: 'log',
  list: true,
});
export const REF026 = foreignKey('REF026', 'keypoint-to-sample-data', {
  source: 'keypoint',
  field: 'sample_data_token',
  target: 'sample_data',
});
export const REF027 = foreignKey('REF027', 'keypoint-to-instance', {
  source: 'keypoint',
  field: 'instance_token',
  target: 'instance',
});
export const REF028 = foreignKey('REF028', 'sample-annotation-to-sample', {
  source: 'sample_annotation',
  field: 'sample_token',
  target: 'sample',
});
export const REF029 = foreignKey('REF029', 'sample-annotation-to-instance', {
  source: 'sample_annotation',
  field: 'instance_token',
  target: 'instance',
});
export const REF030 = foreignKey('REF030', 'object-ann-to-sample-data', {
  source: 'object_ann',
  field: 'sample_data_token',
  target: 'sample_data',
});

// ============================================================================
// File references
// ============================================================================

function fileReference(
  id: string,
  name: string,
  table: TableName,
  field: string,
  severity: Severity,
): Checker {
  return defineChecker({
    id,
    name,
    severity,
    description: `Files named by '${table}.${field}' exist under the data root.`,
    skipReason: (context) => missingTableReason(context, table),
    check: (context) => {
      const reasons: string[] = [];
      for (const record of context.table(table)) {
        const filename = stringField(record, field);
        // Nullable fields such as info_filename are allowed to be unset
        if (filename === undefined || filename === '') continue;
        if (!context.fileExists(filename)) {
          reasons.push(`${table} ${tokenLabel(record)}: file not found: ${filename}`);
        }
      }
      return toReasons(reasons);
    },
  });
}

export const REF013 = fileReference(
  'REF013',
  'sample-data-info-filename-presence',
  'sample_data',
  'info_filename',
  'WARNING',
);
export const REF014 = fileReference('REF014', 'sample-data-filename-presence', 'sample_data', 'filename', 'ERROR');
export const REF015 = fileReference('REF015', 'lidarseg-filename-presence', 'lidarseg', 'filename', 'ERROR');

// ============================================================================
// Point cloud metainfo
// ============================================================================

const POINTCLOUD_FORMATS: ReadonlySet<string> = new Set(['pcd', 'pcd.bin']);

/** Sidecar of a merged point cloud: one source per contributing sensor. */
const PointCloudMetainfoSchema = z
  .object({
    sources: z.array(z.object({ sensor_token: z.string() }).passthrough()),
  })
  .passthrough();

/** Source sensor tokens of a metainfo file, or why they could not be read. */
function readSourceTokens(path: string): string[] | string {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    return `unreadable point cloud metainfo: ${describeError(err)}`;
  }
  const parsed = PointCloudMetainfoSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `invalid point cloud metainfo: ${where}: ${issue?.message ?? 'unknown issue'}`;
  }
  return parsed.data.sources.map((source) => source.sensor_token);
}

export const REF301 = defineChecker({
  id: 'REF301',
  name: 'pointcloud-metainfo-token-check',
  severity: 'ERROR',
  description: "Sensor tokens in point cloud metainfo files exist in 'sensor'.",
  check: (context) => {
    const reasons: string[] = [];
    for (const record of context.table('sample_data')) {
      const filename = stringField(record, 'info_filename');
      const format = stringField(record, 'fileformat') ?? '';
      // Missing files are REF013's concern
      if (!filename || !POINTCLOUD_FORMATS.has(format) || !context.fileExists(filename)) continue;

      const tokens = readSourceTokens(context.resolvePath(filename));
      if (typeof tokens === 'string') {
        reasons.push(`${filename}: ${tokens}`);
        continue;
      }
      for (const token of tokens) {
        if (context.byToken('sensor', token) === undefined) {
          reasons.push(`No reference to 'sensor.token': ${token} (in ${filename})`);
        }
      }
    }
    return toReasons(reasons);
  },
});

// ============================================================================
// next / prev pointers
// ============================================================================

type Pointer = 'next' | 'prev';

function pointer(id: string, name: string, table: TableName, field: Pointer): Checker {
  return defineChecker({
    id,
    name,
    severity: 'ERROR',
    description: `'${table}.${field}' refers to another '${table}' record unless it is empty.`,
    check: (context) => {
      const reasons: string[] = [];
      for (const record of context.table(table)) {
        const value = stringField(record, field);
        if (value === undefined || value === '') continue;
        const token = tokenLabel(record);
        if (value === token) {
          reasons.push(`${table} ${token}: ${field} refers to itself`);
        } else if (context.byToken(table, value) === undefined) {
          reasons.push(`${table} ${token}: ${field} '${value}' not found in '${table}'`);
        }
      }
      return toReasons(reasons);
    },
  });
}

export const REF101 = pointer('REF101', 'sample-next-to-another', 'sample', 'next');
export const REF102 = pointer('REF102', 'sample-prev-to-another', 'sample', 'prev');
export const REF103 = pointer('REF103', 'sample-annotation-next-to-another', 'sample_annotation', 'next');
export const REF104 = pointer('REF104', 'sample-annotation-prev-to-another', 'sample_annotation', 'prev');
export const REF105 = pointer('REF105', 'sample-data-next-to-another', 'sample_data', 'next');
export const REF106 = pointer('REF106', 'sample-data-prev-to-another', 'sample_data', 'prev');

// ============================================================================
// Chains
// ============================================================================

interface Walk {
  tokens: string[];
  problem: string | null;
}

/**
 * Follow `field` from `start` until the empty terminator, stopping at a
 * missing record or a revisited token.
 */
export function walkChain(
  context: SanityContext,
  table: TableName,
  start: string,
  field: Pointer,
): Walk {
  const tokens: string[] = [];
  const visited = new Set<string>();
  let current = start;
  while (current !== '') {
    if (visited.has(current)) {
      return { tokens, problem: `${field} chain revisits ${current}` };
    }
    const record = context.byToken(table, current);
    if (record === undefined) {
      return { tokens, problem: `${field} chain reaches missing record ${current}` };
    }
    visited.add(current);
    tokens.push(current);
    current = stringField(record, field) ?? '';
  }
  return { tokens, problem: null };
}

interface ChainLink {
  table: TableName;
  /** Table owning the chain (scene for samples, instance for annotations). */
  owner: TableName;
  firstField: string;
  lastField: string;
  /** Field of a member record holding the owner token. */
  ownerField: string;
}

function checkChains(context: SanityContext, chain: ChainLink): string[] | null {
  const members = new Map<string, string[]>();
  for (const record of context.table(chain.table)) {
    const owner = stringField(record, chain.ownerField);
    const token = stringField(record, 'token');
    if (owner === undefined || token === undefined) continue;
    members.set(owner, [...(members.get(owner) ?? []), token]);
  }

  const reasons: string[] = [];
  for (const owner of context.table(chain.owner)) {
    const ownerToken = tokenLabel(owner);
    const first = stringField(owner, chain.firstField) ?? '';
    const last = stringField(owner, chain.lastField) ?? '';
    if (first === '' && last === '') continue;

    const label = `${chain.owner} ${ownerToken}`;
    const forward = walkChain(context, chain.table, first, 'next');
    const backward = walkChain(context, chain.table, last, 'prev');
    if (forward.problem) reasons.push(`${label}: ${forward.problem}`);
    if (backward.problem) reasons.push(`${label}: ${backward.problem}`);

    if (!forward.problem && !backward.problem) {
      const reversed = [...backward.tokens].reverse();
      if (reversed.join(',') !== forward.tokens.join(',')) {
        reasons.push(
          `${label}: next chain [${forward.tokens.join(', ')}] does not match prev chain [${reversed.join(', ')}]`,
        );
      }
    }

    const linked = new Set(forward.tokens);
    const orphans = (members.get(ownerToken) ?? []).filter((t) => !linked.has(t));
    if (orphans.length > 0 && !forward.problem) {
      reasons.push(`${label}: ${chain.table} not reachable from ${chain.firstField}: ${orphans.join(', ')}`);
    }
  }
  return toReasons(reasons);
}

export const REF107 = defineChecker({
  id: 'REF107',
  name: 'sample-chain-consistent',
  severity: 'ERROR',
  description: "Walking 'sample.next' from a scene's first sample matches walking 'prev' from its last.",
  check: (context) =>
    checkChains(context, {
      table: 'sample',
      owner: 'scene',
      firstField: 'first_sample_token',
      lastField: 'last_sample_token',
      ownerField: 'scene_token',
    }),
});

export const REF108 = defineChecker({
  id: 'REF108',
  name: 'sample-annotation-chain-consistent',
  severity: 'ERROR',
  description: "Walking 'sample_annotation.next' from an instance's first annotation matches walking 'prev' from its last.",
  check: (context) =>
    checkChains(context, {
      table: 'sample_annotation',
      owner: 'instance',
      firstField: 'first_annotation_token',
      lastField: 'last_annotation_token',
      ownerField: 'instance_token',
    }),
});

export const REFERENCE_RULES: readonly Checker[] = [
  REF001,
  REF002,
  REF003,
  REF004,
  REF005,
  REF006,
  REF007,
  REF008,
  REF009,
  REF010,
  REF011,
  REF012,
  REF013,
  REF014,
  REF015,
  REF018,
  REF019,
  REF021,
  REF022,
  REF023,
  REF024,
  REF025,
  REF026,
  REF027,
  REF028,
  REF029,
  REF030,
  REF101,
  REF102,
  REF103,
  REF104,
  REF105,
  REF106,
  REF107,
  REF108,
  REF301,
];
