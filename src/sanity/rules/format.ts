/**
 * FMT rules: field types of every table, one rule per table.
 *
 * @module sanity/rules/format
 */

import { validateTableRecords } from '../../dataset/table-schemas.js';
import { isMandatoryTable, type TableName } from '../../dataset/tables.js';
import { defineChecker, toReasons, type Checker } from '../checker.js';

const FORMAT_TABLES: ReadonlyArray<[id: string, table: TableName]> = [
  ['FMT001', 'attribute'],
  ['FMT002', 'calibrated_sensor'],
  ['FMT003', 'category'],
  ['FMT004', 'ego_pose'],
  ['FMT005', 'instance'],
  ['FMT006', 'log'],
  ['FMT007', 'map'],
  ['FMT008', 'sample'],
  ['FMT009', 'sample_annotation'],
  ['FMT010', 'sample_data'],
  ['FMT011', 'scene'],
  ['FMT012', 'sensor'],
  ['FMT013', 'visibility'],
  ['FMT014', 'lidarseg'],
  ['FMT015', 'object_ann'],
  ['FMT016', 'surface_ann'],
  ['FMT017', 'keypoint'],
  ['FMT018', 'vehicle_state'],
];

function fieldFormat(id: string, table: TableName): Checker {
  return defineChecker({
    id,
    name: `${table.replace(/_/g, '-')}-field`,
    severity: 'ERROR',
    description: `All fields of '${table}' records have valid types.`,
    // Absent optional tables have nothing to validate
    check: (context) => {
      if (!isMandatoryTable(table) && !context.hasTable(table)) return null;
      return toReasons(validateTableRecords(table, context.table(table)));
    },
  });
}

export const FORMAT_RULES: readonly Checker[] = FORMAT_TABLES.map(([id, table]) => fieldFormat(id, table));
