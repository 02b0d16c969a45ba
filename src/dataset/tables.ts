/**
 * Catalog of annotation tables and the directory layout of a dataset
 * version.
 *
 * @module dataset/tables
 */

/** Tables whose JSON file must exist for the dataset to load. */
export const MANDATORY_TABLES = [
  'attribute',
  'calibrated_sensor',
  'category',
  'ego_pose',
  'instance',
  'log',
  'map',
  'sample',
  'sample_annotation',
  'sample_data',
  'scene',
  'sensor',
  'visibility',
] as const;

/** Tables that may be absent. */
export const OPTIONAL_TABLES = [
  'keypoint',
  'lidarseg',
  'object_ann',
  'surface_ann',
  'vehicle_state',
] as const;

export type MandatoryTable = (typeof MANDATORY_TABLES)[number];
export type OptionalTable = (typeof OPTIONAL_TABLES)[number];
export type TableName = MandatoryTable | OptionalTable;

export const ALL_TABLES: readonly TableName[] = [...MANDATORY_TABLES, ...OPTIONAL_TABLES];

/** One record as read from a table file. */
export type TableRecord = Readonly<Record<string, unknown>>;

// ============================================================================
// Directory layout
// ============================================================================

export const ANNOTATION_DIR = 'annotation';
export const DATA_DIR = 'data';
export const MAP_DIR = 'map';
export const BAG_DIR = 'input_bag';
export const STATUS_FILE = 'status.json';
export const LANELET_FILE = 'map/lanelet2_map.osm';
export const POINTCLOUD_MAP = 'map/pointcloud_map.pcd';

/** Path of a table file relative to the data root. */
export function tableFile(table: TableName): string {
  return `${ANNOTATION_DIR}/${table}.json`;
}

export function isMandatoryTable(table: TableName): table is MandatoryTable {
  return (MANDATORY_TABLES as readonly string[]).includes(table);
}
