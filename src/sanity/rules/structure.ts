/**
 * STR rules: directory layout of a dataset version.
 *
 * These run whether or not the tables could be loaded.
 *
 * @module sanity/rules/structure
 */

import {
  ANNOTATION_DIR,
  BAG_DIR,
  DATA_DIR,
  LANELET_FILE,
  MANDATORY_TABLES,
  MAP_DIR,
  POINTCLOUD_MAP,
  STATUS_FILE,
  tableFile,
} from '../../dataset/tables.js';
import type { Severity } from '../../types/sanity.js';
import { defineChecker, toReasons, type Checker } from '../checker.js';

function presence(
  id: string,
  name: string,
  severity: Severity,
  path: string,
  description: string,
): Checker {
  return defineChecker({
    id,
    name,
    severity,
    description,
    requiresSnapshot: false,
    check: (context) => (context.fileExists(path) ? null : [`Missing '${path}' under ${context.dataRoot}`]),
  });
}

export const STR001 = defineChecker({
  id: 'STR001',
  name: 'version-dir-presence',
  severity: 'WARNING',
  description: 'A version directory exists under the dataset directory.',
  requiresSnapshot: false,
  check: (context) => {
    if (context.version === null) {
      return [`No version directory under ${context.target.datasetRoot}`];
    }
    return context.fileExists('.')
      ? null
      : [`Version directory '${context.version}' not found under ${context.target.datasetRoot}`];
  },
});

export const STR002 = presence(
  'STR002',
  'annotation-dir-presence',
  'ERROR',
  ANNOTATION_DIR,
  "'annotation/' directory exists under the data root.",
);

export const STR003 = presence(
  'STR003',
  'data-dir-presence',
  'ERROR',
  DATA_DIR,
  "'data/' directory exists under the data root.",
);

export const STR004 = presence(
  'STR004',
  'map-dir-presence',
  'WARNING',
  MAP_DIR,
  "'map/' directory exists under the data root.",
);

export const STR005 = presence(
  'STR005',
  'bag-dir-presence',
  'WARNING',
  BAG_DIR,
  "'input_bag/' directory exists under the data root.",
);

export const STR006 = presence(
  'STR006',
  'status-json-presence',
  'WARNING',
  STATUS_FILE,
  "'status.json' exists under the data root.",
);

export const STR007 = defineChecker({
  id: 'STR007',
  name: 'schema-file-presence',
  severity: 'ERROR',
  description: "Mandatory table files exist under 'annotation/'.",
  requiresSnapshot: false,
  skipReason: (context) =>
    context.fileExists(ANNOTATION_DIR) ? null : `Missing '${ANNOTATION_DIR}' directory`,
  check: (context) =>
    toReasons(
      MANDATORY_TABLES.map(tableFile)
        .filter((file) => !context.fileExists(file))
        .map((file) => `Missing mandatory table file '${file}'`),
    ),
});

export const STR008 = presence(
  'STR008',
  'lanelet-file-presence',
  'WARNING',
  LANELET_FILE,
  "'lanelet2_map.osm' exists under 'map/'.",
);

export const STR009 = presence(
  'STR009',
  'pointcloud-map-dir-presence',
  'WARNING',
  POINTCLOUD_MAP,
  "'pointcloud_map.pcd' exists under 'map/'.",
);

export const STRUCTURE_RULES: readonly Checker[] = [
  STR001,
  STR002,
  STR003,
  STR004,
  STR005,
  STR006,
  STR007,
  STR008,
  STR009,
];
