/**
 * Find the dataset versions to check under a scan root.
 *
 * A dataset directory either contains digit-named version directories
 * (`<id>/0`, `<id>/1`, ...) or is itself the data root.
 *
 * @module dataset/discovery
 */

import { readdir } from 'fs/promises';
import { basename, join, resolve } from 'path';
import { isErrnoException } from '../sanity/errors.js';
import { ANNOTATION_DIR } from './tables.js';

/** One dataset version to check. */
export interface DatasetTarget {
  datasetId: string;
  /** Directory of the dataset (parent of version directories). */
  datasetRoot: string;
  /** Selected version, or null when the dataset is unversioned. */
  version: number | null;
  /** Directory holding `annotation/`, `data/`, ... */
  dataRoot: string;
}

const VERSION_DIR_PATTERN = /^\d+$/;

async function listSubdirectories(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries.filter((e) => e.isDirectory()).map((e) => e.name).sort();
  } catch (err) {
    if (isErrnoException(err) && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) {
      return [];
    }
    throw err;
  }
}

/** Numeric version directories of a dataset, ascending. */
export async function listVersions(datasetRoot: string): Promise<number[]> {
  const dirs = await listSubdirectories(datasetRoot);
  return dirs
    .filter((name) => VERSION_DIR_PATTERN.test(name))
    .map((name) => Number.parseInt(name, 10))
    .sort((a, b) => a - b);
}

/**
 * Pick the version to check for one dataset directory.
 *
 * The latest version is used unless `requestedVersion` is given. A
 * requested version that does not exist still yields a target, whose
 * data root is missing; the structure and load rules report it.
 */
export async function resolveTarget(
  datasetRoot: string,
  requestedVersion?: number,
): Promise<DatasetTarget> {
  const root = resolve(datasetRoot);
  const datasetId = basename(root);
  const versions = await listVersions(root);

  if (requestedVersion !== undefined) {
    return {
      datasetId,
      datasetRoot: root,
      version: requestedVersion,
      dataRoot: join(root, String(requestedVersion)),
    };
  }

  const latest = versions.at(-1);
  if (latest === undefined) {
    return { datasetId, datasetRoot: root, version: null, dataRoot: root };
  }
  return { datasetId, datasetRoot: root, version: latest, dataRoot: join(root, String(latest)) };
}

/**
 * Whether `dir` is a dataset directory rather than a directory of datasets.
 */
async function looksLikeDataset(dir: string): Promise<boolean> {
  const subdirs = await listSubdirectories(dir);
  return subdirs.some((name) => name === ANNOTATION_DIR || VERSION_DIR_PATTERN.test(name));
}

/**
 * Expand a scan root into dataset targets, sorted by dataset id.
 */
export async function discoverTargets(
  scanRoot: string,
  options: { version?: number } = {},
): Promise<DatasetTarget[]> {
  const root = resolve(scanRoot);
  if (await looksLikeDataset(root)) {
    return [await resolveTarget(root, options.version)];
  }

  const subdirs = await listSubdirectories(root);
  if (subdirs.length === 0) {
    // Nothing to expand; report the root itself so it fails visibly
    return [await resolveTarget(root, options.version)];
  }

  const targets: DatasetTarget[] = [];
  for (const name of subdirs) {
    targets.push(await resolveTarget(join(root, name), options.version));
  }
  return targets;
}
