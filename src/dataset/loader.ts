/**
 * Snapshot provider: reads the annotation tables of a data root.
 *
 * Returns a discriminated result instead of throwing, so an unreadable
 * dataset becomes a rule outcome rather than an aborted run.
 *
 * @module dataset/loader
 */

import { readFile, stat } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { LoadError, isErrnoException } from '../sanity/errors.js';
import { DatasetSnapshot } from './snapshot.js';
import {
  ALL_TABLES,
  ANNOTATION_DIR,
  isMandatoryTable,
  tableFile,
  type TableName,
  type TableRecord,
} from './tables.js';

export type SnapshotLoadResult =
  | { ok: true; snapshot: DatasetSnapshot }
  | { ok: false; error: LoadError };

const TableFileSchema = z.array(z.record(z.string(), z.unknown()));

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      return false;
    }
    throw err;
  }
}

/**
 * Read one table file.
 *
 * @returns The records, null when the file does not exist, or a LoadError
 */
async function readTable(
  dataRoot: string,
  table: TableName,
): Promise<TableRecord[] | null | LoadError> {
  const path = join(dataRoot, tableFile(table));

  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      return null;
    }
    const detail = err instanceof Error ? err.message : String(err);
    return new LoadError(`Could not read ${table}.json: ${detail}`, 'not-found', path);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    return new LoadError(`Malformed JSON in ${table}.json: ${detail}`, 'malformed-json', path);
  }

  const parsed = TableFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at [${issue.path.join('.')}]` : '';
    return new LoadError(
      `${table}.json must be an array of objects${where}`,
      'invalid-table',
      path,
    );
  }
  return parsed.data;
}

/**
 * Load every known table under `<dataRoot>/annotation`.
 *
 * Mandatory tables must exist; optional ones are recorded as absent.
 */
export async function loadSnapshot(dataRoot: string): Promise<SnapshotLoadResult> {
  if (!(await isDirectory(dataRoot))) {
    return {
      ok: false,
      error: new LoadError(`Dataset directory not found: ${dataRoot}`, 'not-found', dataRoot),
    };
  }

  const annotationDir = join(dataRoot, ANNOTATION_DIR);
  if (!(await isDirectory(annotationDir))) {
    return {
      ok: false,
      error: new LoadError(
        `Annotation directory not found: ${annotationDir}`,
        'not-found',
        annotationDir,
      ),
    };
  }

  const tables = new Map<TableName, readonly TableRecord[]>();
  for (const table of ALL_TABLES) {
    const result = await readTable(dataRoot, table);
    if (result instanceof LoadError) {
      return { ok: false, error: result };
    }
    if (result === null) {
      if (isMandatoryTable(table)) {
        const path = join(dataRoot, tableFile(table));
        return {
          ok: false,
          error: new LoadError(`Mandatory table ${table}.json not found`, 'not-found', path),
        };
      }
      continue;
    }
    tables.set(table, result);
  }

  return { ok: true, snapshot: new DatasetSnapshot(dataRoot, tables) };
}
