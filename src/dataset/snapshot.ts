/**
 * In-memory snapshot of one dataset version's tables.
 *
 * Records are kept in file order with a token index per table, so that
 * foreign-key resolution is a map lookup. Checkers see the snapshot
 * read-only; repairs go through {@link SnapshotWriter}.
 *
 * @module dataset/snapshot
 */

import { writeFile } from 'fs/promises';
import { join } from 'path';
import { tableFile, type TableName, type TableRecord } from './tables.js';

interface LoadedTable {
  records: TableRecord[];
  index: Map<string, TableRecord>;
}

/** Token of a record, or undefined when the field is missing or not a string. */
export function recordToken(record: TableRecord): string | undefined {
  const token = record.token;
  return typeof token === 'string' ? token : undefined;
}

function buildIndex(records: readonly TableRecord[]): Map<string, TableRecord> {
  const index = new Map<string, TableRecord>();
  for (const record of records) {
    const token = recordToken(record);
    // First record wins; duplicates are reported by a REC rule
    if (token !== undefined && !index.has(token)) {
      index.set(token, record);
    }
  }
  return index;
}

export class DatasetSnapshot {
  private readonly tables = new Map<TableName, LoadedTable>();

  constructor(
    /** Absolute path of the data root the tables were read from. */
    readonly dataRoot: string,
    tables: ReadonlyMap<TableName, readonly TableRecord[]>,
  ) {
    for (const [name, records] of tables) {
      this.tables.set(name, { records: [...records], index: buildIndex(records) });
    }
  }

  /** Whether the table file was present when loading. */
  has(table: TableName): boolean {
    return this.tables.has(table);
  }

  /** Records of a table; empty when the table is absent. */
  records(table: TableName): readonly TableRecord[] {
    return this.tables.get(table)?.records ?? [];
  }

  get(table: TableName, token: string): TableRecord | undefined {
    return this.tables.get(table)?.index.get(token);
  }

  /** @internal Used by SnapshotWriter only. */
  replaceRecord(table: TableName, position: number, record: TableRecord): void {
    const loaded = this.tables.get(table);
    if (!loaded || position < 0 || position >= loaded.records.length) {
      throw new RangeError(`No record at ${table}[${position}]`);
    }
    loaded.records[position] = record;
    loaded.index = buildIndex(loaded.records);
  }
}

/**
 * Privileged handle passed only to fix operations. Changes are applied
 * to the snapshot immediately and written to disk on {@link flush}, or
 * undone by {@link rollback}.
 */
export class SnapshotWriter {
  /** Record as it was before its first unflushed change, per table and position. */
  private readonly originals = new Map<TableName, Map<number, TableRecord>>();

  constructor(private readonly snapshot: DatasetSnapshot) {}

  /**
   * Merge `patch` into the record at `position` of `table`.
   */
  update(table: TableName, position: number, patch: Readonly<Record<string, unknown>>): void {
    const current = this.snapshot.records(table)[position];
    if (current === undefined) {
      throw new RangeError(`No record at ${table}[${position}]`);
    }
    this.snapshot.replaceRecord(table, position, { ...current, ...patch });

    let saved = this.originals.get(table);
    if (!saved) {
      saved = new Map();
      this.originals.set(table, saved);
    }
    if (!saved.has(position)) saved.set(position, current);
  }

  /** Tables changed since the last flush or rollback. */
  pending(): TableName[] {
    return [...this.originals.keys()].sort();
  }

  /**
   * Persist every changed table to `annotation/<table>.json`.
   *
   * @returns The tables written
   */
  async flush(): Promise<TableName[]> {
    const written = this.pending();
    for (const table of written) {
      const path = join(this.snapshot.dataRoot, tableFile(table));
      await writeFile(path, JSON.stringify(this.snapshot.records(table), null, 2) + '\n', 'utf-8');
      this.originals.delete(table);
    }
    return written;
  }

  /**
   * Restore every record changed since the last flush.
   *
   * @returns The tables restored
   */
  rollback(): TableName[] {
    const restored = this.pending();
    for (const table of restored) {
      for (const [position, record] of this.originals.get(table) ?? []) {
        this.snapshot.replaceRecord(table, position, record);
      }
      this.originals.delete(table);
    }
    return restored;
  }
}
