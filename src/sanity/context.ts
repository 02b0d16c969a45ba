/**
 * Read-only view of one dataset version handed to every checker.
 *
 * @module sanity/context
 */

import { existsSync } from 'fs';
import { join } from 'path';
import type { DatasetTarget } from '../dataset/discovery.js';
import type { DatasetSnapshot } from '../dataset/snapshot.js';
import type { TableName, TableRecord } from '../dataset/tables.js';
import type { LoadError } from './errors.js';

export class SanityContext {
  constructor(
    readonly target: DatasetTarget,
    private readonly snapshot: DatasetSnapshot | null,
    /** Why the snapshot is missing, when it is. */
    readonly loadError: LoadError | null = null,
  ) {}

  get datasetId(): string {
    return this.target.datasetId;
  }

  get version(): number | null {
    return this.target.version;
  }

  get dataRoot(): string {
    return this.target.dataRoot;
  }

  isLoaded(): boolean {
    return this.snapshot !== null;
  }

  /** Whether the table file was present. False when nothing loaded. */
  hasTable(table: TableName): boolean {
    return this.snapshot?.has(table) ?? false;
  }

  table(table: TableName): readonly TableRecord[] {
    return this.snapshot?.records(table) ?? [];
  }

  byToken(table: TableName, token: string): TableRecord | undefined {
    return this.snapshot?.get(table, token);
  }

  /** Existence of a file or directory relative to the data root. */
  fileExists(relativePath: string): boolean {
    return existsSync(this.resolvePath(relativePath));
  }

  resolvePath(relativePath: string): string {
    return join(this.target.dataRoot, relativePath);
  }
}
