/**
 * Console and JSON rendering of sanity results.
 *
 * Provides:
 * - Checklist: failed and fixed rules per dataset version, with reasons
 * - Summary table: one row of counts per dataset version
 * - JSON: the serialized result objects
 */

import { writeFile } from 'fs/promises';
import pc from 'picocolors';
import type { Report, SanityResult } from '../types/sanity.js';
import { datasetStatus, summarize } from './summary.js';

type Colors = ReturnType<typeof pc.createColors>;

export interface ReporterOptions {
  /** Print reasons of WARNING failures as well as ERROR ones. */
  includeWarnings?: boolean;
  /** Defaults to what the terminal supports. */
  color?: boolean;
}

/** Wire shape of one dataset version. */
export interface SerializedResult {
  dataset_id: string;
  version: number | null;
  reports: Array<{
    id: string;
    name: string;
    severity: Report['severity'];
    description: string;
    status: Report['status'];
    reasons: string[] | null;
    fixed: boolean;
  }>;
}

export function serializeResult(result: SanityResult): SerializedResult {
  return {
    dataset_id: result.datasetId,
    version: result.version,
    reports: result.reports.map((r) => ({
      id: r.id,
      name: r.name,
      severity: r.severity,
      description: r.description,
      status: r.status,
      reasons: r.reasons === null ? null : [...r.reasons],
      fixed: r.fixed,
    })),
  };
}

export function resultsToJson(results: readonly SanityResult[]): string {
  return JSON.stringify(results.map(serializeResult), null, 2);
}

export async function writeResults(path: string, results: readonly SanityResult[]): Promise<void> {
  await writeFile(path, resultsToJson(results) + '\n', 'utf-8');
}

/** `<id>` or `<id>@<version>` */
export function resultLabel(result: SanityResult): string {
  return result.version === null ? result.datasetId : `${result.datasetId}@${result.version}`;
}

const SUMMARY_COLUMNS = ['DatasetID', 'Version', 'Status', 'Passed', 'Failed', 'Skipped', 'Warnings', 'Fixed'];

export class SanityReporter {
  private readonly c: Colors;
  private readonly includeWarnings: boolean;

  constructor(options: ReporterOptions = {}) {
    this.c = pc.createColors(options.color ?? pc.isColorSupported);
    this.includeWarnings = options.includeWarnings ?? false;
  }

  /**
   * Lines describing the failed and fixed rules of one dataset version.
   * Empty when every rule passed or was skipped.
   */
  formatChecklist(result: SanityResult): string[] {
    const lines: string[] = [];
    let hiddenWarnings = 0;

    for (const report of result.reports) {
      if (report.fixed) {
        lines.push(`  ${this.c.cyan('~')} ${report.id} ${report.name} ${this.c.dim('(fixed)')}`);
        continue;
      }
      if (report.status !== 'FAILED') continue;

      if (report.severity === 'WARNING' && !this.includeWarnings) {
        hiddenWarnings++;
        continue;
      }
      const mark = report.severity === 'ERROR' ? this.c.red('x') : this.c.yellow('!');
      lines.push(`  ${mark} ${report.id} ${report.name}`);
      for (const reason of report.reasons ?? []) {
        lines.push(`      ${this.c.dim(reason)}`);
      }
    }

    if (hiddenWarnings > 0) {
      lines.push(
        `  ${this.c.dim(`${hiddenWarnings} warning(s) hidden; use --include-warnings to show them`)}`,
      );
    }
    return lines;
  }

  /** Summary table, one row per dataset version. */
  formatSummaryTable(results: readonly SanityResult[]): string[] {
    const rows = results.map((result) => {
      const summary = summarize(result.reports);
      return [
        result.datasetId,
        result.version === null ? '-' : String(result.version),
        datasetStatus(result.reports),
        String(summary.passed),
        String(summary.failed),
        String(summary.skipped),
        String(summary.warnings),
        String(summary.fixed),
      ];
    });

    const widths = SUMMARY_COLUMNS.map((header, col) =>
      Math.max(header.length, ...rows.map((row) => row[col].length)),
    );

    const header = SUMMARY_COLUMNS.map((h, col) => h.padEnd(widths[col])).join('  ');
    const lines = [this.c.bold(header.trimEnd()), widths.map((w) => '-'.repeat(w)).join('  ')];
    for (const row of rows) {
      const cells = row.map((cell, col) => {
        // Text columns are left-aligned, counts right-aligned
        const padded = col < 3 ? cell.padEnd(widths[col]) : cell.padStart(widths[col]);
        if (col !== 2) return padded;
        return cell === 'SUCCESS' ? this.c.green(padded) : this.c.red(padded);
      });
      lines.push(cells.join('  ').trimEnd());
    }
    return lines;
  }
}
