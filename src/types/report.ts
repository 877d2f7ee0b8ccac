import type { ReportFormat } from './project';

/**
 * Sparse metadata pulled out of basecaller report files.
 *
 * A field is only present when a report supplied a usable value for it.
 */
export interface ReportRecord {
  /** Report files that were parsed, most trusted first */
  sources: string[];
  flowCellId?: string;
  flowCellType?: string;
  kit?: string;
  basecalling?: string;
  modifiedBasecalling?: string;
  modifications?: string;
  trimBarcodes?: string;
  basecallingModel?: string;
  basecallingConfig?: string;
  softwareVersions?: Record<string, string>;
  readCount?: number;
  barcodeReadCounts?: Record<number, number>;
  runDurationSeconds?: number;
}

export type ReportFields = Omit<ReportRecord, 'sources'>;

export interface ParsedReport {
  format: ReportFormat;
  path: string;
  /** Raw structured payload (embedded JSON for HTML, parsed document for JSON) */
  raw: unknown;
  fields: ReportFields;
}
