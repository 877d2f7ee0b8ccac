import fs from 'fs/promises';
import type { Dirent } from 'fs';
import path from 'path';
import type { DataCategory, DataStatus, ProjectRole, ReportFormat } from '../types/project';
import { errorCode, toError } from './errors';

export const MIN_BARCODE = 1;
export const MAX_BARCODE = 24;
export const FLOW_CELL_HASH_LENGTH = 8;

export interface FlowCellNameFields {
  date: string;
  time: string;
  position: string;
  flowCellId: string;
  hash: string;
}

export type NameMatch =
  | { role: 'flow-cell'; rule: string; fields: FlowCellNameFields }
  | { role: 'data'; rule: string; fields: { category: DataCategory | null; status: DataStatus | null } }
  | { role: 'barcode-leaf'; rule: string; fields: { barcode: number } }
  | { role: 'report'; rule: string; fields: { format: ReportFormat; label: string; flowCellId: string | null } }
  | { role: 'sample-sheet'; rule: string; fields: { label: string } }
  | { role: 'malformed'; rule: string; reason: string }
  | { role: 'unknown' };

export interface NameRule {
  id: string;
  pattern: RegExp;
  extract: (match: RegExpExecArray) => NameMatch;
}

const FLOW_CELL_ID_PATTERN = /^[A-Z]{3}\d+$/;

const describeFlowCellNameProblem = (groups: string[]): string => {
  const [date, time, position, flowCellId, hash] = groups;
  if (!/^\d{8}$/.test(date)) return `date '${date}' is not 8 digits`;
  if (!/^\d{4}$/.test(time)) return `time '${time}' is not 4 digits`;
  if (!/^[0-9A-Za-z]+$/.test(position)) return `position '${position}' is not alphanumeric`;
  if (!FLOW_CELL_ID_PATTERN.test(flowCellId)) return `'${flowCellId}' is not a flow cell ID`;
  if (!/^[0-9a-z]+$/.test(hash)) return `hash '${hash}' is not lower-case alphanumeric`;
  return `hash '${hash}' has ${hash.length} characters (expected ${FLOW_CELL_HASH_LENGTH})`;
};

const isDataCategory = (value: string): value is DataCategory =>
  value === 'bam' || value === 'fastq' || value === 'pod5' || value === 'fast5';

const isDataStatus = (value: string): value is DataStatus =>
  value === 'pass' || value === 'fail' || value === 'skip';

const isReportFormat = (value: string): value is ReportFormat =>
  value === 'html' || value === 'json' || value === 'md';

export const parseBarcodeDigits = (digits: string): number | null => {
  if (!/^\d{2}$/.test(digits)) return null;
  const barcode = Number.parseInt(digits, 10);
  return barcode >= MIN_BARCODE && barcode <= MAX_BARCODE ? barcode : null;
};

const NAME_RULES: NameRule[] = [
  {
    id: 'flow_cell',
    pattern: /^(\d{8})_(\d{4})_([0-9A-Za-z]+)_([A-Z]{3}\d+)_([0-9a-z]+)$/,
    extract: (match) => {
      const [, date, time, position, flowCellId, hash] = match;
      if (hash.length !== FLOW_CELL_HASH_LENGTH) {
        return {
          role: 'malformed',
          rule: 'flow_cell',
          reason: describeFlowCellNameProblem([date, time, position, flowCellId, hash]),
        };
      }
      return { role: 'flow-cell', rule: 'flow_cell', fields: { date, time, position, flowCellId, hash } };
    },
  },
  {
    // Five-part names that start out like a flow cell but break the strict pattern
    id: 'flow_cell_near_miss',
    pattern: /^(\d+)_(\d+)_([^_]+)_([^_]+)_([^_]+)$/,
    extract: (match) => ({
      role: 'malformed',
      rule: 'flow_cell',
      reason: describeFlowCellNameProblem(match.slice(1, 6)),
    }),
  },
  {
    id: 'data_dir',
    pattern: /^([A-Za-z0-9]+)_(pass|fail|skip)$/,
    extract: (match) => {
      const [, prefix, status] = match;
      return {
        role: 'data',
        rule: 'data_dir',
        fields: {
          category: isDataCategory(prefix) ? prefix : null,
          status: isDataStatus(status) ? status : null,
        },
      };
    },
  },
  {
    id: 'raw_data_dir',
    pattern: /^(pod5|fast5)$/,
    extract: (match) => ({
      role: 'data',
      rule: 'raw_data_dir',
      fields: { category: isDataCategory(match[1]) ? match[1] : null, status: null },
    }),
  },
  {
    id: 'barcode',
    pattern: /^barcode(\d+)$/,
    extract: (match) => {
      const barcode = parseBarcodeDigits(match[1]);
      if (barcode === null) {
        return {
          role: 'malformed',
          rule: 'barcode',
          reason: `'${match[1]}' is not a two-digit barcode number between ${MIN_BARCODE} and ${MAX_BARCODE}`,
        };
      }
      return { role: 'barcode-leaf', rule: 'barcode', fields: { barcode } };
    },
  },
  {
    id: 'report',
    pattern: /^report_(.+)\.(html|json|md)$/,
    extract: (match) => {
      const [, label, extension] = match;
      if (!isReportFormat(extension)) return { role: 'unknown' };
      const flowCellId = /^([A-Z]{3}\d+)(?:_|$)/.exec(label)?.[1] ?? null;
      return { role: 'report', rule: 'report', fields: { format: extension, label, flowCellId } };
    },
  },
  {
    id: 'sample_sheet',
    pattern: /^sample_sheet_(.+)$/,
    extract: (match) => ({ role: 'sample-sheet', rule: 'sample_sheet', fields: { label: match[1] } }),
  },
];

export const classifyName = (name: string, rules: NameRule[] = NAME_RULES): NameMatch => {
  for (const rule of rules) {
    const match = rule.pattern.exec(name);
    if (match) {
      return rule.extract(match);
    }
  }
  return { role: 'unknown' };
};

export const buildFlowCellName = (fields: FlowCellNameFields) =>
  [fields.date, fields.time, fields.position, fields.flowCellId, fields.hash].join('_');

export interface ClassifierContext {
  directoryCache?: Map<string, Dirent[]>;
  /** Directories that could not be listed, with the reason */
  unreadable?: Map<string, string>;
}

export interface StructureRule {
  id: string;
  role: ProjectRole;
  test: (dirPath: string, context?: ClassifierContext) => Promise<boolean>;
}

export interface StructureMatch {
  rule: StructureRule;
}

const getCache = (context?: ClassifierContext) =>
  context?.directoryCache ?? new Map<string, Dirent[]>();

export const readDirectoryEntries = async (
  dirPath: string,
  context?: ClassifierContext,
): Promise<Dirent[]> => {
  const cache = getCache(context);

  const cached = cache.get(dirPath);
  if (cached) {
    return cached;
  }

  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));
    cache.set(dirPath, entries);
    return entries;
  } catch (error: unknown) {
    context?.unreadable?.set(dirPath, errorCode(error) ?? toError(error).message);
    cache.set(dirPath, []);
    return [];
  }
};

export const barcodeSubdirectories = (entries: Dirent[]): { barcodes: number[]; malformed: string[] } => {
  const barcodes: number[] = [];
  const malformed: string[] = [];
  entries.forEach((entry) => {
    if (!entry.isDirectory()) return;
    const match = classifyName(entry.name);
    if (match.role === 'barcode-leaf') {
      barcodes.push(match.fields.barcode);
    } else if (match.role === 'malformed' && match.rule === 'barcode') {
      malformed.push(entry.name);
    }
  });
  barcodes.sort((a, b) => a - b);
  return { barcodes, malformed };
};

const hasBarcodeChildren = async (dirPath: string, context?: ClassifierContext) => {
  const entries = await readDirectoryEntries(dirPath, context);
  return barcodeSubdirectories(entries).barcodes.length > 0;
};

const STRUCTURE_RULES: StructureRule[] = [
  {
    id: 'basecalling',
    role: 'basecalling',
    test: async (dirPath, context) =>
      (await hasBarcodeChildren(path.join(dirPath, 'pass'), context)) &&
      (await hasBarcodeChildren(path.join(dirPath, 'fail'), context)),
  },
];

/** First structure rule whose test accepts the directory's contents */
export const detectStructure = async (
  dirPath: string,
  context?: ClassifierContext,
  rules: StructureRule[] = STRUCTURE_RULES,
): Promise<StructureMatch | null> => {
  for (const rule of rules) {
    if (await rule.test(dirPath, context)) {
      return { rule };
    }
  }
  return null;
};

export interface PathClassification {
  path: string;
  name: string;
  role: ProjectRole;
  match: NameMatch;
}

const roleForName = (match: NameMatch): ProjectRole => {
  switch (match.role) {
    case 'flow-cell':
    case 'data':
    case 'barcode-leaf':
      return match.role;
    default:
      return 'unknown';
  }
};

/**
 * Classify a directory by its name first, then by its contents.
 *
 * Malformed names classify as `unknown`; the returned match carries the reason.
 */
export const classifyPath = async (
  dirPath: string,
  context?: ClassifierContext,
): Promise<PathClassification> => {
  const name = path.basename(dirPath);
  const match = classifyName(name);
  const role = roleForName(match);
  if (role !== 'unknown' || match.role === 'malformed') {
    return { path: dirPath, name, role, match };
  }

  const structure = await detectStructure(dirPath, context);
  return { path: dirPath, name, role: structure ? structure.rule.role : 'unknown', match };
};

export { NAME_RULES, STRUCTURE_RULES };
