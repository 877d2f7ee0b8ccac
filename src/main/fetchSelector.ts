import fs from 'fs/promises';
import type { Dirent } from 'fs';
import path from 'path';
import type { Project } from '../types/project';
import type { TransferItem, TransferPlan } from '../types/transfer';
import { FileTypeError } from '../common/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('fetch');

export type FetchFileType = 'bam' | 'fastq' | 'pod5' | 'fast5' | 'report';

interface FileTypeSpec {
  description: string;
  /** `data`: files anywhere below data folders; `unit`: files directly in a flow cell or basecalling folder */
  scope: 'data' | 'unit';
  matches: (name: string) => boolean;
}

export const FILE_TYPES: Readonly<Record<FetchFileType, FileTypeSpec>> = {
  bam: {
    description: 'BAM files and their indexes',
    scope: 'data',
    matches: (name) => /\.(bam|bai)$/.test(name),
  },
  fastq: {
    description: 'FASTQ files, optionally gzipped',
    scope: 'data',
    matches: (name) => /\.(fastq|fq)(\.gz)?$/.test(name),
  },
  pod5: {
    description: 'POD5 raw signal files',
    scope: 'data',
    matches: (name) => name.endsWith('.pod5'),
  },
  fast5: {
    description: 'FAST5 raw signal files',
    scope: 'data',
    matches: (name) => name.endsWith('.fast5'),
  },
  report: {
    description: 'run reports and sample sheets',
    scope: 'unit',
    matches: (name) => name.startsWith('report_') || name.startsWith('sample_sheet_'),
  },
};

export const DEFAULT_FILE_TYPES: FetchFileType[] = ['bam', 'report'];

const isFetchFileType = (value: string): value is FetchFileType =>
  Object.prototype.hasOwnProperty.call(FILE_TYPES, value);

/** Accepts a comma-separated list or an array; the first unknown type throws */
export const parseFileTypes = (value: string | readonly string[]): FetchFileType[] => {
  const names = (typeof value === 'string' ? value.split(',') : value)
    .map((name) => name.trim().toLowerCase())
    .filter(Boolean);
  const fileTypes: FetchFileType[] = [];
  names.forEach((name) => {
    if (!isFetchFileType(name)) {
      throw new FileTypeError(name, Object.keys(FILE_TYPES));
    }
    if (!fileTypes.includes(name)) fileTypes.push(name);
  });
  return fileTypes;
};

const listFiles = async (dirPath: string, recursive: boolean): Promise<string[]> => {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    logger.warn(`Unable to read ${dirPath} (ignored)`, error);
    return [];
  }
  const files: string[] = [];
  for (const entry of entries) {
    const entryPath = path.join(dirPath, entry.name);
    if (entry.isFile()) {
      files.push(entryPath);
    } else if (recursive && entry.isDirectory()) {
      files.push(...(await listFiles(entryPath, recursive)));
    }
  }
  return files;
};

const toRelativePath = (rootPath: string, filePath: string) =>
  path.relative(rootPath, filePath).split(path.sep).join('/');

/**
 * Select the files of the requested types from every flow cell and
 * basecalling folder of a project. The result is the sorted union over
 * all types, each file listed once.
 */
export const selectFiles = async (
  project: Project,
  fileTypes: readonly FetchFileType[] = DEFAULT_FILE_TYPES,
): Promise<TransferItem[]> => {
  const specs = parseFileTypes(fileTypes).map((fileType) => FILE_TYPES[fileType]);
  const dataSpecs = specs.filter((spec) => spec.scope === 'data');
  const unitSpecs = specs.filter((spec) => spec.scope === 'unit');

  const dataDirs = [
    ...project.flowCells.flatMap((flowCell) => flowCell.dataDirs.map((dataDir) => dataDir.path)),
    ...project.basecallsDirs.flatMap((basecalls) => [basecalls.passDir, basecalls.failDir]),
  ];
  const unitDirs = [...project.flowCells, ...project.basecallsDirs].map((unit) => unit.path);

  const selected = new Set<string>();
  const collect = async (dirs: string[], recursive: boolean, matchers: FileTypeSpec[]) => {
    if (!matchers.length) return;
    for (const dirPath of dirs) {
      const files = await listFiles(dirPath, recursive);
      files
        .filter((filePath) => matchers.some((spec) => spec.matches(path.basename(filePath))))
        .forEach((filePath) => selected.add(filePath));
    }
  };
  await collect(dataDirs, true, dataSpecs);
  await collect(unitDirs, false, unitSpecs);

  const items = [...selected]
    .map((source) => ({ source, relativePath: toRelativePath(project.path, source) }))
    .sort((a, b) => a.relativePath.localeCompare(b.relativePath));
  logger.info(`Selected ${items.length} file(s) of type(s) ${fileTypes.join(',')} from ${project.path}`);
  return items;
};

export const buildTransferPlan = (project: Project, destination: string, items: TransferItem[]): TransferPlan => ({
  sourceRoot: project.path,
  targetRoot: path.join(path.resolve(destination), project.name),
  items,
});
