import fs from 'fs/promises';
import type { Stats } from 'fs';
import path from 'path';
import type { AnalysisDir, AnalysisMetadata, CreateAnalysisOptions, SampleEntry } from '../types/analysis';
import type { Project, SequencingUnit } from '../types/project';
import type { ReportRecord } from '../types/report';
import {
  AnalysisDirError,
  AnalysisDirExistsError,
  CatalogError,
  ErrorContext,
  ValidationError,
  errorCode,
  toError,
} from '../common/errors';
import { fmtValue, fmtYesNo, formatBarcodes } from '../common/format';
import { parseSamplesIndex, sortSamples } from '../common/samplesIndex';
import { applyAccessRecursive, type AccessSettings } from '../common/access';
import { earliestDatestamp, flowCellIds, scanProject } from './scanner';
import { extractReportRecord, htmlReport } from './reportExtractor';
import { createLogger } from '../utils/logger';

const logger = createLogger('analysis');

export const PROJECT_INFO_FILE = 'project.info';
export const SAMPLES_FILE = 'samples.tsv';
export const PLATFORM = 'promethion';
export const UNSET = '.';

export const PROJECT_INFO_KEYS = [
  'name',
  'id',
  'datestamp',
  'platform',
  'user',
  'PI',
  'application',
  'organism',
  'data_dir',
  'comments',
  'created',
] as const;

type ProjectInfoKey = (typeof PROJECT_INFO_KEYS)[number];

export const FLOW_CELLS_COLUMNS = [
  'Run',
  'PoolName',
  'SubDir',
  'FlowCellID',
  'Reports',
  'Kit',
  'Modifications',
  'TrimBarcodes',
] as const;

/** `info` output: the flow cell table plus the barcode folders of each unit */
export const INFO_COLUMNS = [...FLOW_CELLS_COLUMNS, 'Barcodes'] as const;

const SUBDIRECTORIES = ['logs', 'ScriptCode', 'reports'];

export const analysisDirName = (projectName: string) => `${projectName}_analysis`;

const cleanValue = (value: string) => value.replace(/[\t\r\n]+/g, ' ').trim();

const isProjectInfoKey = (key: string): key is ProjectInfoKey =>
  PROJECT_INFO_KEYS.some((candidate) => candidate === key);

const projectInfoValues = (metadata: AnalysisMetadata): Record<ProjectInfoKey, string | null> => ({
  name: metadata.name,
  id: metadata.id,
  datestamp: metadata.datestamp,
  platform: metadata.platform,
  user: metadata.user,
  PI: metadata.PI,
  application: metadata.application,
  organism: metadata.organism,
  data_dir: metadata.dataDir,
  comments: metadata.comments,
  created: metadata.createdAtIso,
});

export const serializeProjectInfo = (metadata: AnalysisMetadata): string => {
  const values = projectInfoValues(metadata);
  return PROJECT_INFO_KEYS.map((key) => {
    const value = values[key];
    const cleaned = value === null ? '' : cleanValue(value);
    return `${key}\t${cleaned || UNSET}`;
  })
    .join('\n')
    .concat('\n');
};

export const parseProjectInfo = (content: string): Partial<Record<ProjectInfoKey, string | null>> => {
  const values: Partial<Record<ProjectInfoKey, string | null>> = {};
  content.split(/\r?\n/).forEach((line) => {
    if (!line.trim() || line.startsWith('#')) return;
    const separator = line.indexOf('\t');
    const key = (separator === -1 ? line : line.slice(0, separator)).trim();
    const value = separator === -1 ? '' : line.slice(separator + 1).trim();
    if (!isProjectInfoKey(key)) {
      logger.warn(`${PROJECT_INFO_FILE}: ignoring unrecognised key '${key}'`);
      return;
    }
    values[key] = value === '' || value === UNSET ? null : value;
  });
  return values;
};

export const serializeSamples = (samples: SampleEntry[]): string =>
  ['#Sample\tBarcode\tFlowcell', ...sortSamples(samples).map((s) => `${s.sample}\t${s.barcode}\t${s.flowCell}`)]
    .join('\n')
    .concat('\n');

export const parseSamplesFile = (content: string): SampleEntry[] => {
  const samples: SampleEntry[] = [];
  content.split(/\r?\n/).forEach((line, index) => {
    if (!line.trim() || line.startsWith('#')) return;
    const [sample, barcode, flowCell] = line.split('\t').map((cell) => cell.trim());
    if (!sample || !/^\d+$/.test(barcode ?? '') || !flowCell) {
      throw new AnalysisDirError(`${SAMPLES_FILE}: line ${index + 1}: malformed sample entry`);
    }
    samples.push({ sample, barcode: Number.parseInt(barcode, 10), flowCell });
  });
  return samples;
};

const modificationsColumn = (record: ReportRecord) =>
  record.modifiedBasecalling === 'Off' ? 'none' : fmtValue(record.modifications);

/**
 * One row per flow cell and basecalling folder, with metadata taken from
 * their reports.
 */
export const buildFlowCellsTable = (
  project: Project,
  records: Map<string, ReportRecord>,
  { withBarcodes = false }: { withBarcodes?: boolean } = {},
): string[][] => {
  const row = (unit: SequencingUnit, poolName: string | null, flowCellId: string | undefined) => {
    const record = records.get(unit.path) ?? { sources: [] };
    const cells = [
      fmtValue(unit.run),
      fmtValue(poolName),
      unit.relativePath,
      fmtValue(flowCellId),
      fmtYesNo(htmlReport(unit)),
      fmtValue(record.kit),
      modificationsColumn(record),
      fmtValue(record.trimBarcodes),
    ];
    return withBarcodes ? [...cells, formatBarcodes(unit.barcodes)] : cells;
  };
  return [
    ...project.flowCells.map((flowCell) => row(flowCell, flowCell.pool, flowCell.id)),
    ...project.basecallsDirs.map((basecalls) =>
      row(basecalls, basecalls.name, records.get(basecalls.path)?.flowCellId),
    ),
  ];
};

export const serializeTable = (columns: readonly string[], rows: string[][]) =>
  [`#${columns.join('\t')}`, ...rows.map((cells) => cells.join('\t'))].join('\n').concat('\n');

const reportCopyName = (unit: SequencingUnit, record: ReportRecord | undefined, reportName: string) => {
  const parts =
    unit.kind === 'flow-cell'
      ? [unit.pool, unit.id]
      : [unit.parent, unit.pool, record?.flowCellId ?? null];
  return [...parts.filter((part): part is string => Boolean(part)), reportName].join('_');
};

const readmeText = (metadata: AnalysisMetadata, flowCellsFile: string, hasSamples: boolean) => {
  const lines = [
    `Analysis directory for ${metadata.name}`,
    '',
    'Generated files:',
    '',
    `- '${PROJECT_INFO_FILE}': project name, ID, user, PI, application and organism`,
    `- '${flowCellsFile}': flow cell and basecalling folders found in the primary data directory`,
  ];
  if (hasSamples) {
    lines.push(`- '${SAMPLES_FILE}': sample names with their barcode and flow cell`);
  }
  lines.push(
    '',
    "'reports' holds copies of the HTML run reports, renamed after the pool",
    'and flow cell they belong to.',
    '',
  );
  return lines.join('\n');
};

const pathExists = async (targetPath: string) => {
  try {
    await fs.access(targetPath);
    return true;
  } catch {
    return false;
  }
};

const requireValue = (value: string, field: string) => {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new ValidationError('a non-blank value is required', field);
  }
  return trimmed;
};

export interface CreateAnalysisDependencies {
  access?: AccessSettings;
  now?: () => Date;
}

/**
 * Create `<destination>/<project>_analysis`. Every file is written to a
 * hidden staging folder first; nothing is left behind on failure.
 */
export const createAnalysisDir = async (
  options: CreateAnalysisOptions,
  deps: CreateAnalysisDependencies = {},
): Promise<AnalysisDir> => {
  const user = requireValue(options.user, 'user');
  const PI = requireValue(options.PI, 'PI');
  const application = requireValue(options.application, 'application');
  const organism = requireValue(options.organism, 'organism');

  const destination = path.resolve(options.destination);
  let destinationStats: Stats;
  try {
    destinationStats = await fs.stat(destination);
  } catch (error) {
    throw new CatalogError(`${destination}: destination not found`, ErrorContext.ANALYSIS_SETUP, toError(error));
  }
  if (!destinationStats.isDirectory()) {
    throw new CatalogError(`${destination}: destination is not a directory`, ErrorContext.ANALYSIS_SETUP);
  }

  const project = await scanProject(options.projectDir);
  const targetPath = path.join(destination, analysisDirName(project.name));
  if (await pathExists(targetPath)) {
    throw new AnalysisDirExistsError(targetPath);
  }

  const samples = options.samplesIndex ? parseSamplesIndex(options.samplesIndex, flowCellIds(project)) : [];
  const metadata: AnalysisMetadata = {
    name: project.name,
    id: project.id,
    datestamp: earliestDatestamp(project),
    platform: PLATFORM,
    user,
    PI,
    application,
    organism,
    dataDir: project.path,
    comments: options.comments?.trim() || null,
    createdAtIso: (deps.now ?? (() => new Date()))().toISOString(),
    samples,
  };

  const records = new Map<string, ReportRecord>();
  for (const unit of [...project.flowCells, ...project.basecallsDirs]) {
    records.set(unit.path, await extractReportRecord(unit));
  }

  const stagingPath = await fs.mkdtemp(path.join(destination, `.${analysisDirName(project.name)}-`));
  try {
    const flowCellsFile = `${project.name}.tsv`;
    await fs.writeFile(path.join(stagingPath, PROJECT_INFO_FILE), serializeProjectInfo(metadata), 'utf8');
    if (samples.length) {
      await fs.writeFile(path.join(stagingPath, SAMPLES_FILE), serializeSamples(samples), 'utf8');
    }
    await fs.writeFile(
      path.join(stagingPath, flowCellsFile),
      serializeTable(FLOW_CELLS_COLUMNS, buildFlowCellsTable(project, records)),
      'utf8',
    );
    await fs.writeFile(
      path.join(stagingPath, 'README'),
      readmeText(metadata, flowCellsFile, samples.length > 0),
      'utf8',
    );
    for (const subdir of SUBDIRECTORIES) {
      await fs.mkdir(path.join(stagingPath, subdir));
    }
    for (const unit of [...project.flowCells, ...project.basecallsDirs]) {
      const report = htmlReport(unit);
      if (!report) continue;
      const copyName = reportCopyName(unit, records.get(unit.path), report.name);
      await fs.copyFile(report.path, path.join(stagingPath, 'reports', copyName));
    }
    await fs.chmod(stagingPath, 0o755);
    await applyAccessRecursive(stagingPath, deps.access ?? {});
    await fs.rename(stagingPath, targetPath);
  } catch (error) {
    await fs.rm(stagingPath, { recursive: true, force: true });
    throw error;
  }

  logger.info(`Created analysis directory ${targetPath}`);
  return { path: targetPath, metadata };
};

const stripAnalysisSuffix = (dirName: string) => dirName.replace(/_analysis$/, '');

export const loadAnalysisDir = async (dirPath: string): Promise<AnalysisDir> => {
  const analysisPath = path.resolve(dirPath);
  let content: string;
  try {
    content = await fs.readFile(path.join(analysisPath, PROJECT_INFO_FILE), 'utf8');
  } catch (error) {
    const reason = errorCode(error) === 'ENOENT' ? `no '${PROJECT_INFO_FILE}' file found` : toError(error).message;
    throw new AnalysisDirError(`${analysisPath}: not an analysis directory (${reason})`, toError(error));
  }
  const info = parseProjectInfo(content);

  let samples: SampleEntry[] = [];
  try {
    samples = parseSamplesFile(await fs.readFile(path.join(analysisPath, SAMPLES_FILE), 'utf8'));
  } catch (error) {
    if (error instanceof AnalysisDirError) throw error;
    if (errorCode(error) !== 'ENOENT') {
      throw new AnalysisDirError(`${SAMPLES_FILE}: ${toError(error).message}`, toError(error));
    }
    logger.warn(`${analysisPath}: no '${SAMPLES_FILE}' file found`);
  }

  return {
    path: analysisPath,
    metadata: {
      name: info.name ?? stripAnalysisSuffix(path.basename(analysisPath)),
      id: info.id ?? null,
      datestamp: info.datestamp ?? null,
      platform: info.platform ?? null,
      user: info.user ?? null,
      PI: info.PI ?? null,
      application: info.application ?? null,
      organism: info.organism ?? null,
      dataDir: info.data_dir ?? null,
      comments: info.comments ?? null,
      createdAtIso: info.created ?? null,
      samples,
    },
  };
};
