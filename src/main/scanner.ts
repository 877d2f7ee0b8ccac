import fs from 'fs/promises';
import type { Dirent, Stats } from 'fs';
import path from 'path';
import type {
  BasecallsDir,
  DataDir,
  FlowCell,
  Pool,
  Project,
  ReportFile,
  Run,
  ScanDiagnostic,
  ScanDiagnosticKind,
} from '../types/project';
import {
  barcodeSubdirectories,
  classifyName,
  classifyPath,
  readDirectoryEntries,
  type ClassifierContext,
  type FlowCellNameFields,
} from '../common/pathRules';
import { CatalogError, ErrorContext, toError } from '../common/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('scanner');

const RE_PROJECT_DIR_NAME = /^PromethION_Project_(\d+)_(.+)$/;

interface WalkState {
  rootPath: string;
  context: ClassifierContext;
  flowCells: FlowCell[];
  basecallsDirs: BasecallsDir[];
  diagnostics: ScanDiagnostic[];
}

const computeRelativePath = (rootPath: string, entryPath: string) =>
  path.relative(rootPath, entryPath).split(path.sep).filter(Boolean).join('/');

const addDiagnostic = (
  state: WalkState,
  kind: ScanDiagnosticKind,
  targetPath: string,
  message: string,
) => {
  state.diagnostics.push({
    kind,
    path: targetPath,
    relativePath: computeRelativePath(state.rootPath, targetPath),
    message,
  });
};

export const makeProjectId = (name: string): string | null => {
  const match = RE_PROJECT_DIR_NAME.exec(name);
  return match ? `PROMETHION#${match[1]}` : null;
};

const collectBarcodes = async (dirPath: string, state: WalkState): Promise<number[]> => {
  const entries = await readDirectoryEntries(dirPath, state.context);
  const { barcodes, malformed } = barcodeSubdirectories(entries);
  malformed.forEach((name) => {
    const classification = classifyName(name);
    addDiagnostic(
      state,
      'malformed-barcode',
      path.join(dirPath, name),
      classification.role === 'malformed' ? classification.reason : `'${name}': not a barcode folder`,
    );
  });
  return barcodes;
};

const collectReports = (dirPath: string, entries: Dirent[]) => {
  const reports: ReportFile[] = [];
  let sampleSheet: string | null = null;
  entries.forEach((entry) => {
    if (!entry.isFile()) return;
    const match = classifyName(entry.name);
    if (match.role === 'report') {
      reports.push({
        name: entry.name,
        path: path.join(dirPath, entry.name),
        format: match.fields.format,
        label: match.fields.label,
      });
    } else if (match.role === 'sample-sheet' && sampleSheet === null) {
      sampleSheet = path.join(dirPath, entry.name);
    }
  });
  return { reports, sampleSheet };
};

const mergeBarcodes = (groups: number[][]) =>
  [...new Set(groups.flat())].sort((a, b) => a - b);

const buildFlowCell = async (
  dirPath: string,
  fields: FlowCellNameFields,
  ancestors: string[],
  state: WalkState,
): Promise<FlowCell> => {
  const entries = await readDirectoryEntries(dirPath, state.context);
  const dataDirs: DataDir[] = [];

  for (const entry of entries) {
    if (!entry.isDirectory()) continue;
    const match = classifyName(entry.name);
    if (match.role !== 'data') continue;
    const dataPath = path.join(dirPath, entry.name);
    dataDirs.push({
      name: entry.name,
      path: dataPath,
      category: match.fields.category,
      status: match.fields.status,
      barcodes: await collectBarcodes(dataPath, state),
    });
  }

  const { reports, sampleSheet } = collectReports(dirPath, entries);

  return {
    kind: 'flow-cell',
    name: path.basename(dirPath),
    id: fields.flowCellId,
    path: dirPath,
    relativePath: computeRelativePath(state.rootPath, dirPath),
    date: fields.date,
    time: fields.time,
    position: fields.position,
    hash: fields.hash,
    pool: ancestors[ancestors.length - 1] ?? null,
    run: ancestors[ancestors.length - 2] ?? null,
    dataDirs,
    barcodes: mergeBarcodes(dataDirs.map((dataDir) => dataDir.barcodes)),
    reports,
    sampleSheet,
  };
};

const buildBasecallsDir = async (
  dirPath: string,
  ancestors: string[],
  state: WalkState,
): Promise<BasecallsDir> => {
  const entries = await readDirectoryEntries(dirPath, state.context);
  const passDir = path.join(dirPath, 'pass');
  const failDir = path.join(dirPath, 'fail');
  const passBarcodes = await collectBarcodes(passDir, state);
  const failBarcodes = await collectBarcodes(failDir, state);
  const { reports, sampleSheet } = collectReports(dirPath, entries);

  return {
    kind: 'basecalling',
    name: path.basename(dirPath),
    path: dirPath,
    relativePath: computeRelativePath(state.rootPath, dirPath),
    parent: ancestors[ancestors.length - 1] ?? path.basename(state.rootPath),
    pool: null,
    run: null,
    passDir,
    failDir,
    barcodes: mergeBarcodes([passBarcodes, failBarcodes]),
    reports,
    sampleSheet,
  };
};

const walkDirectory = async (
  currentPath: string,
  ancestors: string[],
  state: WalkState,
): Promise<void> => {
  if (currentPath !== state.rootPath) {
    const classification = await classifyPath(currentPath, state.context);
    const { match } = classification;

    if (match.role === 'malformed') {
      addDiagnostic(
        state,
        match.rule === 'barcode' ? 'malformed-barcode' : 'malformed-flow-cell-name',
        currentPath,
        `'${classification.name}': ${match.reason}`,
      );
      return;
    }

    if (match.role === 'flow-cell') {
      logger.debug(`Flow cell ${match.fields.flowCellId} at ${currentPath}`);
      state.flowCells.push(await buildFlowCell(currentPath, match.fields, ancestors, state));
      return;
    }

    if (classification.role === 'basecalling') {
      logger.debug(`Basecalling folder at ${currentPath}`);
      state.basecallsDirs.push(await buildBasecallsDir(currentPath, ancestors, state));
      return;
    }
  }

  const entries = await readDirectoryEntries(currentPath, state.context);
  const childAncestors = currentPath === state.rootPath ? [] : [...ancestors, path.basename(currentPath)];

  for (const entry of entries) {
    if (entry.isSymbolicLink() || !entry.isDirectory()) {
      continue;
    }
    await walkDirectory(path.join(currentPath, entry.name), childAncestors, state);
  }
};

const assignBasecallsPools = (state: WalkState) => {
  state.basecallsDirs.forEach((basecallsDir) => {
    const segments = basecallsDir.relativePath.split('/');
    const pooled = state.flowCells.filter((candidate) => candidate.pool !== null);
    const flowCell =
      pooled.find((candidate) => basecallsDir.path.startsWith(`${path.dirname(candidate.path)}${path.sep}`)) ??
      pooled.find((candidate) => candidate.pool !== null && segments.includes(candidate.pool));
    if (flowCell) {
      basecallsDir.pool = flowCell.pool;
      basecallsDir.run = flowCell.run;
      return;
    }
    addDiagnostic(
      state,
      'orphan-basecalls',
      basecallsDir.path,
      'no pool from the project matches this basecalling folder',
    );
  });
};

const flowCellStart = (flowCell: FlowCell) => `${flowCell.date}${flowCell.time}`;

const groupPools = (rootPath: string, flowCells: FlowCell[]) => {
  const poolsByPath = new Map<string, Pool>();
  flowCells.forEach((flowCell) => {
    if (flowCell.pool === null) return;
    const poolPath = path.dirname(flowCell.path);
    const existing = poolsByPath.get(poolPath);
    if (existing) {
      existing.flowCells.push(flowCell);
      return;
    }
    poolsByPath.set(poolPath, {
      name: flowCell.pool,
      path: poolPath,
      run: flowCell.run,
      repeat: 1,
      flowCells: [flowCell],
    });
  });

  const pools = [...poolsByPath.values()];
  const earliestStart = (pool: Pool) =>
    pool.flowCells.map(flowCellStart).sort()[0] ?? '';

  const poolsByName = new Map<string, Pool[]>();
  pools.forEach((pool) => {
    poolsByName.set(pool.name, [...(poolsByName.get(pool.name) ?? []), pool]);
  });
  poolsByName.forEach((sameName) => {
    sameName
      .sort((a, b) => earliestStart(a).localeCompare(earliestStart(b)) || a.path.localeCompare(b.path))
      .forEach((pool, index) => {
        pool.repeat = index + 1;
      });
  });

  const runsByPath = new Map<string, Run>();
  const topLevelPools: Pool[] = [];
  pools
    .sort((a, b) => a.path.localeCompare(b.path))
    .forEach((pool) => {
      if (pool.run === null) {
        topLevelPools.push(pool);
        return;
      }
      const runPath = path.dirname(pool.path);
      const run = runsByPath.get(runPath) ?? { name: pool.run, path: runPath, pools: [] };
      run.pools.push(pool);
      runsByPath.set(runPath, run);
    });

  const runs = [...runsByPath.values()].sort((a, b) =>
    computeRelativePath(rootPath, a.path).localeCompare(computeRelativePath(rootPath, b.path)),
  );
  return { runs, pools: topLevelPools };
};

export const scanProject = async (projectRoot: string): Promise<Project> => {
  const rootPath = path.resolve(projectRoot);
  let stats: Stats;
  try {
    stats = await fs.stat(rootPath);
  } catch (error) {
    throw new CatalogError(`${rootPath}: project directory not found`, ErrorContext.PROJECT_SCAN, toError(error));
  }
  if (!stats.isDirectory()) {
    throw new CatalogError(`${rootPath}: is not a directory`, ErrorContext.PROJECT_SCAN);
  }

  const state: WalkState = {
    rootPath,
    context: { directoryCache: new Map<string, Dirent[]>(), unreadable: new Map<string, string>() },
    flowCells: [],
    basecallsDirs: [],
    diagnostics: [],
  };

  await walkDirectory(rootPath, [], state);

  state.flowCells.sort((a, b) => a.relativePath.localeCompare(b.relativePath));
  state.basecallsDirs.sort((a, b) => a.relativePath.localeCompare(b.relativePath));
  assignBasecallsPools(state);

  state.context.unreadable?.forEach((reason, dirPath) => {
    addDiagnostic(state, 'unreadable-directory', dirPath, `unable to read directory (${reason})`);
  });
  state.diagnostics.sort(
    (a, b) => a.relativePath.localeCompare(b.relativePath) || a.kind.localeCompare(b.kind),
  );

  const name = path.basename(rootPath);
  const { runs, pools } = groupPools(rootPath, state.flowCells);
  logger.info(
    `Scanned ${rootPath}: ${state.flowCells.length} flow cell(s), ` +
      `${state.basecallsDirs.length} basecalling folder(s), ${state.diagnostics.length} diagnostic(s)`,
  );

  return {
    name,
    id: makeProjectId(name),
    path: rootPath,
    runs,
    pools,
    flowCells: state.flowCells,
    basecallsDirs: state.basecallsDirs,
    diagnostics: state.diagnostics,
  };
};

export const flowCellIds = (project: Project) =>
  [...new Set(project.flowCells.map((flowCell) => flowCell.id))].sort();

export const earliestDatestamp = (project: Project): string | null =>
  project.flowCells.map((flowCell) => flowCell.date).sort()[0] ?? null;
