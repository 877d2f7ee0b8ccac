import fs from 'fs/promises';
import { parseArgs } from 'util';
import type { ReportMode } from '../types/analysis';
import type { TransferExecutor, TransferResponse } from '../types/transfer';
import { CatalogError, ErrorContext, TemplateError, ValidationError, toError } from '../common/errors';
import { barcodeDirName, fmtValue } from '../common/format';
import { emit, emitDiagnostics, emitError, emitLines, type Writer } from '../utils/logger';
import { scanProject } from './scanner';
import { detectReportFormat, extractReportRecord, parseReportFile } from './reportExtractor';
import {
  INFO_COLUMNS,
  buildFlowCellsTable,
  createAnalysisDir,
  loadAnalysisDir,
  serializeTable,
} from './analysisDir';
import { isReportMode, renderReport, resolveTemplateFields } from './reportRenderer';
import { buildTransferPlan, parseFileTypes, selectFiles } from './fetchSelector';
import { createCopyExecutor } from './transferExecutor';
import { DEFAULT_RUNNER, accessSettings, describeSettings, type CatalogSettings } from './settings';
import type { ReportRecord } from '../types/report';

export interface CommandIO {
  stdout: Writer;
  stderr: Writer;
}

export interface CommandContext {
  settings: CatalogSettings;
  io: CommandIO;
  /** Job runner name → transfer executor used by `fetch` */
  executors?: Record<string, (settings: CatalogSettings) => TransferExecutor>;
}

export const SETUP_SUMMARY_FIELDS =
  'name,id,datestamp,platform,analysis_dir,,user,pi,application,organism,primary_data,comments';

const DEFAULT_EXECUTORS: Record<string, (settings: CatalogSettings) => TransferExecutor> = {
  [DEFAULT_RUNNER]: (settings) => createCopyExecutor({ access: accessSettings(settings) }),
};

const requirePositional = (positionals: string[], index: number, name: string) => {
  const value = positionals[index];
  if (!value) {
    throw new ValidationError('missing required argument', name);
  }
  return value;
};

export const runInfo = async (argv: string[], { io }: CommandContext) => {
  const { positionals } = parseArgs({ args: argv, allowPositionals: true, options: {} });
  const project = await scanProject(requirePositional(positionals, 0, 'PROJECT_DIR'));
  const records = new Map<string, ReportRecord>();
  for (const unit of [...project.flowCells, ...project.basecallsDirs]) {
    records.set(unit.path, await extractReportRecord(unit));
  }
  const rows = buildFlowCellsTable(project, records, { withBarcodes: true });
  emitLines(serializeTable(INFO_COLUMNS, rows).trimEnd().split('\n'), io.stdout);
  emitDiagnostics(project.diagnostics, io.stderr);
  return 0;
};

const METADATA_LABELS: Array<[string, keyof ReportRecord]> = [
  ['Flow cell ID', 'flowCellId'],
  ['Flow cell type', 'flowCellType'],
  ['Kit type', 'kit'],
  ['Basecalling', 'basecalling'],
  ['Basecalling model', 'basecallingModel'],
  ['Basecalling config', 'basecallingConfig'],
  ['Modified basecalling', 'modifiedBasecalling'],
  ['Modified base context', 'modifications'],
  ['Barcode trimming', 'trimBarcodes'],
  ['Read count', 'readCount'],
  ['Run duration (s)', 'runDurationSeconds'],
];

export const formatReportRecord = (record: ReportRecord): string[] => {
  const lines = METADATA_LABELS.map(([label, key]) => {
    const value = record[key];
    return `${label.padEnd(21)}: ${typeof value === 'string' || typeof value === 'number' ? value : fmtValue(null)}`;
  });
  if (record.barcodeReadCounts) {
    Object.entries(record.barcodeReadCounts).forEach(([barcode, count]) => {
      lines.push(`${`Reads ${barcodeDirName(Number(barcode))}`.padEnd(21)}: ${count}`);
    });
  }
  if (record.softwareVersions) {
    Object.entries(record.softwareVersions).forEach(([name, version]) => {
      lines.push(`${`Version ${name}`.padEnd(21)}: ${version}`);
    });
  }
  return lines;
};

export const runMetadata = async (argv: string[], { io }: CommandContext) => {
  const { positionals, values } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: { json: { type: 'boolean', short: 'j', default: false } },
  });
  const file = requirePositional(positionals, 0, 'REPORT');
  const format = detectReportFormat(file);
  if (format === null) {
    throw new CatalogError(`${file}: not an HTML, JSON or Markdown report`, ErrorContext.REPORT_EXTRACT);
  }
  const parsed = await parseReportFile(file, format);
  if (!parsed) {
    throw new CatalogError(`${file}: unable to extract report data`, ErrorContext.REPORT_EXTRACT);
  }
  if (values.json) {
    const raw = typeof parsed.raw === 'string' ? parsed.raw.trimEnd() : JSON.stringify(parsed.raw, null, 4);
    emitLines(raw.split('\n'), io.stdout);
    return 0;
  }
  emitLines(formatReportRecord({ sources: [parsed.path], ...parsed.fields }), io.stdout);
  return 0;
};

export const runSetup = async (argv: string[], { io, settings }: CommandContext) => {
  const { positionals, values } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      user: { type: 'string', short: 'u' },
      pi: { type: 'string', short: 'p' },
      application: { type: 'string', short: 'a' },
      organism: { type: 'string', short: 'o' },
      samples_csv: { type: 'string', short: 's' },
      'samples-csv': { type: 'string' },
      comments: { type: 'string', short: 'c' },
    },
  });
  const projectDir = requirePositional(positionals, 0, 'PROJECT_DIR');
  const destination = positionals[1] ?? process.cwd();
  const samplesFile = values.samples_csv ?? values['samples-csv'];
  let samplesIndex: string | undefined;
  if (samplesFile) {
    try {
      samplesIndex = await fs.readFile(samplesFile, 'utf8');
    } catch (error) {
      throw new CatalogError(`${samplesFile}: ${toError(error).message}`, ErrorContext.ANALYSIS_SETUP, toError(error));
    }
  }

  const analysis = await createAnalysisDir(
    {
      projectDir,
      destination,
      user: values.user ?? '',
      PI: values.pi ?? '',
      application: values.application ?? '',
      organism: values.organism ?? '',
      samplesIndex,
      comments: values.comments,
    },
    { access: accessSettings(settings) },
  );
  emitLines(renderReport(analysis, SETUP_SUMMARY_FIELDS, 'summary').split('\n'), io.stdout);
  return 0;
};

export const runReport = async (argv: string[], { io, settings }: CommandContext) => {
  const { positionals, values } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      mode: { type: 'string', short: 'm', default: 'summary' },
      template: { type: 'string', short: 't' },
      fields: { type: 'string', short: 'f' },
      out_file: { type: 'string', short: 'o' },
      'out-file': { type: 'string' },
    },
  });
  const mode = values.mode ?? 'summary';
  if (!isReportMode(mode)) {
    throw new TemplateError(`'${mode}': unknown reporting mode`);
  }
  const reportMode: ReportMode = mode;
  const fields = resolveTemplateFields({
    mode: reportMode,
    fields: values.fields,
    template: values.template,
    templates: settings.reportingTemplates,
  });
  const analysis = await loadAnalysisDir(requirePositional(positionals, 0, 'ANALYSIS_DIR'));
  const text = renderReport(analysis, fields, reportMode);
  const outFile = values.out_file ?? values['out-file'];
  if (outFile) {
    await fs.writeFile(outFile, `${text}\n`, 'utf8');
    return 0;
  }
  emitLines(text.split('\n'), io.stdout);
  return 0;
};

const summariseTransfer = (response: TransferResponse, io: CommandIO) => {
  const { dryRunReport } = response;
  emit(
    `${response.dryRun ? 'Dry run' : 'Transfer'}: ${dryRunReport.items.length} file(s) from ${dryRunReport.sourceRoot}`,
    [
      `Target: ${dryRunReport.targetRoot}`,
      `Bytes to copy: ${dryRunReport.totalBytes}`,
      ...dryRunReport.items.map((entry) => `${entry.precondition.padEnd(14)} ${entry.item.relativePath}`),
    ],
    io.stdout,
  );
  if (!response.dryRun) {
    const counts = { applied: 0, skipped: 0, failed: 0 };
    response.results.forEach((result) => {
      counts[result.status] += 1;
    });
    emitLines([`Copied ${counts.applied}, skipped ${counts.skipped}, failed ${counts.failed}`], io.stdout);
  }
  if (dryRunReport.issues.length) {
    emitError(`${dryRunReport.issues.length} problem(s) found`, dryRunReport.issues, io.stderr);
  }
};

export const runFetch = async (argv: string[], context: CommandContext) => {
  const { io, settings } = context;
  const { positionals, values } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      files: { type: 'string' },
      'dry-run': { type: 'boolean', default: false },
      runner: { type: 'string', short: 'r' },
    },
  });
  const projectDir = requirePositional(positionals, 0, 'PROJECT_DIR');
  const destination = requirePositional(positionals, 1, 'DEST');
  const fileTypes = values.files ? parseFileTypes(values.files) : settings.fetch.defaultFileTypes;

  const runnerName = values.runner ?? settings.runners.rsync ?? settings.general.defaultRunner;
  const makeExecutor = (context.executors ?? DEFAULT_EXECUTORS)[runnerName];
  if (!makeExecutor) {
    throw new CatalogError(`'${runnerName}': unsupported job runner`, ErrorContext.FETCH);
  }

  const project = await scanProject(projectDir);
  const items = await selectFiles(project, fileTypes);
  const plan = buildTransferPlan(project, destination, items);
  const response = await makeExecutor(settings).transfer(plan, { dryRun: values['dry-run'] });
  summariseTransfer(response, io);
  return response.ok ? 0 : 1;
};

export const runConfig = async (_argv: string[], { io, settings }: CommandContext) => {
  emitLines(describeSettings(settings), io.stdout);
  return 0;
};

export type CommandHandler = (argv: string[], context: CommandContext) => Promise<number>;

export const COMMANDS: Record<string, { handler: CommandHandler; context: ErrorContext; usage: string }> = {
  info: { handler: runInfo, context: ErrorContext.PROJECT_SCAN, usage: 'info PROJECT_DIR' },
  metadata: { handler: runMetadata, context: ErrorContext.REPORT_EXTRACT, usage: 'metadata REPORT [--json]' },
  setup: {
    handler: runSetup,
    context: ErrorContext.ANALYSIS_SETUP,
    usage:
      'setup PROJECT_DIR [PARENT_DIR] --user USER --pi PI --application APP --organism ORGANISM ' +
      '[--samples_csv FILE] [--comments TEXT]',
  },
  report: {
    handler: runReport,
    context: ErrorContext.REPORT_RENDER,
    usage: 'report ANALYSIS_DIR [--mode summary|tsv] [--template NAME] [--fields LIST] [--out_file FILE]',
  },
  fetch: {
    handler: runFetch,
    context: ErrorContext.FETCH,
    usage: 'fetch PROJECT_DIR DEST [--files TYPES] [--dry-run] [--runner RUNNER]',
  },
  config: { handler: runConfig, context: ErrorContext.CONFIG_LOAD, usage: 'config' },
};

export const usageLines = (program: string) => [
  `Usage: ${program} [--config FILE] COMMAND ...`,
  '',
  ...Object.values(COMMANDS).map((command) => `  ${program} ${command.usage}`),
];
