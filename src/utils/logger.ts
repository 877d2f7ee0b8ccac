import log from 'electron-log/node';
import { bold, cyan, dim, red, yellow } from 'colorette';
import type { ScanDiagnostic } from '../types/project';

const coerceBoolean = (value: unknown): boolean => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') {
    const normalised = value.trim().toLowerCase();
    return ['1', 'true', 't', 'yes', 'y', 'on'].includes(normalised);
  }
  return false;
};

export const isVerboseEnabled = () => coerceBoolean(process.env.NANOPORE_CATALOG_LOG_VERBOSE);

let configured = false;

export const configureLogging = () => {
  if (configured) return;
  configured = true;
  const logFile = process.env.NANOPORE_CATALOG_LOG_FILE;
  if (logFile) {
    log.transports.file.resolvePathFn = () => logFile;
    log.transports.file.level = 'debug';
  } else {
    log.transports.file.level = false;
  }
  log.transports.console.level = isVerboseEnabled() ? 'debug' : 'warn';
};

export const createLogger = (scope: string) => {
  configureLogging();
  return log.scope(scope);
};

export type Writer = (line: string) => void;

export const stdoutWriter: Writer = (line) => {
  process.stdout.write(`${line}\n`);
};

export const stderrWriter: Writer = (line) => {
  process.stderr.write(`${line}\n`);
};

export const emit = (header: string, details: string[] = [], write: Writer = stdoutWriter) => {
  write(bold(header));
  details.forEach((detail) => {
    detail.split('\n').forEach((line) => write(`   ${line}`));
  });
};

export const emitLines = (lines: string[], write: Writer = stdoutWriter) => {
  lines.forEach((line) => write(line));
};

export const emitError = (message: string, details: string[] = [], write: Writer = stderrWriter) => {
  write(red(message));
  details.forEach((detail) => write(dim(`   ${detail}`)));
};

const diagnosticLabel = (diagnostic: ScanDiagnostic) =>
  diagnostic.kind === 'orphan-basecalls' ? cyan(diagnostic.kind) : yellow(diagnostic.kind);

export const emitDiagnostics = (diagnostics: ScanDiagnostic[], write: Writer = stderrWriter) => {
  if (!diagnostics.length) return;
  write(bold(`${diagnostics.length} scan diagnostic(s):`));
  diagnostics.forEach((diagnostic) => {
    write(`   ${diagnosticLabel(diagnostic)} ${diagnostic.relativePath || '.'}: ${diagnostic.message}`);
  });
};
