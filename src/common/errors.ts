import { types } from 'util';

export enum ErrorContext {
  CONFIG_LOAD = 'loading configuration',
  PROJECT_SCAN = 'scanning project directory',
  REPORT_EXTRACT = 'extracting report metadata',
  ANALYSIS_SETUP = 'setting up analysis directory',
  ANALYSIS_LOAD = 'reading analysis directory',
  REPORT_RENDER = 'rendering report',
  FETCH = 'fetching project data',
}

export class CatalogError extends Error {
  constructor(
    message: string,
    public readonly context: ErrorContext,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'CatalogError';
  }
}

export class ValidationError extends CatalogError {
  constructor(message: string, public readonly field?: string) {
    super(field ? `Invalid value for '${field}': ${message}` : message, ErrorContext.ANALYSIS_SETUP);
    this.name = 'ValidationError';
  }
}

export class SamplesIndexError extends CatalogError {
  constructor(message: string, public readonly lineNumber?: number) {
    super(lineNumber ? `Line ${lineNumber}: ${message}` : message, ErrorContext.ANALYSIS_SETUP);
    this.name = 'SamplesIndexError';
  }
}

export class AnalysisDirExistsError extends CatalogError {
  constructor(public readonly targetPath: string) {
    super(`${targetPath}: already exists`, ErrorContext.ANALYSIS_SETUP);
    this.name = 'AnalysisDirExistsError';
  }
}

export class AnalysisDirError extends CatalogError {
  constructor(message: string, cause?: Error) {
    super(message, ErrorContext.ANALYSIS_LOAD, cause);
    this.name = 'AnalysisDirError';
  }
}

export class TemplateError extends CatalogError {
  constructor(message: string) {
    super(message, ErrorContext.REPORT_RENDER);
    this.name = 'TemplateError';
  }
}

export class FileTypeError extends CatalogError {
  constructor(public readonly fileType: string, known: readonly string[]) {
    super(`'${fileType}': unrecognised file type (expected one of: ${known.join(', ')})`, ErrorContext.FETCH);
    this.name = 'FileTypeError';
  }
}

export class ConfigError extends CatalogError {
  constructor(message: string, cause?: Error) {
    super(message, ErrorContext.CONFIG_LOAD, cause);
    this.name = 'ConfigError';
  }
}

export const toError = (error: unknown): Error =>
  error instanceof Error || types.isNativeError(error) ? error : new Error(String(error));

export const formatErrorMessage = (error: unknown, context: ErrorContext): string => {
  if (error instanceof CatalogError) {
    return `Failed ${error.context}: ${error.message}`;
  }
  return `Failed ${context}: ${toError(error).message}`;
};

export const errorCode = (error: unknown): string | undefined => {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
};
