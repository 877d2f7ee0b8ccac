import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ConfigError, errorCode, toError } from '../common/errors';
import { formatPermissions, parsePermissions, type AccessSettings } from '../common/access';
import { BUILTIN_TEMPLATES } from './reportRenderer';
import { DEFAULT_FILE_TYPES, parseFileTypes, type FetchFileType } from './fetchSelector';
import { createLogger } from '../utils/logger';

const logger = createLogger('settings');

export const SETTINGS_FILE_NAME = 'nanopore-catalog.json';
export const DEFAULT_RUNNER = 'SimpleJobRunner';
export const KNOWN_RUNNERS = ['rsync'] as const;

export interface CatalogSettings {
  /** File the settings were read from, `null` for built-in defaults */
  source: string | null;
  general: {
    defaultRunner: string;
    permissions: number | null;
    group: string | null;
  };
  runners: Record<string, string>;
  reportingTemplates: Record<string, string>;
  fetch: {
    defaultFileTypes: FetchFileType[];
  };
}

export interface SettingsOptions {
  configFile?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

type JsonObject = Record<string, unknown>;

const isObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const configDir = (env: NodeJS.ProcessEnv) =>
  path.join(env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config'), 'nanopore-catalog');

const fileExists = async (filePath: string) => {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
};

export const locateSettingsFile = async ({
  configFile,
  env = process.env,
  cwd = process.cwd(),
}: SettingsOptions = {}): Promise<string | null> => {
  const named = configFile ?? env.NANOPORE_CATALOG_CONFIG;
  if (named) {
    const resolved = path.resolve(cwd, named);
    if (!(await fileExists(resolved))) {
      throw new ConfigError(`${resolved}: configuration file not found`);
    }
    return resolved;
  }
  for (const candidate of [path.join(cwd, SETTINGS_FILE_NAME), path.join(configDir(env), SETTINGS_FILE_NAME)]) {
    if (await fileExists(candidate)) return candidate;
  }
  return null;
};

const section = (data: JsonObject, name: string): JsonObject => {
  const value = data[name];
  if (value === undefined) return {};
  if (!isObject(value)) {
    throw new ConfigError(`'${name}': section must be an object`);
  }
  return value;
};

const optionalString = (data: JsonObject, key: string, sectionName: string): string | undefined => {
  const value = data[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'number' && Number.isInteger(value)) return String(value);
  if (typeof value !== 'string') {
    throw new ConfigError(`'${sectionName}.${key}': expected a string`);
  }
  return value.trim() || undefined;
};

const stringMap = (data: JsonObject, sectionName: string): Record<string, string> => {
  const values: Record<string, string> = {};
  Object.keys(data).forEach((key) => {
    const value = optionalString(data, key, sectionName);
    if (value !== undefined) values[key] = value;
  });
  return values;
};

const fileTypeList = (data: JsonObject): FetchFileType[] => {
  const value = data.default_file_types;
  if (value === undefined) return [...DEFAULT_FILE_TYPES];
  if (typeof value === 'string') return parseFileTypes(value);
  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    return parseFileTypes(value);
  }
  throw new ConfigError("'fetch.default_file_types': expected a list of file types");
};

const withConfigError = <T>(read: () => T): T => {
  try {
    return read();
  } catch (error) {
    if (error instanceof ConfigError) throw error;
    throw new ConfigError(toError(error).message, toError(error));
  }
};

export const parseSettings = (
  data: unknown,
  source: string | null,
  env: NodeJS.ProcessEnv = process.env,
): CatalogSettings =>
  withConfigError(() => {
    if (!isObject(data)) {
      throw new ConfigError('settings must be a JSON object');
    }
    const general = section(data, 'general');
    const defaultRunner = optionalString(general, 'default_runner', 'general') ?? DEFAULT_RUNNER;
    const permissions =
      env.NANOPORE_CATALOG_PERMISSIONS?.trim() || optionalString(general, 'permissions', 'general');
    const group = env.NANOPORE_CATALOG_GROUP?.trim() || optionalString(general, 'group', 'general');

    const runners = stringMap(section(data, 'runners'), 'runners');
    KNOWN_RUNNERS.forEach((name) => {
      runners[name] = runners[name] ?? defaultRunner;
    });

    return {
      source,
      general: {
        defaultRunner,
        permissions: permissions ? parsePermissions(permissions) : null,
        group: group ?? null,
      },
      runners,
      reportingTemplates: {
        ...BUILTIN_TEMPLATES,
        ...stringMap(section(data, 'reporting_templates'), 'reporting_templates'),
      },
      fetch: { defaultFileTypes: fileTypeList(section(data, 'fetch')) },
    };
  });

export const loadSettings = async (options: SettingsOptions = {}): Promise<CatalogSettings> => {
  const env = options.env ?? process.env;
  const source = await locateSettingsFile(options);
  if (!source) {
    logger.debug('No settings file found, using defaults');
    return parseSettings({}, null, env);
  }

  let data: unknown;
  try {
    data = JSON.parse(await fs.readFile(source, 'utf8'));
  } catch (error) {
    const reason = errorCode(error) ? toError(error).message : `invalid JSON (${toError(error).message})`;
    throw new ConfigError(`${source}: ${reason}`, toError(error));
  }
  logger.debug(`Loaded settings from ${source}`);
  try {
    return parseSettings(data, source, env);
  } catch (error) {
    throw new ConfigError(`${source}: ${toError(error).message}`, toError(error));
  }
};

export const accessSettings = (settings: CatalogSettings): AccessSettings => ({
  permissions: settings.general.permissions ?? undefined,
  group: settings.general.group ?? undefined,
});

export const describeSettings = (settings: CatalogSettings): string[] => [
  `Settings file : ${settings.source ?? '(none, using defaults)'}`,
  '',
  '[general]',
  `default_runner = ${settings.general.defaultRunner}`,
  `permissions = ${settings.general.permissions === null ? '' : formatPermissions(settings.general.permissions)}`,
  `group = ${settings.general.group ?? ''}`,
  '',
  '[runners]',
  ...Object.keys(settings.runners)
    .sort()
    .map((name) => `${name} = ${settings.runners[name]}`),
  '',
  '[reporting_templates]',
  ...Object.keys(settings.reportingTemplates)
    .sort()
    .map((name) => `${name} = ${settings.reportingTemplates[name]}`),
  '',
  '[fetch]',
  `default_file_types = ${settings.fetch.defaultFileTypes.join(',')}`,
];
