import fs from 'fs/promises';
import path from 'path';
import { ConfigError } from '../common/errors';
import { BUILTIN_TEMPLATES } from '../main/reportRenderer';
import {
  SETTINGS_FILE_NAME,
  accessSettings,
  describeSettings,
  loadSettings,
  locateSettingsFile,
  parseSettings,
} from '../main/settings';
import { cleanupTempDir, makeTempDir } from '../../tests/fixtures/mockPromethion';

describe('parseSettings', () => {
  it('fills in defaults for an empty file', () => {
    expect(parseSettings({}, null, {})).toEqual({
      source: null,
      general: { defaultRunner: 'SimpleJobRunner', permissions: null, group: null },
      runners: { rsync: 'SimpleJobRunner' },
      reportingTemplates: BUILTIN_TEMPLATES,
      fetch: { defaultFileTypes: ['bam', 'report'] },
    });
  });

  it('reads general settings, runners, templates and fetch types', () => {
    const settings = parseSettings(
      {
        general: { default_runner: 'LocalRunner', permissions: '0640', group: 'seqdata' },
        runners: { rsync: 'SimpleJobRunner' },
        reporting_templates: { short: 'id,user', bcf: 'id' },
        fetch: { default_file_types: ['fastq', 'report'] },
      },
      '/etc/nanopore-catalog.json',
      {},
    );
    expect(settings.general).toEqual({ defaultRunner: 'LocalRunner', permissions: 0o640, group: 'seqdata' });
    expect(settings.runners).toEqual({ rsync: 'SimpleJobRunner' });
    expect(settings.reportingTemplates.short).toBe('id,user');
    expect(settings.reportingTemplates.bcf).toBe('id');
    expect(settings.reportingTemplates.summary).toBe(BUILTIN_TEMPLATES.summary);
    expect(settings.fetch.defaultFileTypes).toEqual(['fastq', 'report']);
    expect(accessSettings(settings)).toEqual({ permissions: 0o640, group: 'seqdata' });
  });

  it('lets the environment override permissions and group', () => {
    const settings = parseSettings({ general: { permissions: '0640', group: 'seqdata' } }, null, {
      NANOPORE_CATALOG_PERMISSIONS: '0600',
      NANOPORE_CATALOG_GROUP: '1001',
    });
    expect(settings.general.permissions).toBe(0o600);
    expect(settings.general.group).toBe('1001');
  });

  it('ignores blank environment overrides', () => {
    const settings = parseSettings({ general: { permissions: '0640', group: 'seqdata' } }, null, {
      NANOPORE_CATALOG_PERMISSIONS: '',
      NANOPORE_CATALOG_GROUP: '  ',
    });
    expect(settings.general.permissions).toBe(0o640);
    expect(settings.general.group).toBe('seqdata');
  });

  it('rejects badly typed values', () => {
    expect(() => parseSettings({ general: [] }, null, {})).toThrow("'general': section must be an object");
    expect(() => parseSettings({ general: { group: true } }, null, {})).toThrow("'general.group': expected a string");
    expect(() => parseSettings({ general: { permissions: 'rwx' } }, null, {})).toThrow(ConfigError);
    expect(() => parseSettings({ fetch: { default_file_types: ['cram'] } }, null, {})).toThrow(ConfigError);
    expect(() => parseSettings([], null, {})).toThrow('settings must be a JSON object');
  });
});

describe('describeSettings', () => {
  it('lists every section', () => {
    const settings = parseSettings({ general: { permissions: '0750' } }, null, {});
    const lines = describeSettings(settings);
    expect(lines.slice(0, 9)).toEqual([
      'Settings file : (none, using defaults)',
      '',
      '[general]',
      'default_runner = SimpleJobRunner',
      'permissions = 0750',
      'group = ',
      '',
      '[runners]',
      'rsync = SimpleJobRunner',
    ]);
    expect(lines.slice(-2)).toEqual(['[fetch]', 'default_file_types = bam,report']);
  });
});

describe('settings files', () => {
  let workspace: string;

  beforeEach(async () => {
    workspace = await makeTempDir('settings-test-');
  });

  afterEach(async () => {
    await cleanupTempDir(workspace);
  });

  it('finds the settings file in the working directory before the user config directory', async () => {
    const configHome = path.join(workspace, 'config');
    await fs.mkdir(path.join(configHome, 'nanopore-catalog'), { recursive: true });
    await fs.writeFile(path.join(configHome, 'nanopore-catalog', SETTINGS_FILE_NAME), '{}');
    const env = { XDG_CONFIG_HOME: configHome };

    expect(await locateSettingsFile({ env, cwd: workspace })).toBe(
      path.join(configHome, 'nanopore-catalog', SETTINGS_FILE_NAME),
    );
    await fs.writeFile(path.join(workspace, SETTINGS_FILE_NAME), '{}');
    expect(await locateSettingsFile({ env, cwd: workspace })).toBe(path.join(workspace, SETTINGS_FILE_NAME));
  });

  it('uses defaults when no settings file exists', async () => {
    const settings = await loadSettings({ env: { XDG_CONFIG_HOME: workspace }, cwd: workspace });
    expect(settings.source).toBeNull();
  });

  it('fails when a named settings file is missing', async () => {
    await expect(loadSettings({ configFile: 'absent.json', env: {}, cwd: workspace })).rejects.toThrow(
      `${path.join(workspace, 'absent.json')}: configuration file not found`,
    );
  });

  it('reads the file named by the environment', async () => {
    const configFile = path.join(workspace, 'site.json');
    await fs.writeFile(configFile, JSON.stringify({ general: { group: 'seqdata' } }));
    const settings = await loadSettings({ env: { NANOPORE_CATALOG_CONFIG: configFile }, cwd: workspace });
    expect(settings.source).toBe(configFile);
    expect(settings.general.group).toBe('seqdata');
  });

  it('reports invalid JSON with the file name', async () => {
    const configFile = path.join(workspace, 'broken.json');
    await fs.writeFile(configFile, '{ "general": ');
    await expect(loadSettings({ configFile, env: {}, cwd: workspace })).rejects.toThrow(
      new RegExp(`^${configFile.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')}: invalid JSON \\(`),
    );
  });

  it('prefixes validation errors with the file name', async () => {
    const configFile = path.join(workspace, 'bad.json');
    await fs.writeFile(configFile, JSON.stringify({ general: { permissions: '999' } }));
    await expect(loadSettings({ configFile, env: {}, cwd: workspace })).rejects.toThrow(
      `${configFile}: '999': permissions must be an octal mode such as 0750`,
    );
  });
});
