import fs from 'fs/promises';
import path from 'path';
import { execFile } from 'child_process';
import { promisify } from 'util';
import { ConfigError } from './errors';

const execFileAsync = promisify(execFile);

export interface AccessSettings {
  /** Mode applied to files; directories also get execute where read is set */
  permissions?: number;
  /** Group name or numeric gid */
  group?: string;
}

export const parsePermissions = (value: string): number => {
  const trimmed = value.trim();
  if (!/^0?[0-7]{3,4}$/.test(trimmed)) {
    throw new ConfigError(`'${value}': permissions must be an octal mode such as 0750`);
  }
  return Number.parseInt(trimmed, 8);
};

export const formatPermissions = (mode: number) => `0${mode.toString(8).padStart(3, '0')}`;

export const directoryMode = (mode: number) => mode | ((mode & 0o444) >> 2);

const applyGroup = async (targetPath: string, group: string) => {
  if (/^\d+$/.test(group)) {
    await fs.lchown(targetPath, -1, Number.parseInt(group, 10));
    return;
  }
  await execFileAsync('chgrp', ['-h', group, targetPath]);
};

export const hasAccessSettings = (settings: AccessSettings) =>
  settings.permissions !== undefined || Boolean(settings.group);

export const applyAccess = async (targetPath: string, settings: AccessSettings) => {
  if (!hasAccessSettings(settings)) return;
  const stats = await fs.lstat(targetPath);
  if (stats.isSymbolicLink()) return;
  if (settings.permissions !== undefined) {
    const mode = stats.isDirectory() ? directoryMode(settings.permissions) : settings.permissions;
    await fs.chmod(targetPath, mode);
  }
  if (settings.group) {
    await applyGroup(targetPath, settings.group);
  }
};

export const applyAccessRecursive = async (targetPath: string, settings: AccessSettings) => {
  if (!hasAccessSettings(settings)) return;
  const stats = await fs.lstat(targetPath);
  if (stats.isDirectory()) {
    const entries = await fs.readdir(targetPath);
    for (const entry of entries) {
      await applyAccessRecursive(path.join(targetPath, entry), settings);
    }
  }
  await applyAccess(targetPath, settings);
};
