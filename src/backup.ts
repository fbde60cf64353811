import { existsSync } from 'node:fs';
import { mkdir, readdir, rm } from 'node:fs/promises';
import path from 'node:path';
import * as tar from 'tar';
import type { Stack } from './config/types';
import { BackupError } from './errors';
import logger from './logger';

export interface BackupOptions {
  /** Timestamp used in the archive name. */
  now?: Date;
}

export interface BackupResult {
  archive: string;
  paths: string[];
  /** Older archives deleted to honour `keep`. */
  pruned: string[];
}

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * `<project>-yyyyMMdd-HHmmss.tar.gz`, in UTC.
 */
export const backupFileName = (project: string, now: Date): string => {
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  return `${project}-${date}-${time}.tar.gz`;
};

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const pruneArchives = async (destination: string, project: string, keep: number): Promise<string[]> => {
  const pattern = new RegExp(`^${escapeRegExp(project)}-\\d{8}-\\d{6}\\.tar\\.gz$`);
  const archives = (await readdir(destination)).filter(name => pattern.test(name)).sort().reverse();

  const pruned: string[] = [];
  for (const name of archives.slice(keep)) {
    const file = path.join(destination, name);
    await rm(file);
    logger.info({ archive: file }, 'Pruned old backup');
    pruned.push(file);
  }
  return pruned;
};

/**
 * Archive the stack's backup paths into a gzipped tarball.
 * Paths are stored relative to the stack directory.
 */
export const createBackup = async (stack: Stack, options: BackupOptions = {}): Promise<BackupResult> => {
  const backup = stack.backup;
  if (!backup) {
    throw new BackupError(`Stack ${stack.file} has no backup section`);
  }

  const entries = backup.paths.map(entry => {
    const absolute = path.resolve(stack.directory, entry);
    const relative = path.relative(stack.directory, absolute);
    if (relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new BackupError(`Backup path ${absolute} is outside the stack directory`);
    }
    if (!existsSync(absolute)) {
      throw new BackupError(`Backup path ${absolute} does not exist`);
    }
    return relative === '' ? '.' : relative;
  });

  await mkdir(backup.destination, { recursive: true });
  const archive = path.join(backup.destination, backupFileName(stack.project, options.now ?? new Date()));

  try {
    await tar.c({ gzip: true, file: archive, cwd: stack.directory, portable: true }, entries);
  } catch (err) {
    throw new BackupError(`Failed to write ${archive}`, { cause: err });
  }
  logger.info({ archive, paths: entries }, 'Backup written');

  const pruned = backup.keep === undefined ? [] : await pruneArchives(backup.destination, stack.project, backup.keep);

  return { archive, paths: entries, pruned };
};
