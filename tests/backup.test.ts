import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import * as tar from 'tar';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { backupFileName, createBackup } from '../src/backup';
import { BackupError } from '../src/errors';
import { stackFrom } from './helpers/stack';

const NOW = new Date(Date.UTC(2026, 0, 2, 3, 4, 5));

describe('backupFileName', () => {
  it('stamps the project name with the UTC time', () => {
    expect(backupFileName('media', NOW)).toBe('media-20260102-030405.tar.gz');
  });
});

describe('createBackup', () => {
  let dir: string;

  const stackWith = (backup: string[]) => stackFrom(
    [ 'name: media', 'services:', '  web:', '    image: nginx', 'backup:', ...backup ],
    path.join(dir, 'homestack.yaml')
  );

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'homestack-backup-'));
    await mkdir(path.join(dir, 'config'));
    await mkdir(path.join(dir, 'data'));
    await writeFile(path.join(dir, 'config', 'app.ini'), 'mode=prod\n');
    await writeFile(path.join(dir, 'data', 'notes.txt'), 'hello\n');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('archives the paths relative to the stack directory', async () => {
    const stack = stackWith([ '  paths: [config, data/notes.txt]', '  destination: ./backups' ]);

    const result = await createBackup(stack, { now: NOW });

    expect(result).toEqual({
      archive: path.join(dir, 'backups', 'media-20260102-030405.tar.gz'),
      paths: [ 'config', 'data/notes.txt' ],
      pruned: [],
    });

    const restored = path.join(dir, 'restored');
    await mkdir(restored);
    await tar.x({ file: result.archive, cwd: restored });
    await expect(readFile(path.join(restored, 'config', 'app.ini'), 'utf-8')).resolves.toBe('mode=prod\n');
    await expect(readFile(path.join(restored, 'data', 'notes.txt'), 'utf-8')).resolves.toBe('hello\n');
  });

  it('keeps only the newest archives', async () => {
    const backups = path.join(dir, 'backups');
    await mkdir(backups);
    await writeFile(path.join(backups, 'media-20250101-000000.tar.gz'), '');
    await writeFile(path.join(backups, 'media-20250201-000000.tar.gz'), '');
    await writeFile(path.join(backups, 'other.tar.gz'), '');
    const stack = stackWith([ '  paths: [config]', '  destination: ./backups', '  keep: 2' ]);

    const result = await createBackup(stack, { now: NOW });

    expect(result.pruned).toEqual([ path.join(backups, 'media-20250101-000000.tar.gz') ]);
    expect((await readdir(backups)).sort()).toEqual([
      'media-20250201-000000.tar.gz',
      'media-20260102-030405.tar.gz',
      'other.tar.gz',
    ]);
  });

  it('rejects missing paths and paths outside the stack directory', async () => {
    await expect(createBackup(stackWith([ '  paths: [missing]', '  destination: ./backups' ])))
      .rejects.toThrow(`Backup path ${path.join(dir, 'missing')} does not exist`);
    await expect(createBackup(stackWith([ '  paths: [../elsewhere]', '  destination: ./backups' ])))
      .rejects.toThrow(`Backup path ${path.join(path.dirname(dir), 'elsewhere')} is outside the stack directory`);
  });

  it('fails without a backup section', async () => {
    const stack = stackFrom([ 'name: media', 'services:', '  web:', '    image: nginx' ], path.join(dir, 'homestack.yaml'));

    await expect(createBackup(stack)).rejects.toThrow(BackupError);
  });
});
