/**
 * Workspace and run lock tests (real filesystem, temp directories)
 */

import { mkdtemp, mkdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DeploymentLockedError } from '@stackwright/shared';
import { FileLock, isProcessAlive } from '../lock.js';
import { FsWorkspace } from '../workspace.service.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'stackwright-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

describe('FsWorkspace', () => {
  it('should detect the env file', async () => {
    const workspace = new FsWorkspace(dir, '.env', []);

    expect(await workspace.envFileExists()).toBe(false);
    await writeFile(join(dir, '.env'), 'BOT_TOKEN=test-secret\n');
    expect(await workspace.envFileExists()).toBe(true);
  });

  it('should not accept a directory as the env file', async () => {
    await mkdir(join(dir, '.env'));
    const workspace = new FsWorkspace(dir, '.env', []);

    expect(await workspace.envFileExists()).toBe(false);
  });

  it('should create missing directories once', async () => {
    const workspace = new FsWorkspace(dir, '.env', ['logs', 'ssl']);

    expect(await workspace.ensureDirectories()).toEqual(['logs', 'ssl']);
    expect(await workspace.ensureDirectories()).toEqual([]);
    expect((await stat(join(dir, 'logs'))).isDirectory()).toBe(true);
    expect((await stat(join(dir, 'ssl'))).isDirectory()).toBe(true);
  });

  it('should leave existing directories untouched', async () => {
    await mkdir(join(dir, 'logs'));
    await writeFile(join(dir, 'logs', 'bot.log'), 'line\n');
    const workspace = new FsWorkspace(dir, '.env', ['logs', 'ssl']);

    expect(await workspace.ensureDirectories()).toEqual(['ssl']);
    expect(await readFile(join(dir, 'logs', 'bot.log'), 'utf-8')).toBe('line\n');
  });
});

describe('FileLock', () => {
  it('should write the holder pid and remove the file on release', async () => {
    const path = join(dir, '.stackwright.lock');
    const lock = new FileLock(path, { runId: 'run-a' });

    await lock.acquire();
    const record: unknown = JSON.parse(await readFile(path, 'utf-8'));
    expect(record).toMatchObject({ pid: process.pid, runId: 'run-a' });

    await lock.release();
    expect(await exists(path)).toBe(false);
  });

  it('should refuse while a live process holds the lock', async () => {
    const path = join(dir, '.stackwright.lock');
    const first = new FileLock(path, { runId: 'run-a' });
    const second = new FileLock(path, { runId: 'run-b' });

    await first.acquire();

    await expect(second.acquire()).rejects.toThrow(DeploymentLockedError);
    await expect(second.acquire()).rejects.toThrow(
      `Another deployment is in progress (held by pid ${process.pid}): ${path}`,
    );
    await first.release();
  });

  it('should reclaim a lock left by a dead process', async () => {
    const path = join(dir, '.stackwright.lock');
    await writeFile(path, JSON.stringify({ pid: 4242, runId: 'stale', acquiredAt: '2024-01-01T00:00:00.000Z' }));
    const lock = new FileLock(path, { runId: 'run-new', isAlive: () => false });

    await lock.acquire();

    const record: unknown = JSON.parse(await readFile(path, 'utf-8'));
    expect(record).toMatchObject({ pid: process.pid, runId: 'run-new' });
    await lock.release();
  });

  it('should reclaim an unreadable lock file', async () => {
    const path = join(dir, '.stackwright.lock');
    await writeFile(path, 'not json');
    const lock = new FileLock(path, { runId: 'run-new' });

    await expect(lock.acquire()).resolves.toBeUndefined();
    await lock.release();
  });

  it('should not remove a lock it does not hold', async () => {
    const path = join(dir, '.stackwright.lock');
    const holder = new FileLock(path, { runId: 'run-a' });
    const other = new FileLock(path, { runId: 'run-b' });

    await holder.acquire();
    await other.release();

    expect(await exists(path)).toBe(true);
    await holder.release();
  });
});

describe('isProcessAlive', () => {
  it('should report the current process as alive', () => {
    expect(isProcessAlive(process.pid)).toBe(true);
  });
});
