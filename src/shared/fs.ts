/**
 * File helpers for everything the agent persists.
 *
 * Writes go to a uniquely named temp file in the target directory and are
 * renamed into place, so a crash mid-write never leaves a truncated file.
 * Every file is created 0600 inside a 0700 directory.
 */

import { randomUUID } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { z } from 'zod';

import { PermissionError } from './errors.js';
import { createLogger } from './logger.js';

const log = createLogger('fs');

export function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

export async function ensureDir(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true, mode: 0o700 });
}

function tempPathFor(filePath: string): string {
  return path.join(path.dirname(filePath), `.${path.basename(filePath)}.${randomUUID()}.tmp`);
}

async function writeTemp(filePath: string, content: string): Promise<string> {
  await ensureDir(path.dirname(filePath));
  const temp = tempPathFor(filePath);
  await fs.writeFile(temp, content, { encoding: 'utf8', mode: 0o600 });
  // mode is masked by umask on creation
  await fs.chmod(temp, 0o600);
  return temp;
}

export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const temp = await writeTemp(filePath, content);
  try {
    await fs.rename(temp, filePath);
  } catch (err) {
    await removeFile(temp);
    throw err;
  }
}

export async function writeJsonFileAtomic(filePath: string, value: unknown): Promise<void> {
  await atomicWrite(filePath, JSON.stringify(value, null, 2));
}

/**
 * Create `filePath` only if it does not exist yet.
 *
 * The content is written to a temp file first and hard-linked into place;
 * `link` fails with EEXIST when another writer got there first.
 *
 * @returns false when the file already existed (nothing was written).
 */
export async function createExclusive(filePath: string, content: string): Promise<boolean> {
  const temp = await writeTemp(filePath, content);
  try {
    await fs.link(temp, filePath);
    return true;
  } catch (err) {
    if (isNodeError(err) && err.code === 'EEXIST') return false;
    throw err;
  } finally {
    await removeFile(temp);
  }
}

/**
 * Read and validate a JSON file.
 *
 * @returns null when the file does not exist, or when it exists but is not
 *   valid JSON matching `schema` (logged, then treated as absent).
 */
export async function readJsonFile<T>(filePath: string, schema: z.ZodType<T>): Promise<T | null> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (err) {
    if (isNodeError(err) && err.code === 'ENOENT') return null;
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    log.warn(`Ignoring ${filePath}: not valid JSON`);
    return null;
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    log.warn(`Ignoring ${filePath}: ${parsed.error.issues[0]?.message ?? 'unexpected shape'}`);
    return null;
  }
  return parsed.data;
}

export async function removeFile(filePath: string): Promise<boolean> {
  try {
    await fs.unlink(filePath);
    return true;
  } catch (err) {
    if (isNodeError(err) && err.code === 'ENOENT') return false;
    throw err;
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Refuse to use a secret file that other users can read or write.
 * Skipped on Windows, where POSIX mode bits are not meaningful.
 */
export async function assertOwnerOnly(filePath: string): Promise<void> {
  if (process.platform === 'win32') return;
  const stat = await fs.stat(filePath);
  const exposed = stat.mode & 0o077;
  if (exposed !== 0) {
    throw new PermissionError(
      filePath,
      `${filePath} is accessible by other users (mode ${(stat.mode & 0o777).toString(8)}); run: chmod 600 ${filePath}`,
    );
  }
}
