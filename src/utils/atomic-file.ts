/**
 * Crash-safe file replacement:
 * 1. write a uniquely named temp file beside the target
 * 2. fsync it
 * 3. rename it over the target (atomic on POSIX)
 * 4. fsync the parent directory
 *
 * A reader sees either the old or the new content, never a partial file.
 */

import { mkdir, open, rename, unlink, link } from 'node:fs/promises';
import { dirname, basename, join } from 'node:path';
import { randomBytes } from 'node:crypto';

function tempPathFor(target: string): string {
  const suffix = `${process.pid}.${randomBytes(4).toString('hex')}`;
  return join(dirname(target), `.${basename(target)}.${suffix}.tmp`);
}

async function writeSynced(path: string, content: string): Promise<void> {
  const fd = await open(path, 'w');
  try {
    await fd.write(content, null, 'utf-8');
    await fd.sync();
  } finally {
    await fd.close();
  }
}

async function syncDirectory(dir: string): Promise<void> {
  const fd = await open(dir, 'r');
  try {
    await fd.sync();
  } finally {
    await fd.close();
  }
}

export async function writeFileAtomic(target: string, content: string): Promise<void> {
  await mkdir(dirname(target), { recursive: true });
  const tmp = tempPathFor(target);

  try {
    await writeSynced(tmp, content);
    await rename(tmp, target);
  } catch (err) {
    await unlink(tmp).catch(() => undefined);
    throw err;
  }

  await syncDirectory(dirname(target));
}

/**
 * Like writeFileAtomic, but fails with EEXIST instead of replacing an
 * existing target. Uses link(2), which refuses to overwrite.
 */
export async function createFileExclusive(target: string, content: string): Promise<void> {
  await mkdir(dirname(target), { recursive: true });
  const tmp = tempPathFor(target);

  await writeSynced(tmp, content);
  try {
    await link(tmp, target);
  } finally {
    await unlink(tmp).catch(() => undefined);
  }

  await syncDirectory(dirname(target));
}
