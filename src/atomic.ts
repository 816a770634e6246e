import * as fs from 'fs';
import type { FileHandle } from 'fs/promises';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { errorMessage } from './errors';
import type { Logger } from './logger';

export function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

async function syncDirectory(dir: string, logger: Logger): Promise<void> {
  let handle: FileHandle | undefined;
  try {
    handle = await fs.promises.open(dir, 'r');
    await handle.sync();
  } catch (error) {
    // Some platforms refuse fsync on a directory handle
    logger.debug(`directory sync skipped for ${dir}: ${errorMessage(error)}`);
  } finally {
    await handle?.close();
  }
}

/**
 * Write to a sibling temp file, fsync it, rename it over `filePath`, then fsync
 * the directory. A reader sees either the old content or the new, never a mix.
 */
export async function writeFileAtomic(filePath: string, content: string, logger: Logger): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.promises.mkdir(dir, { recursive: true });
  const tmpPath = path.join(dir, `${path.basename(filePath)}.tmp.${process.pid}.${uuidv4()}`);

  let handle: FileHandle | undefined;
  try {
    handle = await fs.promises.open(tmpPath, 'w', 0o600);
    await handle.writeFile(content, 'utf-8');
    await handle.sync();
    await handle.close();
    handle = undefined;

    await fs.promises.rename(tmpPath, filePath);
    await syncDirectory(dir, logger);
  } finally {
    await handle?.close();
    await fs.promises.rm(tmpPath, { force: true });
  }
}

/** File content, or `undefined` when the file does not exist. */
export async function readFileIfExists(filePath: string): Promise<string | undefined> {
  try {
    return await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoCode(error, 'ENOENT')) {
      return undefined;
    }
    throw error;
  }
}
