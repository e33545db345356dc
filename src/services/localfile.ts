/**
 * Local File Service
 * Reads secret files and replaces them atomically
 */

import fs from 'fs-extra';
import path from 'path';
import crypto from 'crypto';
import { FileReadError, FileWriteError, errorMessage } from '../errors.js';

/**
 * Read a local secret file, or null when it does not exist
 */
export async function readLocalFile(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if (isNodeError(err) && err.code === 'ENOENT') {
      return null;
    }
    throw new FileReadError(filePath, errorMessage(err), { cause: err });
  }
}

/**
 * Replace a file's content: write a sibling temp file, then rename it over
 * the target. The target holds either its old or its new content.
 */
export async function writeLocalFileAtomic(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  const tempPath = path.join(
    dir,
    `.${path.basename(filePath)}.${crypto.randomBytes(6).toString('hex')}.tmp`
  );

  try {
    await fs.ensureDir(dir);
    const mode = await existingMode(filePath);
    await fs.writeFile(tempPath, content, { mode });
    await fs.rename(tempPath, filePath);
  } catch (err) {
    await fs.remove(tempPath);
    throw new FileWriteError(filePath, errorMessage(err), { cause: err });
  }
}

/**
 * Permission bits to give the replacement file: the current file's, or
 * owner read/write for a new one
 */
async function existingMode(filePath: string): Promise<number> {
  try {
    const stats = await fs.stat(filePath);
    return stats.mode & 0o777;
  } catch (err) {
    if (isNodeError(err) && err.code === 'ENOENT') {
      return 0o600;
    }
    throw err;
  }
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
