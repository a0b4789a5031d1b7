import fs from 'fs/promises';
import path from 'path';

/**
 * Validates that a relative path stays inside `baseDir`.
 */
export function validatePath(filePath: string, baseDir: string): boolean {
  if (path.isAbsolute(filePath)) {
    return false;
  }
  const resolved = path.resolve(baseDir, filePath);
  const base = path.resolve(baseDir);
  return resolved !== base && resolved.startsWith(base + path.sep);
}

/**
 * Creates a file with content, creating parent directories as needed
 */
export async function createFile(filePath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content, 'utf8');
}

/**
 * Reads a file, or returns null when it does not exist
 */
export async function readFileIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Creates a fresh, uniquely named directory under `root`.
 */
export async function makeWorkDir(root: string, prefix: string): Promise<string> {
  await fs.mkdir(root, { recursive: true });
  return fs.mkdtemp(path.join(root, `${prefix}-`));
}

/**
 * Removes a directory tree. Failures are logged, not thrown.
 */
export async function removeDirectory(dirPath: string): Promise<void> {
  try {
    await fs.rm(dirPath, { recursive: true, force: true, maxRetries: 2, retryDelay: 500 });
  } catch (error) {
    console.warn(`[FS] Could not fully delete ${dirPath}:`, error);
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}
