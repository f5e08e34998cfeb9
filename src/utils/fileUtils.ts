import * as fsp from 'node:fs/promises';
import * as path from 'node:path';

export async function ensureDirectoryExists(dirPath: string): Promise<void> {
  await fsp.mkdir(dirPath, { recursive: true });
}

export async function readFile(filePath: string): Promise<string> {
  return fsp.readFile(filePath, 'utf-8');
}

/**
 * Writes the whole file, replacing whatever was there.
 */
export async function writeFile(
  filePath: string,
  content: string
): Promise<void> {
  await ensureDirectoryExists(path.dirname(filePath));
  await fsp.writeFile(filePath, content, 'utf-8');
}

export async function listFiles(
  directory: string,
  extension?: string
): Promise<string[]> {
  try {
    const files = (await fsp.readdir(directory)).sort();
    if (extension) {
      return files.filter((file) => file.endsWith(extension));
    }
    return files;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return []; // Directory doesn't exist, return empty list
    }
    throw error;
  }
}
