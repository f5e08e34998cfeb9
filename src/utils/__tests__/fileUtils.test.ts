import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { tmpdir } from 'node:os';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  ensureDirectoryExists,
  listFiles,
  readFile,
  writeFile,
} from '../fileUtils.js';

describe('fileUtils', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(tmpdir(), 'techdaily-files-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('creates nested directories and accepts ones that already exist', async () => {
    const nested = path.join(dir, 'a', 'b');
    await ensureDirectoryExists(nested);
    await expect(ensureDirectoryExists(nested)).resolves.toBeUndefined();
    expect((await fs.stat(nested)).isDirectory()).toBe(true);
  });

  it('writes into a missing directory and overwrites on rewrite', async () => {
    const target = path.join(dir, 'pages', 'news.html');
    await writeFile(target, 'first');
    await writeFile(target, 'second');
    expect(await readFile(target)).toBe('second');
  });

  it('lists files by extension in name order', async () => {
    await writeFile(path.join(dir, 'b.html'), '');
    await writeFile(path.join(dir, 'a.html'), '');
    await writeFile(path.join(dir, 'style.css'), '');
    expect(await listFiles(dir, '.html')).toEqual(['a.html', 'b.html']);
    expect(await listFiles(path.join(dir, 'missing'), '.html')).toEqual([]);
  });
});
