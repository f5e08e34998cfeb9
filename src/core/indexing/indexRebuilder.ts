import * as path from 'node:path';
import * as cheerio from 'cheerio';
import type { AppConfig } from '../../config/index.js';
import { listFiles, readFile, writeFile } from '../../utils/fileUtils.js';
import type { Clock } from '../random.js';
import { renderIndexPage } from '../rendering/indexRenderer.js';
import type { IndexEntry } from '../types.js';

/**
 * The date token is whatever follows the last hyphen of the filename stem.
 */
export function dateTokenFromFilename(filename: string): string {
  const stem = path.basename(filename, path.extname(filename));
  const segments = stem.split('-');
  return segments[segments.length - 1] ?? stem;
}

export function parsePageEntry(filename: string, html: string): IndexEntry {
  const $ = cheerio.load(html);

  const heading = $('h1').first();
  if (!heading.length) {
    throw new Error(`Page ${filename} has no <h1> heading`);
  }

  const summary = $('meta[name="description"]').first().attr('content');
  if (summary === undefined) {
    throw new Error(`Page ${filename} has no description meta tag`);
  }

  return {
    title: heading.text(),
    file: filename,
    date: dateTokenFromFilename(filename),
    summary,
  };
}

// Plain string order on the date token, newest first
export function sortByDateDescending(entries: IndexEntry[]): IndexEntry[] {
  return [...entries].sort((a, b) =>
    a.date < b.date ? 1 : a.date > b.date ? -1 : 0
  );
}

export class IndexRebuilder {
  private readonly indexPath: string;

  constructor(
    private readonly config: AppConfig,
    private readonly clock: Clock
  ) {
    this.indexPath = path.join(config.siteDir, config.indexFile);
  }

  /**
   * Collects an entry from every article page. A single malformed page
   * aborts the rebuild.
   */
  public async collectEntries(): Promise<IndexEntry[]> {
    const htmlFiles = await listFiles(this.config.siteDir, '.html');
    const entries: IndexEntry[] = [];

    for (const file of htmlFiles) {
      if (file === this.config.indexFile) {
        continue;
      }
      const html = await readFile(path.join(this.config.siteDir, file));
      entries.push(parsePageEntry(file, html));
    }
    return entries;
  }

  public async updateIndex(): Promise<IndexEntry[]> {
    console.error(`Rebuilding index from pages in: ${this.config.siteDir}`);
    const entries = await this.collectEntries();
    const latest = sortByDateDescending(entries).slice(
      0,
      this.config.indexLimit
    );

    await writeFile(
      this.indexPath,
      renderIndexPage(latest, {
        siteName: this.config.siteName,
        stylesheetFile: this.config.stylesheetFile,
        year: this.clock().getFullYear(),
      })
    );
    console.error(
      `Index written with ${latest.length} of ${entries.length} articles.`
    );
    return latest;
  }
}
