import * as path from 'node:path';
import type { AppConfig } from '../../config/index.js';
import { writeFile } from '../../utils/fileUtils.js';
import { pickOne, type RandomSource } from '../random.js';

export const ACCENT_COLORS = [
  '#1a73e8',
  '#ea4335',
  '#34a853',
  '#fbbc05',
  '#0a66c2',
  '#00a0dc',
  '#313335',
  '#1da1f2',
  '#14171a',
  '#657786',
] as const;

export function renderStylesheet(accentColor: string): string {
  return `:root { --accent-color: ${accentColor}; }
body {
  font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, Oxygen-Sans, Ubuntu, Cantarell, sans-serif;
  line-height: 1.6;
  margin: 0;
  padding: 0;
  color: #333;
}
header {
  background: var(--accent-color);
  color: white;
  padding: 1rem;
}
nav a {
  color: white;
  text-decoration: none;
  margin-right: 1rem;
}
main {
  max-width: 800px;
  margin: 2rem auto;
  padding: 0 1rem;
}
article {
  background: white;
  padding: 2rem;
  border-radius: 8px;
  box-shadow: 0 2px 4px rgba(0,0,0,0.1);
}
.metadata {
  color: #666;
  margin-bottom: 1rem;
}
.metadata span {
  margin-right: 1rem;
}
footer {
  text-align: center;
  padding: 2rem;
  background: #f5f5f5;
}
`;
}

export class StylesheetWriter {
  private readonly stylesheetPath: string;

  constructor(
    private readonly config: AppConfig,
    private readonly random: RandomSource
  ) {
    this.stylesheetPath = path.join(config.siteDir, config.stylesheetFile);
  }

  /**
   * Rewrites the stylesheet with a new accent color on a fraction of runs.
   * Returns the chosen color, or null when the draw skipped the update.
   */
  public async maybeUpdateStyles(): Promise<string | null> {
    if (this.random.next() >= this.config.styleUpdateProbability) {
      console.error('Stylesheet left unchanged this run.');
      return null;
    }

    const accentColor = pickOne(this.random, ACCENT_COLORS);
    await writeFile(this.stylesheetPath, renderStylesheet(accentColor));
    console.error(`Stylesheet rewritten with accent color ${accentColor}`);
    return accentColor;
  }
}
