import * as path from 'node:path';
import * as cheerio from 'cheerio';
import type { AppConfig } from '../../config/index.js';
import { writeFile } from '../../utils/fileUtils.js';
import { formatLongDate } from '../../utils/helpers.js';
import type { Clock } from '../random.js';
import type { PageInput } from '../types.js';

const URL_ATTRIBUTES = new Set(['href', 'src', 'action', 'formaction']);

// Browsers drop control characters and whitespace when reading a URL scheme
function isScriptUrl(value: string): boolean {
  return /^javascript:/i.test(value.replace(/[\u0000-\u0020]/g, ''));
}

export function renderSiteHeader(): string {
  return `<header>
    <nav>
      <a href="index.html">Home</a>
      <a href="#news">News</a>
      <a href="#tutorials">Tutorials</a>
      <a href="#analysis">Analysis</a>
    </nav>
  </header>`;
}

export function renderSiteFooter(siteName: string, year: number): string {
  return `<footer>
    <p>© ${year} ${siteName} - Updated Daily</p>
  </footer>`;
}

export function pageDescription(pageType: string, topic: string): string {
  return `Latest ${pageType} about ${topic} in tech`;
}

/**
 * Strips executable markup from generated article bodies. Only applied when
 * `sanitizeArticleBody` is enabled; otherwise bodies are embedded as returned.
 */
export function sanitizeArticleBody(html: string): string {
  const $ = cheerio.load(html, null, false);
  $('script, iframe, object, embed, style').remove();
  $('*').each((_, element) => {
    if (!('attribs' in element)) return;
    for (const [name, value] of Object.entries(element.attribs)) {
      const lowered = name.toLowerCase();
      if (
        lowered.startsWith('on') ||
        (URL_ATTRIBUTES.has(lowered) && isScriptUrl(value))
      ) {
        $(element).removeAttr(name);
      }
    }
  });
  return $.html();
}

export class PageRenderer {
  constructor(
    private readonly config: AppConfig,
    private readonly clock: Clock
  ) {}

  public render({ content, pageType, topic }: PageInput): string {
    const now = this.clock();
    const body = this.config.sanitizeArticleBody
      ? sanitizeArticleBody(content)
      : content;

    return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <meta name="description" content="${pageDescription(pageType, topic)}">
  <title>${topic} ${pageType} - ${this.config.siteName}</title>
  <link rel="stylesheet" href="${this.config.stylesheetFile}">
</head>
<body>
  ${renderSiteHeader()}
  <main>
    <article>
      <h1>${topic} ${pageType}</h1>
      <div class="metadata">
        <span>Published: ${formatLongDate(now)}</span>
        <span>Category: ${topic}</span>
      </div>
      <div class="content">
${body}
      </div>
    </article>
  </main>
  ${renderSiteFooter(this.config.siteName, now.getFullYear())}
</body>
</html>
`;
  }

  /**
   * Renders the page and writes it into the site directory, replacing any
   * file with the same name.
   */
  public async writePage(input: PageInput): Promise<string> {
    const filePath = path.join(this.config.siteDir, input.filename);
    await writeFile(filePath, this.render(input));
    console.error(`Wrote page: ${input.filename}`);
    return filePath;
  }
}
