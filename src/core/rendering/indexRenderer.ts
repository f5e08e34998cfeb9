import { escapeHtml, formatDateToken } from '../../utils/helpers.js';
import type { IndexEntry } from '../types.js';
import { renderSiteFooter, renderSiteHeader } from './pageRenderer.js';

export interface IndexPageOptions {
  siteName: string;
  stylesheetFile: string;
  year: number;
}

function renderEntry(entry: IndexEntry): string {
  return `<li class="article-entry">
          <a href="${escapeHtml(entry.file)}">${escapeHtml(entry.title)}</a>
          <time>${escapeHtml(formatDateToken(entry.date))}</time>
          <p>${escapeHtml(entry.summary)}</p>
        </li>`;
}

export function renderIndexPage(
  entries: IndexEntry[],
  { siteName, stylesheetFile, year }: IndexPageOptions
): string {
  const listing =
    entries.length > 0
      ? `<ul class="article-list">
        ${entries.map(renderEntry).join('\n        ')}
      </ul>`
      : '<p>No articles yet.</p>';

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <meta name="description" content="Latest tech articles from ${siteName}">
  <title>${siteName} - Latest Tech Articles</title>
  <link rel="stylesheet" href="${stylesheetFile}">
</head>
<body>
  ${renderSiteHeader()}
  <main>
    <section>
      <h1>Latest Tech Articles</h1>
      ${listing}
    </section>
  </main>
  ${renderSiteFooter(siteName, year)}
</body>
</html>
`;
}
