import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { sequenceRandom } from '../../random.js';
import { PageRenderer } from '../../rendering/pageRenderer.js';
import {
  buildPageFilename,
  CATEGORIES,
  PAGE_TYPES,
  PageCreator,
} from '../pageCreator.js';
import {
  fakeGenerator,
  fixedClock,
  makeConfig,
  makeSiteDir,
  removeSiteDir,
} from '../../__tests__/testUtils.js';

describe('PageCreator', () => {
  let siteDir: string;

  beforeEach(async () => {
    siteDir = await makeSiteDir();
  });

  afterEach(async () => {
    await removeSiteDir(siteDir);
  });

  it('creates exactly one page named from type, topic and date', async () => {
    const { generator, requests } = fakeGenerator('<p>Generated</p>');
    const creator = new PageCreator(
      generator,
      new PageRenderer(makeConfig(siteDir), fixedClock),
      sequenceRandom([0, 0.45]),
      fixedClock
    );

    const page = await creator.createNewPage();

    expect(page.filename).toBe('tutorial-cloud-computing-20261005.html');
    expect(page.pageType).toBe('Tutorial');
    expect(page.topic).toBe('Cloud Computing');
    expect(requests[0]?.messages[0]?.content).toBe(
      'Write a detailed tech news article about tutorial about Cloud Computing. Include quotes and technical details.'
    );
    expect(await fs.readdir(siteDir)).toEqual([
      'tutorial-cloud-computing-20261005.html',
    ]);
    expect(await fs.readFile(page.filePath, 'utf-8')).toContain(
      '<h1>Cloud Computing Tutorial</h1>'
    );
  });

  it('overwrites a same-day page with the same type and topic', async () => {
    const config = makeConfig(siteDir);
    for (const body of ['<p>first</p>', '<p>second</p>']) {
      const { generator } = fakeGenerator(body);
      await new PageCreator(
        generator,
        new PageRenderer(config, fixedClock),
        sequenceRandom([0.2, 0]),
        fixedClock
      ).createNewPage();
    }

    expect(await fs.readdir(siteDir)).toEqual(['news-ai-20261005.html']);
    const html = await fs.readFile(
      path.join(siteDir, 'news-ai-20261005.html'),
      'utf-8'
    );
    expect(html).toContain('<p>second</p>');
    expect(html).not.toContain('<p>first</p>');
  });

  it('names every type and topic pair by the filename convention', () => {
    const pattern =
      /^(tutorial|news|analysis|review|comparison)-[a-z-]+-\d{8}\.html$/;
    for (const pageType of PAGE_TYPES) {
      for (const topic of CATEGORIES) {
        const filename = buildPageFilename(pageType, topic, fixedClock());
        expect(filename).toMatch(pattern);
        expect(filename).toBe(
          `${pageType}-${topic.toLowerCase().replace(/ /g, '-')}-20261005.html`
        );
      }
    }
  });
});
