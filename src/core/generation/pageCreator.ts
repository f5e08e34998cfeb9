import { formatDateStamp, slugify, titleCase } from '../../utils/helpers.js';
import { pickOne, type Clock, type RandomSource } from '../random.js';
import type { PageRenderer } from '../rendering/pageRenderer.js';
import type { CreatedPage } from '../types.js';
import type { ArticleGenerator } from './articleGenerator.js';

export const CATEGORIES = [
  'AI',
  'Cybersecurity',
  'Cloud Computing',
  'Mobile Tech',
  'Gaming',
] as const;

export const PAGE_TYPES = [
  'tutorial',
  'news',
  'analysis',
  'review',
  'comparison',
] as const;

export type Category = (typeof CATEGORIES)[number];
export type PageType = (typeof PAGE_TYPES)[number];

export function buildPageFilename(
  pageType: string,
  topic: string,
  date: Date
): string {
  return `${pageType}-${slugify(topic)}-${formatDateStamp(date)}.html`;
}

export class PageCreator {
  constructor(
    private readonly generator: ArticleGenerator,
    private readonly renderer: PageRenderer,
    private readonly random: RandomSource,
    private readonly clock: Clock
  ) {}

  /**
   * Generates one article page. An existing page with the same type, topic
   * and date is overwritten.
   */
  public async createNewPage(): Promise<CreatedPage> {
    const pageType: PageType = pickOne(this.random, PAGE_TYPES);
    const topic: Category = pickOne(this.random, CATEGORIES);
    console.error(`Creating ${pageType} page about ${topic}`);

    const content = await this.generator.generateArticle(
      `${pageType} about ${topic}`
    );

    const filename = buildPageFilename(pageType, topic, this.clock());
    const displayType = titleCase(pageType);
    const filePath = await this.renderer.writePage({
      filename,
      content,
      pageType: displayType,
      topic,
    });

    return { filename, filePath, pageType: displayType, topic };
  }
}
