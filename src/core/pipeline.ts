import type { AppConfig } from '../config/index.js';
import { ArticleGenerator } from './generation/articleGenerator.js';
import { PageCreator } from './generation/pageCreator.js';
import { IndexRebuilder } from './indexing/indexRebuilder.js';
import { createGitRunner, type GitRunner } from './publishing/gitRunner.js';
import { Publisher } from './publishing/publisher.js';
import {
  mathRandom,
  systemClock,
  type Clock,
  type RandomSource,
} from './random.js';
import { PageRenderer } from './rendering/pageRenderer.js';
import { StylesheetWriter } from './styles/stylesheetWriter.js';
import type { RunSummary } from './types.js';

export interface PipelineDeps {
  config: AppConfig;
  generator: ArticleGenerator;
  git: GitRunner;
  random: RandomSource;
  clock: Clock;
}

export function createDefaultDeps(config: AppConfig): PipelineDeps {
  return {
    config,
    generator: ArticleGenerator.fromConfig(config),
    git: createGitRunner(config.siteDir),
    random: mathRandom,
    clock: systemClock,
  };
}

/**
 * One publishing run: new page, maybe new styles, fresh index, then commit
 * and push. Any step failing stops the run where it is.
 */
export async function runDailyPublish(
  deps: PipelineDeps
): Promise<RunSummary> {
  const { config, generator, git, random, clock } = deps;
  const startTime = Date.now();
  console.error(`Starting daily publish run in ${config.siteDir}`);

  const renderer = new PageRenderer(config, clock);
  const page = await new PageCreator(
    generator,
    renderer,
    random,
    clock
  ).createNewPage();

  const accentColor = await new StylesheetWriter(
    config,
    random
  ).maybeUpdateStyles();

  const indexEntries = await new IndexRebuilder(config, clock).updateIndex();

  const commit = await new Publisher(
    config,
    git,
    random,
    clock
  ).commitAndPush();

  console.error(
    `Daily publish finished in ${(Date.now() - startTime) / 1000} seconds.`
  );
  return { page, accentColor, indexEntries, commit };
}
