#!/usr/bin/env node

import { loadConfig } from './config/index.js';
import { createDefaultDeps, runDailyPublish } from './core/pipeline.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const summary = await runDailyPublish(createDefaultDeps(config));
  console.error(
    `Published ${summary.page.filename} (${summary.commit.message})`
  );
}

main().catch((error) => {
  console.error('Fatal error during daily publish:', error);
  process.exit(1);
});
