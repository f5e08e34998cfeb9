import { fileURLToPath } from 'node:url';
import { loadConfig } from '../config/index.js';
import { NewsFetcher } from '../core/news/newsFetcher.js';

async function runNewsFetch(): Promise<void> {
  const config = loadConfig();
  const fetcher = new NewsFetcher(config);
  const articles = await fetcher.getTechNews();
  console.error(`Fetched ${articles.length} headlines.`);
  console.log(JSON.stringify(articles, null, 2));
}

const scriptPath = fileURLToPath(import.meta.url);
const isDirectRun = process.argv[1] === scriptPath;

if (isDirectRun) {
  runNewsFetch().catch((error) => {
    console.error('Unhandled error while fetching headlines:', error);
    process.exit(1);
  });
}
