import path from 'node:path';
import { fileURLToPath } from 'node:url';
import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

// Helper to get __dirname in ES modules
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Resolve project root assuming config is in src/config
const projectRoot = path.resolve(__dirname, '..', '..');

export interface AppConfig {
  siteName: string;
  siteDir: string;
  indexFile: string;
  stylesheetFile: string;
  openaiApiKey: string;
  openaiModel: string;
  newsApiKey: string;
  newsApiUrl: string;
  newsCategory: string;
  newsLimit: number;
  gitRemote: string;
  gitBranch: string;
  styleUpdateProbability: number;
  indexLimit: number;
  sanitizeArticleBody: boolean;
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

// A variable left empty in .env counts as unset
function optionalNumber<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === '' ? undefined : value), schema);
}

const envSchema = z.object({
  OPENAI_API_KEY: z.string().default(''),
  OPENAI_MODEL: z.string().min(1).default('gpt-3.5-turbo'),
  NEWS_API_KEY: z.string().default(''),
  NEWS_API_URL: z
    .string()
    .url()
    .default('https://newsapi.org/v2/top-headlines'),
  SITE_DIR: z.string().min(1).default(path.join(projectRoot, 'site')),
  SITE_NAME: z.string().min(1).default('TechDaily'),
  GIT_REMOTE: z.string().min(1).default('origin'),
  GIT_BRANCH: z.string().min(1).default('main'),
  STYLE_UPDATE_PROBABILITY: optionalNumber(
    z.coerce.number().min(0).max(1).default(0.2)
  ),
  INDEX_LIMIT: optionalNumber(z.coerce.number().int().min(1).default(10)),
  SANITIZE_ARTICLE_BODY: booleanFlag,
});

/**
 * Builds the process-wide configuration once. Components receive the
 * result explicitly instead of reading the environment themselves.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  const siteDir = path.resolve(values.SITE_DIR);
  return {
    siteName: values.SITE_NAME,
    siteDir,
    indexFile: 'index.html',
    stylesheetFile: 'style.css',
    openaiApiKey: values.OPENAI_API_KEY,
    openaiModel: values.OPENAI_MODEL,
    newsApiKey: values.NEWS_API_KEY,
    newsApiUrl: values.NEWS_API_URL,
    newsCategory: 'technology',
    newsLimit: 5,
    gitRemote: values.GIT_REMOTE,
    gitBranch: values.GIT_BRANCH,
    styleUpdateProbability: values.STYLE_UPDATE_PROBABILITY,
    indexLimit: values.INDEX_LIMIT,
    sanitizeArticleBody: values.SANITIZE_ARTICLE_BODY,
  };
}
