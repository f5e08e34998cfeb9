import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { AppConfig } from '../../config/index.js';
import type { NewsArticle } from '../types.js';

const articleSchema = z.object({
  title: z.string(),
  description: z.string().nullish(),
  url: z.string(),
  publishedAt: z.string().nullish(),
  source: z.object({ name: z.string().nullish() }).nullish(),
});

const headlinesSchema = z.object({
  articles: z.array(articleSchema).default([]),
});

export function createNewsHttpClient(): AxiosInstance {
  return axios.create({
    timeout: 30000,
    headers: {
      'User-Agent': 'TechDailyPublisher/1.0',
      Accept: 'application/json',
    },
    responseType: 'json',
    validateStatus: (status) => status >= 200 && status < 300,
  });
}

export class NewsFetcher {
  constructor(
    private readonly config: AppConfig,
    private readonly http: AxiosInstance = createNewsHttpClient()
  ) {}

  /**
   * Fetches the current technology headlines. Not used by article
   * generation; run through the fetch-news script.
   */
  public async getTechNews(): Promise<NewsArticle[]> {
    if (!this.config.newsApiKey) {
      throw new Error('NEWS_API_KEY is not set');
    }

    console.error(
      `Fetching ${this.config.newsCategory} headlines from ${this.config.newsApiUrl}`
    );
    const response = await this.http.get<unknown>(this.config.newsApiUrl, {
      params: {
        category: this.config.newsCategory,
        apiKey: this.config.newsApiKey,
      },
    });

    const parsed = headlinesSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new Error(
        `Unexpected headlines payload from ${this.config.newsApiUrl}: ${parsed.error.message}`
      );
    }

    return parsed.data.articles
      .slice(0, this.config.newsLimit)
      .map((article) => ({
        title: article.title,
        description: article.description ?? null,
        url: article.url,
        source: article.source?.name ?? null,
        publishedAt: article.publishedAt ?? null,
      }));
  }
}
