import * as path from 'node:path';
import { describe, expect, it } from 'vitest';
import { loadConfig } from '../index.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({ SITE_DIR: '/tmp/site' });
    expect(config.siteDir).toBe(path.resolve('/tmp/site'));
    expect(config.openaiModel).toBe('gpt-3.5-turbo');
    expect(config.openaiApiKey).toBe('');
    expect(config.gitRemote).toBe('origin');
    expect(config.gitBranch).toBe('main');
    expect(config.styleUpdateProbability).toBe(0.2);
    expect(config.indexLimit).toBe(10);
    expect(config.sanitizeArticleBody).toBe(false);
    expect(config.indexFile).toBe('index.html');
    expect(config.siteName).toBe('TechDaily');
  });

  it('reads overrides from the given environment', () => {
    const config = loadConfig({
      SITE_DIR: '/tmp/site',
      OPENAI_API_KEY: 'test-secret',
      INDEX_LIMIT: '3',
      STYLE_UPDATE_PROBABILITY: '1',
      SANITIZE_ARTICLE_BODY: 'true',
    });
    expect(config.openaiApiKey).toBe('test-secret');
    expect(config.indexLimit).toBe(3);
    expect(config.styleUpdateProbability).toBe(1);
    expect(config.sanitizeArticleBody).toBe(true);
  });

  it('treats empty numeric variables as unset', () => {
    const config = loadConfig({
      SITE_DIR: '/tmp/site',
      STYLE_UPDATE_PROBABILITY: '',
      INDEX_LIMIT: '',
    });
    expect(config.styleUpdateProbability).toBe(0.2);
    expect(config.indexLimit).toBe(10);
  });

  it('names the invalid variable', () => {
    expect(() =>
      loadConfig({ SITE_DIR: '/tmp/site', STYLE_UPDATE_PROBABILITY: '2' })
    ).toThrow(/STYLE_UPDATE_PROBABILITY/);
  });
});
