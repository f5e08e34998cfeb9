import OpenAI from 'openai';
import type { AppConfig } from '../../config/index.js';

export interface ChatMessage {
  role: 'system';
  content: string;
}

export interface CompletionRequest {
  model: string;
  messages: ChatMessage[];
}

export interface CompletionResponse {
  choices: { message: { content: string | null } }[];
}

/**
 * The slice of a chat-completion API the generator needs.
 */
export interface CompletionBackend {
  createChatCompletion(request: CompletionRequest): Promise<CompletionResponse>;
}

export function createOpenAiBackend(apiKey: string): CompletionBackend {
  if (!apiKey) {
    throw new Error('OPENAI_API_KEY is not set');
  }
  const client = new OpenAI({ apiKey });
  return {
    createChatCompletion: async ({ model, messages }) =>
      client.chat.completions.create({ model, messages }),
  };
}

export function buildArticlePrompt(topic: string): string {
  return `Write a detailed tech news article about ${topic}. Include quotes and technical details.`;
}

export class ArticleGenerator {
  constructor(
    private readonly backend: CompletionBackend,
    private readonly model: string
  ) {}

  static fromConfig(config: AppConfig): ArticleGenerator {
    return new ArticleGenerator(
      createOpenAiBackend(config.openaiApiKey),
      config.openaiModel
    );
  }

  /**
   * Returns the first completion verbatim. Request failures propagate.
   */
  public async generateArticle(topic: string): Promise<string> {
    console.error(`Requesting article from ${this.model}: "${topic}"`);
    const response = await this.backend.createChatCompletion({
      model: this.model,
      messages: [{ role: 'system', content: buildArticlePrompt(topic) }],
    });

    const content = response.choices[0]?.message.content;
    if (content === undefined || content === null) {
      throw new Error(`Completion for "${topic}" returned no content`);
    }
    console.error(`Received ${content.length} characters of article text.`);
    return content;
  }
}
