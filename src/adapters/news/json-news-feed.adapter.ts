import { readFile } from 'fs/promises';
import { inject, injectable } from 'tsyringe';
import { z } from 'zod';
import { NewsArticle } from '../../types/domain.types';
import { DataIntegrityError } from '../../errors/route-risk.errors';
import { INewsProvider } from './news-provider.interface';

const MIN_WORD_LENGTH = 3;

const NewsArticleSchema = z.object({
  title: z.string().trim().min(1),
  summary: z.string(),
  source: z.string(),
  url: z.string().url().optional(),
  publishedDate: z.string().datetime({ offset: true }).optional(),
  severity: z.enum(['low', 'medium', 'high']).default('medium')
});

const NewsFeedSchema = z.array(NewsArticleSchema);

/**
 * News search over a local JSON feed of articles.
 * Articles are ranked by how many query words they mention; ties keep feed order.
 */
@injectable()
export class JsonNewsFeedAdapter implements INewsProvider {
  private loading: Promise<NewsArticle[]> | null = null;

  constructor(@inject('NewsFeedPath') private readonly feedPath: string) {}

  async search(query: string, maxResults: number, signal?: AbortSignal): Promise<NewsArticle[]> {
    const articles = await this.load();
    signal?.throwIfAborted();

    const words = query.toLowerCase().split(/\s+/).filter(word => word.length >= MIN_WORD_LENGTH);
    if (words.length === 0 || maxResults <= 0) {
      return [];
    }

    return articles
      .map((article, index) => {
        const text = `${article.title} ${article.summary}`.toLowerCase();
        return { article, index, hits: words.filter(word => text.includes(word)).length };
      })
      .filter(match => match.hits > 0)
      .sort((a, b) => b.hits - a.hits || a.index - b.index)
      .slice(0, maxResults)
      .map(match => ({ ...match.article }));
  }

  async healthCheck(): Promise<string> {
    try {
      const articles = await this.load();
      return articles.length > 0 ? 'healthy' : 'unhealthy (no articles)';
    } catch (error) {
      return `unhealthy (error: ${error instanceof Error ? error.message : String(error)})`;
    }
  }

  // Concurrent searches share one read; a failed read is retried by the next search
  private load(): Promise<NewsArticle[]> {
    if (this.loading === null) {
      this.loading = this.readFeed().catch((error: unknown) => {
        this.loading = null;
        throw error;
      });
    }
    return this.loading;
  }

  private async readFeed(): Promise<NewsArticle[]> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(this.feedPath, 'utf-8'));
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new DataIntegrityError(`Failed to read news feed from ${this.feedPath}: ${errorMessage}`);
    }

    const validation = NewsFeedSchema.safeParse(raw);
    if (!validation.success) {
      const issues = validation.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new DataIntegrityError(`News feed validation failed: ${issues.join(', ')}`, issues);
    }

    console.log(`[News] Loaded ${validation.data.length} articles from ${this.feedPath}`);
    return validation.data;
  }
}
