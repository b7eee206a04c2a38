import { NewsArticle } from '../../types/domain.types';

export interface INewsProvider {
  search(query: string, maxResults: number, signal?: AbortSignal): Promise<NewsArticle[]>;
  /** "healthy", or "unhealthy (...)" with the reason. */
  healthCheck(): Promise<string>;
}
