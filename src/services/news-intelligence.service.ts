import { inject, injectable } from 'tsyringe';
import { AppConfig } from '../config/app.config';
import { INewsProvider } from '../adapters/news/news-provider.interface';
import {
  IntelligenceConfidence,
  NewsArticle,
  NewsEvent,
  NewsSentiment,
  RouteIntelligence
} from '../types/domain.types';
import { TtlCache } from '../utils/ttl-cache';
import { INewsIntelligence } from './news-intelligence.interface';

const DAY_MS = 24 * 60 * 60 * 1000;
const MAX_EVENTS = 10;
const HIGH_IMPACT_RELEVANCE = 7;

const SOURCE_RELIABILITY: Record<string, number> = {
  'reuters.com': 10,
  'bloomberg.com': 10,
  'ft.com': 9,
  'wsj.com': 9,
  'bbc.com': 8,
  'cnn.com': 7,
  'associated-press': 9,
  'maritimeexecutive.com': 8,
  'tradewinds.no': 8,
  'lloydslist.com': 9,
  'joc.com': 8
};
const DEFAULT_RELIABILITY = 5;

const NEGATIVE_KEYWORDS = ['conflict', 'threat', 'sanctions', 'piracy', 'attack', 'tensions', 'dispute', 'crisis'];
const POSITIVE_KEYWORDS = ['improvement', 'agreement', 'cooperation', 'stable', 'secure', 'peaceful', 'progress'];

interface SearchPlan {
  queries: string[];
  maxResults: number;
  tag?: Partial<Pick<NewsEvent, 'securityRelated' | 'sanctionsRelated' | 'chokepointRelated'>>;
}

/**
 * Collects recent events relevant to a route from the news provider and
 * condenses them into ranked events, sentiment, confidence and a summary.
 */
@injectable()
export class NewsIntelligenceService implements INewsIntelligence {
  private readonly cache: TtlCache<RouteIntelligence>;

  constructor(
    @inject('INewsProvider') private readonly newsProvider: INewsProvider,
    @inject('AppConfig') config: AppConfig
  ) {
    this.cache = new TtlCache(config.cache.newsTtlMs);
  }

  async gather(
    departureCountry: string,
    destinationCountry: string,
    chokepoints: readonly string[],
    goodsType: string,
    signal?: AbortSignal
  ): Promise<RouteIntelligence> {
    const cacheKey = [departureCountry, destinationCountry, chokepoints.join(','), goodsType]
      .map(part => part.trim().toLowerCase())
      .join('|');
    const cached = this.cache.get(cacheKey);
    if (cached) {
      console.log('[News] Returning cached route intelligence');
      return cached;
    }

    console.log(`[News] Gathering intelligence for ${departureCountry} -> ${destinationCountry}`);

    const plans = [
      this.countryPlan(departureCountry),
      this.countryPlan(destinationCountry),
      ...chokepoints.map(chokepoint => this.chokepointPlan(chokepoint)),
      this.tradePlan(departureCountry, destinationCountry),
      this.maritimeSecurityPlan(),
      this.sanctionsPlan(departureCountry, destinationCountry),
      this.goodsPlan(goodsType)
    ];

    const settled = await Promise.allSettled(plans.map(plan => this.runPlan(plan, signal)));
    signal?.throwIfAborted();

    const collected: NewsEvent[] = [];
    for (const result of settled) {
      if (result.status === 'fulfilled') {
        collected.push(...result.value);
      } else {
        const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
        console.warn(`[News] Search failed: ${reason}`);
      }
    }

    if (settled.every(result => result.status === 'rejected')) {
      return this.unavailable(departureCountry, destinationCountry);
    }

    const ranked = this.deduplicate(collected)
      .map(event => ({
        ...event,
        finalRelevanceScore: this.finalRelevance(event, departureCountry, destinationCountry, chokepoints, goodsType)
      }))
      .sort((a, b) => b.finalRelevanceScore - a.finalRelevanceScore);

    const intelligence: RouteIntelligence = {
      events: ranked.slice(0, MAX_EVENTS),
      sentiment: this.sentiment(ranked),
      confidence: this.confidence(ranked),
      summary: this.summarize(ranked),
      lastUpdated: new Date().toISOString()
    };

    this.cache.set(cacheKey, intelligence);
    console.log(`[News] Gathered ${ranked.length} relevant events`);
    return intelligence;
  }

  healthCheck(): Promise<string> {
    return this.newsProvider.healthCheck();
  }

  /** Reliability 1-10 of a news source, by domain substring. */
  sourceReliability(source: string): number {
    const lower = source.toLowerCase();
    const match = Object.keys(SOURCE_RELIABILITY).find(domain => lower.includes(domain));
    return match ? SOURCE_RELIABILITY[match] : DEFAULT_RELIABILITY;
  }

  private countryPlan(country: string): SearchPlan {
    return {
      queries: [
        `${country} political news`,
        `${country} sanctions trade`,
        `${country} security threat`,
        `${country} port strike`,
        `${country} diplomatic relations`
      ],
      maxResults: 3
    };
  }

  private chokepointPlan(chokepoint: string): SearchPlan {
    return {
      queries: [
        `${chokepoint} shipping`,
        `${chokepoint} security`,
        `${chokepoint} blockage`,
        `${chokepoint} conflict`
      ],
      maxResults: 2,
      tag: { chokepointRelated: chokepoint }
    };
  }

  private tradePlan(first: string, second: string): SearchPlan {
    return {
      queries: [
        `${first} ${second} trade relations`,
        `${first} ${second} diplomatic`,
        `${first} ${second} sanctions`,
        `${first} ${second} dispute`
      ],
      maxResults: 2
    };
  }

  private maritimeSecurityPlan(): SearchPlan {
    return {
      queries: [
        'maritime security threats',
        'shipping piracy attacks',
        'naval incidents commercial',
        'port security breach',
        'maritime terrorism'
      ],
      maxResults: 2,
      tag: { securityRelated: true }
    };
  }

  private sanctionsPlan(first: string, second: string): SearchPlan {
    return {
      queries: [
        `new sanctions ${first}`,
        `new sanctions ${second}`,
        'trade restrictions shipping',
        'export controls update',
        'embargo shipping impact'
      ],
      maxResults: 2,
      tag: { sanctionsRelated: true }
    };
  }

  private goodsPlan(goodsType: string): SearchPlan {
    const goods = goodsType.trim().toLowerCase();
    let queries: string[];

    if (['electronics', 'technology', 'semiconductors'].includes(goods)) {
      queries = ['technology export controls', 'semiconductor trade restrictions', 'electronics trade war'];
    } else if (['energy', 'oil', 'gas'].includes(goods)) {
      queries = ['energy sanctions', 'oil trade restrictions', 'gas export controls'];
    } else if (['military', 'defense'].includes(goods)) {
      queries = ['defense export controls', 'military equipment restrictions', 'arms embargo'];
    } else {
      queries = [`${goodsType} trade restrictions`, `${goodsType} export controls`];
    }

    return { queries, maxResults: 2 };
  }

  private async runPlan(plan: SearchPlan, signal?: AbortSignal): Promise<NewsEvent[]> {
    const batches = await Promise.all(
      plan.queries.map(async query => {
        const articles = await this.newsProvider.search(query, plan.maxResults, signal);
        return articles.map(article => this.toEvent(article, query, plan.tag));
      })
    );
    return batches.flat();
  }

  private toEvent(article: NewsArticle, query: string, tag: SearchPlan['tag']): NewsEvent {
    const sourceReliability = this.sourceReliability(article.source);
    const relevanceScore = this.relevance(article, query, sourceReliability);
    return {
      ...article,
      searchQuery: query,
      sourceReliability,
      relevanceScore,
      finalRelevanceScore: relevanceScore,
      securityRelated: tag?.securityRelated ?? false,
      sanctionsRelated: tag?.sanctionsRelated ?? false,
      ...(tag?.chokepointRelated ? { chokepointRelated: tag.chokepointRelated } : {})
    };
  }

  private relevance(article: NewsArticle, query: string, reliability: number): number {
    const title = article.title.toLowerCase();
    const summary = article.summary.toLowerCase();
    let score = 5;

    for (const word of query.toLowerCase().split(/\s+/).filter(Boolean)) {
      if (title.includes(word)) score += 2;
      if (summary.includes(word)) score += 1;
    }

    score += this.severityBoost(article.severity, 2, 1);

    if (reliability >= 9) score += 2;
    else if (reliability >= 7) score += 1;

    return Math.min(score, 10);
  }

  private finalRelevance(
    event: NewsEvent,
    departureCountry: string,
    destinationCountry: string,
    chokepoints: readonly string[],
    goodsType: string
  ): number {
    const text = `${event.title}\n${event.summary}`.toLowerCase();
    const mentions = (term: string) => term.trim().length > 0 && text.includes(term.trim().toLowerCase());
    let score = event.relevanceScore;

    if (mentions(departureCountry)) score += 3;
    if (mentions(destinationCountry)) score += 3;
    if (chokepoints.some(mentions)) score += 4;
    if (mentions(goodsType)) score += 2;

    if (event.publishedDate) {
      const published = Date.parse(event.publishedDate);
      if (!Number.isNaN(published)) {
        const daysOld = Math.floor((Date.now() - published) / DAY_MS);
        if (daysOld <= 7) score += 2;
        else if (daysOld <= 30) score += 1;
      }
    }

    score += this.severityBoost(event.severity, 3, 1);

    return Math.min(score, 10);
  }

  private severityBoost(severity: NewsArticle['severity'], high: number, medium: number): number {
    if (severity === 'high') return high;
    if (severity === 'medium') return medium;
    return 0;
  }

  // Title prefix without punctuation
  private deduplicate(events: NewsEvent[]): NewsEvent[] {
    const seen = new Set<string>();
    return events.filter(event => {
      const key = event.title.toLowerCase().replace(/[^\w\s]/g, '').slice(0, 50);
      if (seen.has(key)) {
        return false;
      }
      seen.add(key);
      return true;
    });
  }

  private sentiment(events: readonly NewsEvent[]): NewsSentiment {
    if (events.length === 0) {
      return 'neutral';
    }

    const total = events.reduce((sum, event) => {
      const text = `${event.title}\n${event.summary}`.toLowerCase();
      const negative = NEGATIVE_KEYWORDS.filter(keyword => text.includes(keyword)).length;
      const positive = POSITIVE_KEYWORDS.filter(keyword => text.includes(keyword)).length;
      return sum + positive - negative;
    }, 0);
    const average = total / events.length;

    if (average < -0.5) return 'negative';
    if (average > 0.5) return 'positive';
    return 'neutral';
  }

  private confidence(events: readonly NewsEvent[]): IntelligenceConfidence {
    if (events.length === 0) {
      return 'low';
    }

    const averageReliability = events.reduce((sum, event) => sum + event.sourceReliability, 0) / events.length;
    if (events.length >= 5 && averageReliability >= 7) return 'high';
    if (events.length >= 3 && averageReliability >= 5) return 'medium';
    return 'low';
  }

  private summarize(events: readonly NewsEvent[]): string {
    if (events.length === 0) {
      return 'No significant geopolitical events identified affecting this route.';
    }

    const highImpact = events.filter(event => event.finalRelevanceScore >= HIGH_IMPACT_RELEVANCE);
    if (highImpact.length === 0) {
      return `Monitoring ${events.length} geopolitical developments. ` +
        'Current threat level appears manageable with standard security protocols.';
    }

    const parts = [`Intelligence identifies ${highImpact.length} high-impact events affecting route security and trade conditions.`];
    const security = highImpact.filter(event => event.securityRelated).length;
    const sanctions = highImpact.filter(event => event.sanctionsRelated).length;
    const chokepoint = highImpact.filter(event => event.chokepointRelated).length;

    if (security > 0) parts.push(`Security concerns: ${security} incidents.`);
    if (sanctions > 0) parts.push(`Trade restrictions: ${sanctions} updates.`);
    if (chokepoint > 0) parts.push(`Chokepoint alerts: ${chokepoint} issues.`);
    parts.push('Recommend enhanced monitoring and contingency planning.');

    return parts.join(' ');
  }

  private unavailable(departureCountry: string, destinationCountry: string): RouteIntelligence {
    console.error(`[News] Intelligence unavailable for ${departureCountry} -> ${destinationCountry}`);
    return {
      events: [],
      sentiment: 'neutral',
      confidence: 'low',
      summary: `Unable to gather current intelligence for ${departureCountry} -> ${destinationCountry} route. ` +
        'Manual intelligence review recommended.',
      lastUpdated: new Date().toISOString()
    };
  }
}
