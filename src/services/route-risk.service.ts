import { inject, injectable } from 'tsyringe';
import { ZodError } from 'zod';
import { AppConfig } from '../config/app.config';
import {
  AssessmentContext,
  AssessmentKind,
  RouteAnalysis,
  RouteAssessment,
  RouteEstimate,
  RouteQuery,
  RouteQuerySchema,
  ScoredAssessment
} from '../types/assessment.types';
import { MitigationPlan, MitigationReport, MitigationRequest, MitigationRequestSchema } from '../types/mitigation.types';
import {
  ChokepointInfo,
  CountryProfile,
  LocationRecord,
  PortWeather,
  SecurityZoneInfo
} from '../types/domain.types';
import { AdvisorResult, AssessorResult, isWeatherSuccess } from '../types/result.types';
import {
  InvalidDateError,
  RequestCancelledError,
  RequestValidationError
} from '../errors/route-risk.errors';
import { IWeatherProvider } from '../adapters/weather/weather-provider.interface';
import { TtlCache } from '../utils/ttl-cache';
import { toMarineConditions } from '../utils/marine-conditions.util';
import { GeospatialEstimatorService } from './geospatial-estimator.service';
import { PortMatch, PortSecurityAssessment, ReferenceDataStore } from './reference-data-store.service';
import { RouteAnalysisService } from './route-analysis.service';
import { INewsIntelligence } from './news-intelligence.interface';
import { IRiskAssessor } from './risk-assessor.interface';
import { GeopoliticalFallbackScorer, WeatherFallbackScorer } from './fallback-risk-scorer.service';
import { IMitigationAdvisor } from './mitigation-advisor.interface';
import { MitigationFallbackPlanner } from './fallback-mitigation-planner.service';

const DAY_MS = 24 * 60 * 60 * 1000;
const MAX_DAYS_AHEAD = 365;
const MAX_SEARCH_LIMIT = 50;

export type Clock = () => Date;

export interface AssessOptions {
  /** Aborted when the caller goes away; in-flight lookups are abandoned and nothing is cached. */
  signal?: AbortSignal;
}

export interface CountryRiskReport {
  profile: CountryProfile;
  ports: Array<{ key: string; name: string; code: string; security: PortSecurityAssessment }>;
}

export interface RouteHazardReport {
  departure: LocationRecord;
  destination: LocationRecord;
  estimate: RouteEstimate;
  analysis: RouteAnalysis;
  chokepoints: ChokepointInfo[];
  securityZones: SecurityZoneInfo[];
}

export interface HealthReport {
  status: 'healthy' | 'degraded';
  services: {
    assessor: string;
    news: string;
  };
  referencePorts: number;
  timestamp: string;
}

interface Resolved {
  query: RouteQuery;
  departureDate: Date;
  departure: LocationRecord;
  destination: LocationRecord;
}

/**
 * Route risk assessment: validates the request, resolves both ports, gathers
 * route context and asks the assessor, falling back to the rule-based scorers
 * whenever the assessor cannot give a valid answer.
 */
@injectable()
export class RouteRiskService {
  private readonly memo: TtlCache<RouteAssessment>;

  constructor(
    @inject('AppConfig') private readonly config: AppConfig,
    @inject(ReferenceDataStore) private readonly store: ReferenceDataStore,
    @inject(GeospatialEstimatorService) private readonly estimator: GeospatialEstimatorService,
    @inject(RouteAnalysisService) private readonly routeAnalysis: RouteAnalysisService,
    @inject('INewsIntelligence') private readonly news: INewsIntelligence,
    @inject('IWeatherProvider') private readonly weatherProvider: IWeatherProvider,
    @inject('IRiskAssessor') private readonly assessor: IRiskAssessor,
    @inject(GeopoliticalFallbackScorer) private readonly geopoliticalScorer: GeopoliticalFallbackScorer,
    @inject(WeatherFallbackScorer) private readonly weatherScorer: WeatherFallbackScorer,
    @inject('IMitigationAdvisor') private readonly advisor: IMitigationAdvisor,
    @inject(MitigationFallbackPlanner) private readonly mitigationPlanner: MitigationFallbackPlanner,
    @inject('Clock') private readonly clock: Clock
  ) {
    this.memo = new TtlCache(config.cache.assessmentTtlMs, () => this.clock().getTime());
  }

  assessGeopoliticalRisk(input: unknown, options: AssessOptions = {}): Promise<RouteAssessment> {
    return this.assess('geopolitical', input, options);
  }

  assessWeatherRisk(input: unknown, options: AssessOptions = {}): Promise<RouteAssessment> {
    return this.assess('weather', input, options);
  }

  /**
   * Turns earlier weather and geopolitical assessments of a route into mitigation
   * strategies. Plans are not cached: the inputs carry free-text assessments.
   */
  async planMitigation(input: unknown, options: AssessOptions = {}): Promise<MitigationReport> {
    const { signal } = options;
    const validation = MitigationRequestSchema.safeParse(input);
    if (!validation.success) {
      throw this.validationError(validation.error);
    }

    const request = validation.data;
    this.checkDateWindow(request.departureDate);
    const departure = this.store.lookup(request.departurePort);
    const destination = this.store.lookup(request.destinationPort);

    this.throwIfCancelled(signal);
    console.log(`[Route Risk] Planning mitigation: ${departure.key} -> ${destination.key}`);

    const outcome = await this.callAdvisor(request, signal);
    this.throwIfCancelled(signal);

    let plan: MitigationPlan;
    let fallbackReason: string | undefined;
    if (outcome.ok) {
      plan = outcome.plan;
    } else {
      fallbackReason = outcome.reason;
      console.warn(`[Route Risk] Advisor unavailable (${outcome.reason}), using fallback plan`);
      plan = this.mitigationPlanner.plan(request);
    }

    const report: MitigationReport = {
      ...plan,
      departurePort: departure.key,
      destinationPort: destination.key,
      departureDate: request.departureDate,
      provenance: fallbackReason === undefined ? 'assessor' : 'fallback',
      generatedAt: this.clock().toISOString()
    };
    if (fallbackReason !== undefined) {
      report.fallbackReason = fallbackReason;
    }

    console.log(`[Route Risk] Mitigation plan with ${report.strategies.length} strategies (${report.provenance})`);
    return report;
  }

  searchPorts(query: string, limit = 10): PortMatch[] {
    const bounded = Math.max(1, Math.min(Math.floor(limit), MAX_SEARCH_LIMIT));
    return this.store.search(query, bounded);
  }

  countryRiskProfile(country: string, goodsType?: string): CountryRiskReport {
    const profile = this.store.countryProfile(country, goodsType);
    const ports = this.store.countryPorts(profile.country).map(port => ({
      key: port.key,
      name: port.name,
      code: port.code,
      security: this.store.portSecurityRisk(port)
    }));
    return { profile, ports };
  }

  routeHazards(departurePort: string, destinationPort: string, goodsType = 'general cargo'): RouteHazardReport {
    const departure = this.store.lookup(departurePort);
    const destination = this.store.lookup(destinationPort);
    const analysis = this.routeAnalysis.analyze(departure, destination, goodsType, this.clock());

    return {
      departure,
      destination,
      estimate: this.estimator.estimateRoute(departure, destination, goodsType),
      analysis,
      chokepoints: this.store.chokepointDetails(analysis.chokepoints),
      securityZones: this.store.securityZoneDetails(analysis.securityZones)
    };
  }

  async healthCheck(): Promise<HealthReport> {
    const [assessor, news] = await Promise.all([this.assessor.healthCheck(), this.news.healthCheck()]);
    return {
      status: assessor === 'healthy' && news === 'healthy' ? 'healthy' : 'degraded',
      services: { assessor, news },
      referencePorts: this.store.portCount,
      timestamp: this.clock().toISOString()
    };
  }

  private async assess(kind: AssessmentKind, input: unknown, options: AssessOptions): Promise<RouteAssessment> {
    const { signal } = options;
    const resolved = this.resolve(input);
    const { query, departure, destination } = resolved;

    const memoKey = [kind, departure.key, destination.key, query.departureDate, query.carrierName, query.goodsType]
      .map(part => part.trim().toLowerCase())
      .join('|');
    const cached = this.memo.get(memoKey);
    if (cached) {
      console.log(`[Route Risk] Returning cached ${kind} assessment for ${departure.key} -> ${destination.key}`);
      return cached;
    }

    this.throwIfCancelled(signal);
    console.log(`[Route Risk] Assessing ${kind} risk: ${departure.key} -> ${destination.key}`);

    const estimate = this.estimator.estimateRoute(departure, destination, query.goodsType);
    const context = kind === 'geopolitical'
      ? await this.geopoliticalContext(resolved, estimate, signal)
      : await this.weatherContext(resolved, estimate, signal);

    const outcome = await this.callAssessor(context, signal);
    this.throwIfCancelled(signal);

    let scored: ScoredAssessment;
    let fallbackReason: string | undefined;
    if (outcome.ok) {
      scored = { score: outcome.score, description: outcome.description, summary: outcome.summary };
    } else {
      fallbackReason = outcome.reason;
      console.warn(`[Route Risk] Assessor unavailable (${outcome.reason}), using fallback scorer`);
      const fallback = this.fallbackScore(context);
      scored = { ...fallback, description: `[Fallback: ${outcome.reason}] ${fallback.description}` };
    }

    const assessment = this.buildAssessment(context, scored, fallbackReason);
    if (assessment.provenance === 'assessor') {
      this.memo.set(memoKey, assessment);
    }

    console.log(`[Route Risk] ${kind} score ${assessment.riskScore}/10 (${assessment.provenance})`);
    return assessment;
  }

  private resolve(input: unknown): Resolved {
    const validation = RouteQuerySchema.safeParse(input);
    if (!validation.success) {
      throw this.validationError(validation.error);
    }

    const query = validation.data;
    const departureDate = this.checkDateWindow(query.departureDate);

    return {
      query,
      departureDate,
      departure: this.store.lookup(query.departurePort),
      destination: this.store.lookup(query.destinationPort)
    };
  }

  private validationError(error: ZodError): RequestValidationError {
    const issues = error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    return new RequestValidationError(`Invalid request: ${issues.join(', ')}`, issues);
  }

  // Calendar days in UTC: today through today + 365
  private checkDateWindow(isoDate: string): Date {
    const date = new Date(`${isoDate}T00:00:00Z`);
    const now = this.clock();
    const today = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());

    if (date.getTime() < today) {
      throw new InvalidDateError(`Departure date ${isoDate} is in the past`, isoDate);
    }
    if (date.getTime() > today + MAX_DAYS_AHEAD * DAY_MS) {
      throw new InvalidDateError(`Departure date ${isoDate} is more than ${MAX_DAYS_AHEAD} days ahead`, isoDate);
    }
    return date;
  }

  private async geopoliticalContext(
    resolved: Resolved,
    estimate: RouteEstimate,
    signal?: AbortSignal
  ): Promise<AssessmentContext> {
    const { query, departure, destination, departureDate } = resolved;

    const departureProfile = this.store.countryProfile(departure.country, query.goodsType);
    const destinationProfile = this.store.countryProfile(destination.country, query.goodsType);
    const routeAnalysis = this.routeAnalysis.analyze(departure, destination, query.goodsType, departureDate);

    const intelligence = await this.whileActive(signal, () =>
      this.news.gather(departure.country, destination.country, routeAnalysis.chokepoints, query.goodsType, signal)
    );

    return {
      kind: 'geopolitical',
      query,
      departure,
      destination,
      estimate,
      departureProfile,
      destinationProfile,
      routeAnalysis,
      intelligence
    };
  }

  private async weatherContext(
    resolved: Resolved,
    estimate: RouteEstimate,
    signal?: AbortSignal
  ): Promise<AssessmentContext> {
    const { query, departure, destination, departureDate } = resolved;

    // Both ends are forecast for the departure date
    const [departureWeather, destinationWeather] = await this.whileActive(signal, () => Promise.all([
      this.fetchWeather(departure, departureDate, signal),
      this.fetchWeather(destination, departureDate, signal)
    ]));

    return { kind: 'weather', query, departure, destination, estimate, departureWeather, destinationWeather };
  }

  private async fetchWeather(port: LocationRecord, date: Date, signal?: AbortSignal): Promise<PortWeather | null> {
    const { latitude, longitude } = port.coordinates;
    try {
      const result = await this.weatherProvider.getWeather(latitude, longitude, date, signal);
      if (isWeatherSuccess(result)) {
        return result.data;
      }
      console.warn(`[Weather] No forecast for ${port.key}: ${result.error ?? result.status}`);
      return null;
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      console.warn(`[Weather] Forecast failed for ${port.key}: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
  }

  // Covers every retry the model-backed services may make
  private withDeadline(signal?: AbortSignal): AbortSignal {
    const deadline = AbortSignal.timeout(this.config.llm.timeoutMs * (this.config.retry.maxRetries + 1));
    return signal ? AbortSignal.any([signal, deadline]) : deadline;
  }

  private async callAssessor(context: AssessmentContext, signal?: AbortSignal): Promise<AssessorResult> {
    try {
      return await this.assessor.assess(context, this.withDeadline(signal));
    } catch (error) {
      return {
        ok: false,
        reason: 'api_error',
        detail: error instanceof Error ? error.message : String(error)
      };
    }
  }

  private async callAdvisor(request: MitigationRequest, signal?: AbortSignal): Promise<AdvisorResult> {
    try {
      return await this.advisor.advise(request, this.withDeadline(signal));
    } catch (error) {
      return {
        ok: false,
        reason: 'api_error',
        detail: error instanceof Error ? error.message : String(error)
      };
    }
  }

  private fallbackScore(context: AssessmentContext): ScoredAssessment {
    if (context.kind === 'weather') {
      return this.weatherScorer.score({
        departureWeather: context.departureWeather,
        destinationWeather: context.destinationWeather
      });
    }

    return this.geopoliticalScorer.score({
      departure: context.departureProfile,
      destination: context.destinationProfile,
      chokepoints: context.routeAnalysis.chokepoints,
      securityZones: context.routeAnalysis.securityZones,
      eventRelevance: context.intelligence.events.map(event => event.finalRelevanceScore)
    });
  }

  private buildAssessment(
    context: AssessmentContext,
    scored: ScoredAssessment,
    fallbackReason?: string
  ): RouteAssessment {
    const { departure, destination, estimate, query } = context;
    const chokepoints = context.kind === 'geopolitical'
      ? context.routeAnalysis.chokepoints
      : this.store.chokepointsFor(departure, destination);
    const securityZones = context.kind === 'geopolitical'
      ? context.routeAnalysis.securityZones
      : this.store.securityZonesFor(departure, destination);

    const assessment: RouteAssessment = {
      kind: context.kind,
      riskScore: Math.min(10, Math.max(1, Math.round(scored.score))),
      riskDescription: scored.description,
      summary: scored.summary,
      estimatedTransitDays: Math.max(1, estimate.transitDays),
      departure: {
        port: departure,
        countryProfile: context.kind === 'geopolitical'
          ? context.departureProfile
          : this.store.countryProfile(departure.country, query.goodsType)
      },
      destination: {
        port: destination,
        countryProfile: context.kind === 'geopolitical'
          ? context.destinationProfile
          : this.store.countryProfile(destination.country, query.goodsType)
      },
      routeEstimate: estimate,
      routeHazards: [...chokepoints, ...securityZones],
      provenance: fallbackReason === undefined ? 'assessor' : 'fallback',
      assessedAt: this.clock().toISOString()
    };

    if (context.kind === 'geopolitical') {
      assessment.routeAnalysis = context.routeAnalysis;
      assessment.intelligence = context.intelligence;
    } else {
      assessment.departure.weather = context.departureWeather ? toMarineConditions(context.departureWeather) : null;
      assessment.destination.weather = context.destinationWeather ? toMarineConditions(context.destinationWeather) : null;
    }
    if (fallbackReason !== undefined) {
      assessment.fallbackReason = fallbackReason;
    }

    return assessment;
  }

  private async whileActive<T>(signal: AbortSignal | undefined, work: () => Promise<T>): Promise<T> {
    try {
      const value = await work();
      this.throwIfCancelled(signal);
      return value;
    } catch (error) {
      this.throwIfCancelled(signal);
      throw error;
    }
  }

  private throwIfCancelled(signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new RequestCancelledError();
    }
  }
}
