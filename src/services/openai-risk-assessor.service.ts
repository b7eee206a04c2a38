import { inject, injectable } from 'tsyringe';
import { AppConfig } from '../config/app.config';
import {
  AssessmentContext,
  GeopoliticalAssessmentContext,
  GeopoliticalAssessmentResponseSchema,
  WeatherAssessmentContext,
  WeatherAssessmentResponseSchema
} from '../types/assessment.types';
import { CountryProfile, PortWeather } from '../types/domain.types';
import { AssessorResult } from '../types/result.types';
import { AssessorUnavailableError } from '../errors/route-risk.errors';
import { retryWithBackoff, RetryExhaustedError } from '../utils/retry.util';
import {
  chatFailureReason,
  ChatCompletionsClient,
  extractJsonObject,
  isRetryableChatError
} from '../utils/chat-completion.util';
import { IRiskAssessor } from './risk-assessor.interface';

const SYSTEM_PROMPTS: Record<AssessmentContext['kind'], string> = {
  geopolitical: `You are a maritime geopolitical risk analyst. Assess the risk of the shipping route described by the user.

Respond ONLY with a valid JSON object in this exact format:
{
  "risk_score": integer from 1 (minimal) to 10 (extreme),
  "risk_description": "Main risks and recommended precautions",
  "geopolitical_summary": "One or two sentence summary"
}`,
  weather: `You are a maritime weather risk analyst. Assess the weather risk of the shipping route described by the user.

Respond ONLY with a valid JSON object in this exact format:
{
  "risk_score": integer from 1 (minimal) to 10 (extreme),
  "risk_description": "Main weather risks and recommended precautions",
  "weather_summary": "One or two sentence summary"
}`
};

/**
 * Risk assessment through an OpenAI-compatible chat completions API.
 */
@injectable()
export class OpenAIRiskAssessorService implements IRiskAssessor {
  constructor(
    @inject('AppConfig') private readonly config: AppConfig,
    @inject('ChatCompletionsClient') private readonly client: ChatCompletionsClient
  ) {}

  async assess(context: AssessmentContext, signal?: AbortSignal): Promise<AssessorResult> {
    try {
      const parsed = await retryWithBackoff(
        () => this.callModel(context, signal),
        this.config.retry,
        isRetryableChatError,
        signal
      );
      return { ok: true, ...parsed };
    } catch (error) {
      const cause = error instanceof RetryExhaustedError ? error.lastError : error;
      const reason = chatFailureReason(cause, signal);
      const detail = cause instanceof Error ? cause.message : String(cause);

      console.warn(`[Assessor] ${this.config.llm.provider} ${context.kind} assessment failed (${reason}): ${detail}`);
      return { ok: false, reason, detail };
    }
  }

  async healthCheck(): Promise<string> {
    try {
      await this.client.chat.completions.create(
        {
          model: this.config.llm.model,
          messages: [{ role: 'user', content: 'Reply with OK.' }],
          max_tokens: 10
        },
        { timeout: this.config.llm.timeoutMs }
      );
      return 'healthy';
    } catch (error) {
      return `unhealthy (error: ${error instanceof Error ? error.message : String(error)})`;
    }
  }

  private async callModel(
    context: AssessmentContext,
    signal?: AbortSignal
  ): Promise<{ score: number; description: string; summary: string }> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.config.llm.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPTS[context.kind] },
          { role: 'user', content: this.buildPrompt(context) }
        ],
        temperature: this.config.llm.temperature,
        max_tokens: this.config.llm.maxTokens
      },
      { signal, timeout: this.config.llm.timeoutMs }
    );

    return this.parseResponse(context.kind, completion.choices[0]?.message.content ?? '');
  }

  buildPrompt(context: AssessmentContext): string {
    const { query, estimate } = context;
    const lines = [
      `Route: ${context.departure.name} (${context.departure.country}) -> ${context.destination.name} (${context.destination.country})`,
      `Departure date: ${query.departureDate}`,
      `Carrier: ${query.carrierName}`,
      `Goods: ${query.goodsType}`,
      `Distance: ${estimate.distanceKm} km great-circle, ${estimate.adjustedDistanceKm} km by sea lanes`,
      `Estimated transit: ${estimate.transitDays} days including ${estimate.portDays} port days`
    ];

    return context.kind === 'geopolitical'
      ? [...lines, ...this.geopoliticalLines(context)].join('\n')
      : [...lines, ...this.weatherLines(context)].join('\n');
  }

  private geopoliticalLines(context: GeopoliticalAssessmentContext): string[] {
    const { routeAnalysis, intelligence } = context;
    const events = intelligence.events.slice(0, 5).map(event =>
      `- ${event.title} (${event.source}, relevance ${event.finalRelevanceScore}/10)`
    );

    return [
      '',
      this.profileLine('Departure country', context.departureProfile),
      this.profileLine('Destination country', context.destinationProfile),
      `Chokepoints: ${routeAnalysis.chokepoints.join(', ') || 'none identified'}`,
      `Security zones: ${routeAnalysis.securityZones.join(', ') || 'none identified'}`,
      `Shipping lanes: ${routeAnalysis.shippingLanes}`,
      `Alternative routes: ${routeAnalysis.alternativeRoutes}`,
      `Seasonal factors: ${routeAnalysis.seasonalFactors}`,
      `Cargo risks: ${routeAnalysis.goodsSpecificRisks}`,
      '',
      `Recent events (${intelligence.sentiment} sentiment, ${intelligence.confidence} confidence):`,
      ...(events.length > 0 ? events : ['- none']),
      `Intelligence summary: ${intelligence.summary}`
    ];
  }

  private weatherLines(context: WeatherAssessmentContext): string[] {
    return [
      '',
      this.weatherLine('Departure port weather', context.departureWeather),
      this.weatherLine('Destination port weather', context.destinationWeather)
    ];
  }

  private profileLine(label: string, profile: CountryProfile): string {
    return `${label}: ${profile.country}, political stability ${profile.politicalStability}/10, ` +
      `sanctions: ${profile.sanctionsStatus}, security threat: ${profile.securityThreat}, ` +
      `cargo restrictions: ${profile.cargoRestrictions}`;
  }

  private weatherLine(label: string, weather: PortWeather | null): string {
    if (!weather) {
      return `${label}: forecast unavailable`;
    }
    return `${label}: ${weather.temperature}°C, wind up to ${weather.windSpeedKph} km/h, ` +
      `visibility ${weather.visibilityKm} km, precipitation ${weather.precipitationMm} mm`;
  }

  private parseResponse(
    kind: AssessmentContext['kind'],
    outputText: string
  ): { score: number; description: string; summary: string } {
    try {
      const parsed = extractJsonObject(outputText);

      if (kind === 'geopolitical') {
        const reply = GeopoliticalAssessmentResponseSchema.parse(parsed);
        return { score: reply.risk_score, description: reply.risk_description, summary: reply.geopolitical_summary };
      }
      const reply = WeatherAssessmentResponseSchema.parse(parsed);
      return { score: reply.risk_score, description: reply.risk_description, summary: reply.weather_summary };
    } catch (error) {
      throw new AssessorUnavailableError(
        `Failed to parse assessor response: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined
      );
    }
  }
}
