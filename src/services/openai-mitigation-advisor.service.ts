import { inject, injectable } from 'tsyringe';
import { AppConfig } from '../config/app.config';
import {
  MitigationPlan,
  MitigationPlanResponse,
  MitigationPlanResponseSchema,
  MitigationRequest,
  ObservedWeather
} from '../types/mitigation.types';
import { AdvisorResult } from '../types/result.types';
import { AssessorUnavailableError } from '../errors/route-risk.errors';
import { retryWithBackoff, RetryExhaustedError } from '../utils/retry.util';
import {
  chatFailureReason,
  ChatCompletionsClient,
  extractJsonObject,
  isRetryableChatError
} from '../utils/chat-completion.util';
import { IMitigationAdvisor } from './mitigation-advisor.interface';

const SYSTEM_PROMPT = `You are a maritime logistics risk manager. Given a shipping route and its weather and geopolitical risk assessments, recommend practical mitigation strategies.

Respond ONLY with a valid JSON object in this exact format:
{
  "overall_risk_assessment": "Overall risk level and key concerns",
  "recommended_action": "Primary action, e.g. proceed as planned, delay, reroute",
  "strategies": [
    {
      "strategy_type": "Weather Mitigation" | "Route Optimization" | "Documentation & Compliance" | "Insurance & Financial" | "Operational Adjustment",
      "priority": "High" | "Medium" | "Low",
      "description": "What to do",
      "implementation_time": "e.g. immediate, 1-2 days, 1 week",
      "cost_impact": "e.g. minimal, moderate, significant",
      "risk_reduction": "e.g. 25-35%"
    }
  ],
  "alternative_routes": ["Alternative routings, if any"],
  "timeline_recommendations": "Timing advice, e.g. delay by 3 days",
  "compliance_checks": ["Named documents and filings to verify, e.g. ISF-10+2 Importer Security Filing, Certificate of Origin"]
}`;

/**
 * Mitigation planning through an OpenAI-compatible chat completions API.
 */
@injectable()
export class OpenAIMitigationAdvisorService implements IMitigationAdvisor {
  constructor(
    @inject('AppConfig') private readonly config: AppConfig,
    @inject('ChatCompletionsClient') private readonly client: ChatCompletionsClient
  ) {}

  async advise(request: MitigationRequest, signal?: AbortSignal): Promise<AdvisorResult> {
    try {
      const plan = await retryWithBackoff(
        () => this.callModel(request, signal),
        this.config.retry,
        isRetryableChatError,
        signal
      );
      return { ok: true, plan };
    } catch (error) {
      const cause = error instanceof RetryExhaustedError ? error.lastError : error;
      const reason = chatFailureReason(cause, signal);
      const detail = cause instanceof Error ? cause.message : String(cause);

      console.warn(`[Mitigation] ${this.config.llm.provider} mitigation plan failed (${reason}): ${detail}`);
      return { ok: false, reason, detail };
    }
  }

  buildPrompt(request: MitigationRequest): string {
    const { weatherConditions: weather, geopoliticalConditions: geopolitical } = request;

    return [
      `Route: ${request.departurePort} -> ${request.destinationPort}`,
      `Departure date: ${request.departureDate}`,
      `Carrier: ${request.carrierName}`,
      `Goods: ${request.goodsType}`,
      '',
      `Weather risk: ${weather.riskScore}/10`,
      `Summary: ${weather.weatherSummary}`,
      `Details: ${weather.riskDescription}`,
      `Estimated travel days: ${weather.estimatedTravelDays}`,
      this.observedLine('Departure weather', weather.departureWeather),
      this.observedLine('Destination weather', weather.destinationWeather),
      '',
      `Geopolitical risk: ${geopolitical.riskScore}/10`,
      `Summary: ${geopolitical.geopoliticalSummary}`,
      `Details: ${geopolitical.riskDescription}`,
      `Chokepoints: ${geopolitical.chokepoints.join(', ') || 'none identified'}`,
      `Security zones: ${geopolitical.securityZones.join(', ') || 'none identified'}`,
      `Shipping lanes: ${geopolitical.shippingLanes}`
    ].join('\n');
  }

  private async callModel(request: MitigationRequest, signal?: AbortSignal): Promise<MitigationPlan> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.config.llm.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: this.buildPrompt(request) }
        ],
        temperature: this.config.mitigation.temperature,
        max_tokens: this.config.mitigation.maxTokens
      },
      { signal, timeout: this.config.llm.timeoutMs }
    );

    return this.parseResponse(completion.choices[0]?.message.content ?? '');
  }

  private observedLine(label: string, weather?: ObservedWeather): string {
    if (!weather) {
      return `${label}: not reported`;
    }

    const parts = [
      weather.conditions,
      weather.temperature !== undefined ? `${weather.temperature}°C` : undefined,
      weather.windSpeed !== undefined ? `wind ${weather.windSpeed} km/h` : undefined,
      weather.waveHeight !== undefined ? `waves ${weather.waveHeight} m` : undefined,
      weather.visibility !== undefined ? `visibility ${weather.visibility} km` : undefined
    ].filter((part): part is string => part !== undefined && part !== '');

    return `${label}: ${parts.join(', ') || 'not reported'}`;
  }

  private parseResponse(outputText: string): MitigationPlan {
    let reply: MitigationPlanResponse;
    try {
      reply = MitigationPlanResponseSchema.parse(extractJsonObject(outputText));
    } catch (error) {
      throw new AssessorUnavailableError(
        `Failed to parse mitigation plan: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined
      );
    }

    return {
      overallRiskAssessment: reply.overall_risk_assessment,
      recommendedAction: reply.recommended_action,
      strategies: reply.strategies.map(strategy => ({
        strategyType: strategy.strategy_type,
        priority: strategy.priority,
        description: strategy.description,
        implementationTime: strategy.implementation_time,
        costImpact: strategy.cost_impact,
        riskReduction: strategy.risk_reduction
      })),
      alternativeRoutes: reply.alternative_routes ?? [],
      timelineRecommendations: reply.timeline_recommendations || null,
      complianceChecks: reply.compliance_checks ?? []
    };
  }
}
