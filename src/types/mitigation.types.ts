import { z } from 'zod';
import { Provenance, RouteQuerySchema } from './assessment.types';

const riskScore = z.number().int().min(1).max(10);

const narrative = (field: string) =>
  z.string()
    .trim()
    .min(1, `${field} is required`)
    .max(1000, `${field} must be at most 1000 characters`);

const ObservedWeatherSchema = z.object({
  temperature: z.number().finite().optional(),
  windSpeed: z.number().finite().nonnegative().optional(),
  waveHeight: z.number().finite().nonnegative().optional(),
  visibility: z.number().finite().nonnegative().optional(),
  conditions: z.string().trim().max(200).optional()
});

export type ObservedWeather = z.infer<typeof ObservedWeatherSchema>;

// Scores and summaries from earlier weather and geopolitical assessments of the same route
export const MitigationRequestSchema = RouteQuerySchema.extend({
  weatherConditions: z.object({
    riskScore,
    riskDescription: narrative('riskDescription'),
    weatherSummary: narrative('weatherSummary'),
    departureWeather: ObservedWeatherSchema.optional(),
    destinationWeather: ObservedWeatherSchema.optional(),
    estimatedTravelDays: z.number().int().min(1).max(365)
  }),
  geopoliticalConditions: z.object({
    riskScore,
    riskDescription: narrative('riskDescription'),
    geopoliticalSummary: narrative('geopoliticalSummary'),
    chokepoints: z.array(z.string().trim().min(1)).max(20).default([]),
    securityZones: z.array(z.string().trim().min(1)).max(20).default([]),
    shippingLanes: narrative('shippingLanes')
  })
});

export type MitigationRequest = z.infer<typeof MitigationRequestSchema>;

export const STRATEGY_PRIORITIES = ['High', 'Medium', 'Low'] as const;
export type StrategyPriority = typeof STRATEGY_PRIORITIES[number];

// Advisor reply
export const MitigationPlanResponseSchema = z.object({
  overall_risk_assessment: z.string().trim().min(10),
  recommended_action: z.string().trim().min(5),
  strategies: z.array(z.object({
    strategy_type: z.string().trim().min(1),
    priority: z.enum(STRATEGY_PRIORITIES),
    description: z.string().trim().min(1),
    implementation_time: z.string().trim().min(1),
    cost_impact: z.string().trim().min(1),
    risk_reduction: z.string().trim().min(1)
  })).min(1),
  alternative_routes: z.array(z.string().trim().min(1)).nullish(),
  timeline_recommendations: z.string().trim().nullish(),
  compliance_checks: z.array(z.string().trim().min(1)).nullish()
});

export type MitigationPlanResponse = z.infer<typeof MitigationPlanResponseSchema>;

export interface MitigationStrategy {
  strategyType: string;
  priority: StrategyPriority;
  description: string;
  implementationTime: string;
  costImpact: string;
  riskReduction: string;
}

export interface MitigationPlan {
  overallRiskAssessment: string;
  recommendedAction: string;
  strategies: MitigationStrategy[];
  alternativeRoutes: string[];
  timelineRecommendations: string | null;
  complianceChecks: string[];
}

export interface MitigationReport extends MitigationPlan {
  departurePort: string;
  destinationPort: string;
  departureDate: string;
  provenance: Provenance;
  fallbackReason?: string;
  generatedAt: string;
}
