import { injectable } from 'tsyringe';
import { CountryAttributes, PortWeather } from '../types/domain.types';
import { ScoredAssessment } from '../types/assessment.types';

const DEFAULT_STABILITY = 5;
const SANCTIONS_MARKERS = ['sanctions', 'embargo'];
const HIGH_RISK_CHOKEPOINTS = ['Strait of Hormuz', 'Bab el-Mandeb', 'South China Sea'];
const HIGH_IMPACT_RELEVANCE = 7;

export type CountryRiskAttributes = Partial<Pick<CountryAttributes, 'politicalStability' | 'sanctionsStatus'>>;

/**
 * Inputs for the geopolitical fallback. Every field may be missing;
 * missing values count as neutral.
 */
export interface GeopoliticalFallbackInput {
  departure?: CountryRiskAttributes | null;
  destination?: CountryRiskAttributes | null;
  chokepoints?: readonly string[];
  securityZones?: readonly string[];
  eventRelevance?: readonly number[];
}

export interface WeatherFallbackInput {
  departureWeather?: PortWeather | null;
  destinationWeather?: PortWeather | null;
}

function clampScore(points: number): number {
  return Math.min(1 + points, 10);
}

function stabilityOf(attributes?: CountryRiskAttributes | null): number {
  const value = attributes?.politicalStability;
  return typeof value === 'number' && Number.isFinite(value) ? value : DEFAULT_STABILITY;
}

function hasSanctionsMarker(attributes?: CountryRiskAttributes | null): boolean {
  const status = attributes?.sanctionsStatus?.toLowerCase() ?? '';
  return SANCTIONS_MARKERS.some(marker => status.includes(marker));
}

/**
 * Deterministic geopolitical score used when the assessor cannot answer.
 * Pure: the same input always gives the same score and text.
 */
@injectable()
export class GeopoliticalFallbackScorer {
  score(input: GeopoliticalFallbackInput): ScoredAssessment {
    const factors: string[] = [];
    let points = 0;

    const lowestStability = Math.min(stabilityOf(input.departure), stabilityOf(input.destination));
    if (lowestStability <= 3) {
      points += 3;
      factors.push('Political instability concerns');
    } else if (lowestStability <= 5) {
      points += 1;
      factors.push('Moderate political concerns');
    }

    if (hasSanctionsMarker(input.departure) || hasSanctionsMarker(input.destination)) {
      points += 4;
      factors.push('Sanctions complications');
    }

    // First match only
    const chokepoint = (input.chokepoints ?? []).find(name =>
      HIGH_RISK_CHOKEPOINTS.some(risky => name.includes(risky))
    );
    if (chokepoint) {
      points += 2;
      factors.push(`High-risk chokepoint: ${chokepoint}`);
    }

    if ((input.securityZones ?? []).length > 0) {
      points += 1;
      factors.push('Security risk zones on route');
    }

    if ((input.eventRelevance ?? []).some(relevance => relevance >= HIGH_IMPACT_RELEVANCE)) {
      points += 2;
      factors.push('High-impact recent events');
    }

    if (factors.length === 0) {
      return {
        score: 1,
        description: 'No significant risk identified. Standard security protocols apply.',
        summary: 'Low geopolitical risk environment for this route.'
      };
    }

    return {
      score: clampScore(points),
      description: `Geopolitical risks identified: ${factors.join(', ')}. Enhanced security measures and monitoring recommended.`,
      summary: `Elevated risk due to: ${factors.slice(0, 3).join(', ')}.`
    };
  }
}

/**
 * Deterministic weather score from the conditions at both ends of the route.
 */
@injectable()
export class WeatherFallbackScorer {
  score(input: WeatherFallbackInput): ScoredAssessment {
    const factors: string[] = [];
    let points = 0;
    const missing: string[] = [];

    const ends: Array<[string, PortWeather | null | undefined]> = [
      ['departure', input.departureWeather],
      ['destination', input.destinationWeather]
    ];

    for (const [label, weather] of ends) {
      if (!weather) {
        missing.push(label);
        continue;
      }

      if (weather.windSpeedKph > 50) {
        points += 3;
        factors.push(`High winds at ${label}`);
      } else if (weather.windSpeedKph > 30) {
        points += 2;
        factors.push(`Moderate winds at ${label}`);
      }
      if (weather.visibilityKm < 5) {
        points += 2;
        factors.push(`Poor visibility at ${label}`);
      }
      if (weather.precipitationMm > 10) {
        points += 1;
        factors.push(`Heavy precipitation at ${label}`);
      }
    }

    const description = factors.length > 0
      ? `Weather-related concerns identified: ${factors.join(', ')}. Enhanced monitoring and precautions recommended.`
      : 'Weather conditions appear favorable for shipping operations. Standard operational precautions recommended.';

    let summary = factors.length > 0
      ? `Adverse conditions: ${factors.slice(0, 3).join(', ')}.`
      : 'No adverse weather expected on this route.';
    if (missing.length > 0) {
      summary += ` Forecast unavailable at ${missing.join(' and ')}.`;
    }

    return { score: clampScore(points), description, summary };
  }
}
