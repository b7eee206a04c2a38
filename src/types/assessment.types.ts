import { z } from 'zod';
import {
  CountryProfile,
  LocationRecord,
  PortWeather,
  RouteIntelligence
} from './domain.types';

export type AssessmentKind = 'geopolitical' | 'weather';

const PORT_NAME_PATTERN = /^[a-zA-Z0-9\s\-.]+$/;

const portName = (field: string) =>
  z.string()
    .trim()
    .min(2, `${field} must be at least 2 characters`)
    .max(100, `${field} must be at most 100 characters`)
    .regex(PORT_NAME_PATTERN, `${field} contains invalid characters`);

const freeText = (field: string) =>
  z.string()
    .trim()
    .min(2, `${field} must be at least 2 characters`)
    .max(100, `${field} must be at most 100 characters`);

// Date parsing rolls impossible days over (2026-11-31 becomes 2026-12-01), so round-trip the value
function isCalendarDate(value: string): boolean {
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

// Inbound request shape. The date window is checked separately so it can raise InvalidDateError.
export const RouteQuerySchema = z.object({
  departurePort: portName('departurePort'),
  destinationPort: portName('destinationPort'),
  departureDate: z.string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'departureDate must be an ISO date (YYYY-MM-DD)')
    .refine(isCalendarDate, 'departureDate is not a valid date'),
  carrierName: freeText('carrierName'),
  goodsType: freeText('goodsType')
});

export type RouteQuery = z.infer<typeof RouteQuerySchema>;

// Zod schemas for the assessor's JSON reply
const assessorText = z.string().trim().min(10);

export const GeopoliticalAssessmentResponseSchema = z.object({
  risk_score: z.number().int().min(1).max(10),
  risk_description: assessorText,
  geopolitical_summary: assessorText
});

export const WeatherAssessmentResponseSchema = z.object({
  risk_score: z.number().int().min(1).max(10),
  risk_description: assessorText,
  weather_summary: assessorText
});

export interface RouteEstimate {
  distanceKm: number;
  routeFactor: number;
  adjustedDistanceKm: number;
  speedFactor: number;
  portDays: number;
  transitDays: number;
}

export type RouteType = 'transoceanic' | 'regional' | 'northern_route' | 'southern_route' | 'standard';

export interface RouteAnalysis {
  departureCountry: string;
  destinationCountry: string;
  routeType: RouteType;
  chokepoints: string[];
  securityZones: string[];
  shippingLanes: string;
  alternativeRoutes: string;
  seasonalFactors: string;
  goodsSpecificRisks: string;
}

export type WeatherSeverity = 'MINIMAL' | 'LOW' | 'MODERATE' | 'HIGH' | 'SEVERE';

export interface MarineConditions extends PortWeather {
  waveHeightM: number;
  seaState: string;
  severity: WeatherSeverity;
}

interface AssessmentContextBase {
  query: RouteQuery;
  departure: LocationRecord;
  destination: LocationRecord;
  estimate: RouteEstimate;
}

export interface GeopoliticalAssessmentContext extends AssessmentContextBase {
  kind: 'geopolitical';
  departureProfile: CountryProfile;
  destinationProfile: CountryProfile;
  routeAnalysis: RouteAnalysis;
  intelligence: RouteIntelligence;
}

export interface WeatherAssessmentContext extends AssessmentContextBase {
  kind: 'weather';
  departureWeather: PortWeather | null;
  destinationWeather: PortWeather | null;
}

export type AssessmentContext = GeopoliticalAssessmentContext | WeatherAssessmentContext;

export type Provenance = 'assessor' | 'fallback';

export interface EndpointAssessment {
  port: LocationRecord;
  countryProfile: CountryProfile;
  weather?: MarineConditions | null;
}

export interface RouteAssessment {
  kind: AssessmentKind;
  riskScore: number;
  riskDescription: string;
  summary: string;
  estimatedTransitDays: number;
  departure: EndpointAssessment;
  destination: EndpointAssessment;
  routeEstimate: RouteEstimate;
  routeHazards: string[];
  routeAnalysis?: RouteAnalysis;
  intelligence?: RouteIntelligence;
  provenance: Provenance;
  fallbackReason?: string;
  assessedAt: string;
}

export interface ScoredAssessment {
  score: number;
  description: string;
  summary: string;
}
