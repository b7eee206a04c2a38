// Domain types (source-agnostic)

export const REGIONS = [
  'North America',
  'South America',
  'Europe',
  'Eastern Europe/Asia',
  'Middle East',
  'Africa',
  'South Asia',
  'Southeast Asia',
  'East Asia',
  'Oceania',
  'Unknown'
] as const;
export type Region = typeof REGIONS[number];

export const SECURITY_LEVELS = ['Very Low', 'Low', 'Medium', 'High', 'Very High'] as const;
export type SecurityLevel = typeof SECURITY_LEVELS[number];

export const LABOR_STABILITY = ['Poor', 'Fair', 'Good', 'Very Good', 'Excellent', 'Controlled'] as const;
export type LaborStability = typeof LABOR_STABILITY[number];

export const INFRASTRUCTURE_QUALITY = ['Poor', 'Fair', 'Good', 'Very Good', 'Excellent'] as const;
export type InfrastructureQuality = typeof INFRASTRUCTURE_QUALITY[number];

export interface GeoPoint {
  latitude: number;
  longitude: number;
}

/**
 * A port from the static reference table.
 * `key` is the short name used as the table key ("Los Angeles"),
 * `name` the canonical one ("Port of Los Angeles").
 */
export interface LocationRecord {
  readonly key: string;
  readonly name: string;
  readonly country: string;
  readonly code: string;
  readonly coordinates: Readonly<GeoPoint>;
  readonly region: Region;
  readonly securityLevel: SecurityLevel;
  readonly laborStability: LaborStability;
  readonly infrastructure: InfrastructureQuality;
}

export interface CountryAttributes {
  readonly country: string;
  readonly politicalStability: number;  // 1-10
  readonly tradeFreedom: number;        // 0-100
  readonly corruptionLevel: string;
  readonly securityThreat: string;
  readonly sanctionsStatus: string;
  readonly portSecurity: string;
  readonly laborConditions: string;
  readonly regulatoryStability: string;
  readonly region: string;
}

export interface CountryProfile extends CountryAttributes {
  readonly cargoRestrictions: string;
}

export interface ChokepointInfo {
  readonly name: string;
  readonly description: string;
  readonly status: string;
  readonly riskLevel: string;
  readonly alternatives: string;
  readonly securityConcerns: readonly string[];
}

export interface SecurityZoneInfo {
  readonly name: string;
  readonly threatType: string;
  readonly riskLevel: string;
  readonly affectedRoutes: readonly string[];
  readonly mitigation: string;
}

export type HazardCondition =
  | { readonly type: 'between'; readonly regions: readonly [string, string] }   // symmetric, substring on region
  | { readonly type: 'route'; readonly from: string; readonly to: string }      // directional, substring on region
  | { readonly type: 'eitherRegion'; readonly region: string }                  // exact region on either end
  | { readonly type: 'eitherCountry'; readonly countries: readonly string[] };

export interface HazardRule {
  readonly kind: 'chokepoint' | 'securityZone';
  readonly hazards: readonly string[];
  readonly when: HazardCondition;
}

export interface ReferenceTables {
  readonly ports: readonly LocationRecord[];
  readonly countries: readonly CountryAttributes[];
  readonly chokepoints: readonly ChokepointInfo[];
  readonly securityZones: readonly SecurityZoneInfo[];
  readonly hazardRules: readonly HazardRule[];
}

export interface PortWeather {
  temperature: number;       // °C, daily mean
  windSpeedKph: number;      // daily max
  visibilityKm: number;      // daily min
  precipitationMm: number;   // daily total
}

export type NewsSeverity = 'low' | 'medium' | 'high';

export interface NewsArticle {
  title: string;
  summary: string;
  source: string;
  url?: string;
  publishedDate?: string;    // ISO 8601
  severity: NewsSeverity;
}

export interface NewsEvent extends NewsArticle {
  searchQuery: string;
  sourceReliability: number;
  relevanceScore: number;
  finalRelevanceScore: number;
  securityRelated: boolean;
  sanctionsRelated: boolean;
  chokepointRelated?: string;
}

export type NewsSentiment = 'negative' | 'neutral' | 'positive';
export type IntelligenceConfidence = 'low' | 'medium' | 'high';

export interface RouteIntelligence {
  events: NewsEvent[];
  sentiment: NewsSentiment;
  confidence: IntelligenceConfidence;
  summary: string;
  lastUpdated: string;
}
