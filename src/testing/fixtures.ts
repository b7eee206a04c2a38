// Shared test data. Values are made up for tests; only the shape mirrors data/reference-data.json.
import { AppConfig } from '../config/app.config';
import {
  CountryAttributes,
  HazardRule,
  LocationRecord,
  PortWeather,
  ReferenceTables,
  RouteIntelligence
} from '../types/domain.types';
import {
  GeopoliticalAssessmentContext,
  RouteAnalysis,
  RouteEstimate,
  RouteQuery,
  WeatherAssessmentContext
} from '../types/assessment.types';
import { MitigationRequest } from '../types/mitigation.types';

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    llm: {
      provider: 'openai',
      apiKey: 'test-key',
      model: 'gpt-4o-mini',
      temperature: 0.3,
      maxTokens: 1000,
      timeoutMs: 5_000
    },
    mitigation: {
      temperature: 0.7,
      maxTokens: 2000
    },
    weather: {
      baseUrl: 'https://api.open-meteo.com/v1/forecast',
      timeoutMs: 5_000,
      forecastHorizonDays: 16
    },
    data: {
      referencePath: '/fake/path/reference-data.json',
      newsFeedPath: '/fake/path/news-feed.json'
    },
    cache: {
      assessmentTtlMs: 60_000,
      newsTtlMs: 60_000
    },
    lookup: {
      fuzzyThreshold: 0.3
    },
    retry: {
      maxRetries: 1,
      baseDelay: 0,
      maxDelay: 0,
      jitterFactor: 0
    },
    server: {
      port: 3001
    },
    ...overrides
  };
}

export const LOS_ANGELES: LocationRecord = {
  key: 'Los Angeles',
  name: 'Port of Los Angeles',
  country: 'United States',
  code: 'USLAX',
  coordinates: { latitude: 33.7361, longitude: -118.2922 },
  region: 'North America',
  securityLevel: 'High',
  laborStability: 'Good',
  infrastructure: 'Excellent'
};

export const LONG_BEACH: LocationRecord = {
  key: 'Long Beach',
  name: 'Port of Long Beach',
  country: 'United States',
  code: 'USLGB',
  coordinates: { latitude: 33.77, longitude: -118.21 },
  region: 'North America',
  securityLevel: 'High',
  laborStability: 'Good',
  infrastructure: 'Excellent'
};

export const SHANGHAI: LocationRecord = {
  key: 'Shanghai',
  name: 'Port of Shanghai',
  country: 'China',
  code: 'CNSHA',
  coordinates: { latitude: 31.2304, longitude: 121.4737 },
  region: 'East Asia',
  securityLevel: 'High',
  laborStability: 'Controlled',
  infrastructure: 'Excellent'
};

export const SINGAPORE: LocationRecord = {
  key: 'Singapore',
  name: 'Port of Singapore',
  country: 'Singapore',
  code: 'SGSIN',
  coordinates: { latitude: 1.2966, longitude: 103.7764 },
  region: 'Southeast Asia',
  securityLevel: 'Very High',
  laborStability: 'Excellent',
  infrastructure: 'Excellent'
};

export const ROTTERDAM: LocationRecord = {
  key: 'Rotterdam',
  name: 'Port of Rotterdam',
  country: 'Netherlands',
  code: 'NLRTM',
  coordinates: { latitude: 51.9225, longitude: 4.4792 },
  region: 'Europe',
  securityLevel: 'Very High',
  laborStability: 'Excellent',
  infrastructure: 'Excellent'
};

export const JEBEL_ALI: LocationRecord = {
  key: 'Jebel Ali',
  name: 'Jebel Ali Port',
  country: 'United Arab Emirates',
  code: 'AEJEA',
  coordinates: { latitude: 25.0118, longitude: 55.137 },
  region: 'Middle East',
  securityLevel: 'High',
  laborStability: 'Good',
  infrastructure: 'Excellent'
};

export const BUENOS_AIRES: LocationRecord = {
  key: 'Buenos Aires',
  name: 'Port of Buenos Aires',
  country: 'Argentina',
  code: 'ARBUE',
  coordinates: { latitude: -34.6118, longitude: -58.396 },
  region: 'South America',
  securityLevel: 'Medium',
  laborStability: 'Poor',
  infrastructure: 'Fair'
};

export const DURBAN: LocationRecord = {
  key: 'Durban',
  name: 'Port of Durban',
  country: 'South Africa',
  code: 'ZADUR',
  coordinates: { latitude: -29.8587, longitude: 31.0218 },
  region: 'Africa',
  securityLevel: 'Medium',
  laborStability: 'Poor',
  infrastructure: 'Fair'
};

const country = (
  name: string,
  politicalStability: number,
  sanctionsStatus: string,
  region: string
): CountryAttributes => ({
  country: name,
  politicalStability,
  tradeFreedom: 70,
  corruptionLevel: 'Low',
  securityThreat: 'Low',
  sanctionsStatus,
  portSecurity: 'High',
  laborConditions: 'Good',
  regulatoryStability: 'High',
  region
});

export const COUNTRIES: CountryAttributes[] = [
  country('United States', 8, 'Sanctions issuer', 'North America'),
  country('China', 7, 'Subject to some US sanctions', 'East Asia'),
  country('Singapore', 9, 'None', 'Southeast Asia'),
  country('Netherlands', 8, 'EU sanctions participant', 'Europe'),
  country('United Arab Emirates', 7, 'None', 'Middle East'),
  country('Iran', 3, 'Major international sanctions', 'Middle East'),
  country('Russia', 4, 'Extensive international sanctions', 'Eastern Europe/Asia')
];

export const HAZARD_RULES: HazardRule[] = [
  { kind: 'chokepoint', hazards: ['Suez Canal', 'Strait of Malacca'], when: { type: 'between', regions: ['Europe', 'Asia'] } },
  { kind: 'chokepoint', hazards: ['Strait of Hormuz', 'Bab el-Mandeb'], when: { type: 'eitherRegion', region: 'Middle East' } },
  { kind: 'chokepoint', hazards: ['Panama Canal'], when: { type: 'route', from: 'America', to: 'Asia' } },
  { kind: 'chokepoint', hazards: ['South China Sea'], when: { type: 'eitherRegion', region: 'East Asia' } },
  { kind: 'securityZone', hazards: ['Gulf of Guinea'], when: { type: 'eitherRegion', region: 'Africa' } },
  { kind: 'securityZone', hazards: ['Persian Gulf', 'Somalia Coast'], when: { type: 'eitherRegion', region: 'Middle East' } },
  { kind: 'securityZone', hazards: ['Black Sea'], when: { type: 'eitherCountry', countries: ['Ukraine', 'Russia'] } },
  { kind: 'securityZone', hazards: ['Taiwan Strait'], when: { type: 'eitherCountry', countries: ['Taiwan', 'China'] } }
];

export const TEST_TABLES: ReferenceTables = {
  ports: [LOS_ANGELES, LONG_BEACH, SHANGHAI, SINGAPORE, ROTTERDAM, JEBEL_ALI, BUENOS_AIRES, DURBAN],
  countries: COUNTRIES,
  chokepoints: [
    {
      name: 'Suez Canal',
      description: 'Passage between the Mediterranean and the Red Sea',
      status: 'Operational',
      riskLevel: 'Medium',
      alternatives: 'Cape of Good Hope',
      securityConcerns: ['Canal blockage']
    },
    {
      name: 'Strait of Hormuz',
      description: 'Oil and gas transit point',
      status: 'Tense',
      riskLevel: 'High',
      alternatives: 'Limited',
      securityConcerns: ['Naval incidents']
    }
  ],
  securityZones: [
    {
      name: 'Persian Gulf',
      threatType: 'Military incidents',
      riskLevel: 'High',
      affectedRoutes: ['Gulf states - Global'],
      mitigation: 'Escort services'
    }
  ],
  hazardRules: HAZARD_RULES
};

export const LA_SHANGHAI_QUERY: RouteQuery = {
  departurePort: 'Los Angeles',
  destinationPort: 'Shanghai',
  departureDate: '2026-11-02',
  carrierName: 'Test Carrier',
  goodsType: 'electronics'
};

export const LA_SHANGHAI_MITIGATION: MitigationRequest = {
  ...LA_SHANGHAI_QUERY,
  weatherConditions: {
    riskScore: 6,
    riskDescription: 'Moderate swell expected on the Pacific crossing.',
    weatherSummary: 'Moderate weather risk for the departure window.',
    departureWeather: { temperature: 21, windSpeed: 14, conditions: 'Clear' },
    estimatedTravelDays: 23
  },
  geopoliticalConditions: {
    riskScore: 8,
    riskDescription: 'South China Sea tensions and technology export controls.',
    geopoliticalSummary: 'Elevated geopolitical risk on the route.',
    chokepoints: ['Panama Canal', 'South China Sea'],
    securityZones: ['South China Sea'],
    shippingLanes: 'Trans-Pacific westbound lanes'
  }
};

export const LA_SHANGHAI_ESTIMATE: RouteEstimate = {
  distanceKm: 10455,
  routeFactor: 1.3,
  adjustedDistanceKm: 13591,
  speedFactor: 1.0,
  portDays: 1,
  transitDays: 23
};

export const LA_SHANGHAI_ANALYSIS: RouteAnalysis = {
  departureCountry: 'United States',
  destinationCountry: 'China',
  routeType: 'transoceanic',
  chokepoints: ['Panama Canal', 'South China Sea'],
  securityZones: ['Taiwan Strait'],
  shippingLanes: 'Trans-Pacific main line',
  alternativeRoutes: 'Cape Horn or US land bridge',
  seasonalFactors: 'Hurricane season in Atlantic/Pacific',
  goodsSpecificRisks: 'Technology transfer scrutiny in disputed waters'
};

export const QUIET_INTELLIGENCE: RouteIntelligence = {
  events: [],
  sentiment: 'neutral',
  confidence: 'low',
  summary: 'No significant geopolitical events identified affecting this route.',
  lastUpdated: '2026-10-19T00:00:00.000Z'
};

export function geopoliticalContext(
  overrides: Partial<GeopoliticalAssessmentContext> = {}
): GeopoliticalAssessmentContext {
  return {
    kind: 'geopolitical',
    query: LA_SHANGHAI_QUERY,
    departure: LOS_ANGELES,
    destination: SHANGHAI,
    estimate: LA_SHANGHAI_ESTIMATE,
    departureProfile: { ...COUNTRIES[0], cargoRestrictions: 'Standard regulations' },
    destinationProfile: { ...COUNTRIES[1], cargoRestrictions: 'Technology export controls' },
    routeAnalysis: LA_SHANGHAI_ANALYSIS,
    intelligence: QUIET_INTELLIGENCE,
    ...overrides
  };
}

export const CALM_WEATHER: PortWeather = { temperature: 21, windSpeedKph: 14, visibilityKm: 20, precipitationMm: 0 };

export function weatherContext(overrides: Partial<WeatherAssessmentContext> = {}): WeatherAssessmentContext {
  return {
    kind: 'weather',
    query: LA_SHANGHAI_QUERY,
    departure: LOS_ANGELES,
    destination: SHANGHAI,
    estimate: LA_SHANGHAI_ESTIMATE,
    departureWeather: CALM_WEATHER,
    destinationWeather: CALM_WEATHER,
    ...overrides
  };
}
