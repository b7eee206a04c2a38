import { inject, injectable } from 'tsyringe';
import { AppConfig } from '../config/app.config';
import {
  ChokepointInfo,
  CountryAttributes,
  CountryProfile,
  HazardCondition,
  HazardRule,
  LocationRecord,
  ReferenceTables,
  SecurityZoneInfo
} from '../types/domain.types';
import { InvalidLocationError } from '../errors/route-risk.errors';

export interface PortMatch {
  port: LocationRecord;
  score: number;
}

export interface PortSecurityAssessment {
  overallSecurityLevel: string;
  laborStability: string;
  infrastructureQuality: string;
  country: string;
  region: string;
  riskScore: number;
}

const TECH_GOODS = ['electronics', 'technology', 'semiconductors', 'software'];
const TECH_TRANSFER_GOODS = ['electronics', 'technology', 'semiconductors'];
const DUAL_USE_GOODS = ['chemicals', 'materials', 'machinery'];
const MILITARY_GOODS = ['military', 'defense', 'weapons'];
const ENERGY_GOODS = ['energy', 'oil', 'gas'];

const TECH_CONTROLLED_COUNTRIES = ['China', 'Russia', 'Iran', 'North Korea'];
const SANCTIONED_COUNTRIES = ['Iran', 'Russia', 'North Korea'];
const ENERGY_SANCTIONED_COUNTRIES = ['Russia', 'Iran'];

/**
 * Read-only view over the static reference tables.
 * Built once at startup; safe to share between concurrent requests.
 */
@injectable()
export class ReferenceDataStore {
  private readonly countries: Map<string, CountryAttributes>;
  private readonly fuzzyThreshold: number;

  constructor(
    @inject('ReferenceTables') private readonly tables: ReferenceTables,
    @inject('AppConfig') config: AppConfig
  ) {
    this.fuzzyThreshold = config.lookup.fuzzyThreshold;
    this.countries = new Map(tables.countries.map(country => [country.country.toLowerCase(), country]));
  }

  get portCount(): number {
    return this.tables.ports.length;
  }

  /**
   * Resolves a port by key, canonical name, code or "country key", then by best fuzzy score.
   * @throws InvalidLocationError when nothing reaches the fuzzy threshold
   */
  lookup(name: string): LocationRecord {
    const query = name.trim().toLowerCase();
    if (!query) {
      throw new InvalidLocationError('Location name must not be empty', name);
    }

    const exact = this.tables.ports.find(port =>
      port.key.toLowerCase() === query ||
      port.name.toLowerCase() === query ||
      port.code.toLowerCase() === query ||
      `${port.country} ${port.key}`.toLowerCase() === query
    );
    if (exact) {
      return exact;
    }

    let best: LocationRecord | undefined;
    let bestScore = 0;
    for (const port of this.tables.ports) {
      const score = this.score(query, port);
      if (score > bestScore) {
        best = port;
        bestScore = score;
      }
    }

    if (!best || bestScore < this.fuzzyThreshold) {
      console.warn(`[Reference Data] Port not found: ${name}`);
      throw new InvalidLocationError(`Unknown location: ${name}`, name);
    }
    return best;
  }

  /**
   * Relevance of a record to a query, 0-1. Whole-query checks first, then per-word overlap.
   */
  score(query: string, port: LocationRecord): number {
    const q = query.trim().toLowerCase();
    const portName = port.name.toLowerCase();
    let score = 0;

    if (q === portName) {
      score += 1.0;
    } else if (q === port.code.toLowerCase()) {
      score += 0.9;
    } else if (portName.includes(q)) {
      score += 0.8;
    } else if (port.country.toLowerCase().includes(q)) {
      score += 0.3;
    }

    const portWords = portName.split(/\s+/);
    for (const queryWord of q.split(/\s+/).filter(Boolean)) {
      for (const portWord of portWords) {
        if (portWord.includes(queryWord)) {
          score += 0.2;
        } else if (portWord.startsWith(queryWord)) {
          score += 0.4;
        }
      }
    }

    return Math.min(score, 1.0);
  }

  /** Ranked matches; equal scores keep table order. */
  search(query: string, limit = 10): PortMatch[] {
    const q = query.trim().toLowerCase();
    if (!q || limit <= 0) {
      return [];
    }

    return this.tables.ports
      .map((port, index) => ({ port, score: this.score(q, port), index }))
      .filter(match => match.score > 0)
      .sort((a, b) => b.score - a.score || a.index - b.index)
      .slice(0, limit)
      .map(({ port, score }) => ({ port, score }));
  }

  chokepointsFor(a: LocationRecord, b: LocationRecord): string[] {
    return this.hazardsFor('chokepoint', a, b);
  }

  securityZonesFor(a: LocationRecord, b: LocationRecord): string[] {
    return this.hazardsFor('securityZone', a, b);
  }

  chokepointDetails(names: readonly string[]): ChokepointInfo[] {
    return this.tables.chokepoints.filter(info => names.includes(info.name));
  }

  securityZoneDetails(names: readonly string[]): SecurityZoneInfo[] {
    return this.tables.securityZones.filter(info => names.includes(info.name));
  }

  /**
   * Country attributes, with cargo restrictions for the goods type when one is given.
   * Unknown countries get neutral defaults.
   */
  countryProfile(country: string, goodsType?: string): CountryProfile {
    const name = country.trim();
    const base = this.countries.get(name.toLowerCase()) ?? this.defaultCountry(name);

    const goods = goodsType?.trim().toLowerCase();
    if (!goods) {
      return { ...base, cargoRestrictions: 'Standard international regulations apply' };
    }

    let cargoRestrictions = this.cargoRestrictions(base.country, goods);
    let { regulatoryStability, sanctionsStatus } = base;

    if (TECH_TRANSFER_GOODS.includes(goods)) {
      if (TECH_CONTROLLED_COUNTRIES.includes(base.country)) {
        cargoRestrictions += ' HIGH RISK: Technology transfer restrictions apply.';
        regulatoryStability = 'Low (tech restrictions)';
      }
    } else if (MILITARY_GOODS.includes(goods)) {
      cargoRestrictions += ' CRITICAL: Military/dual-use export controls apply.';
      regulatoryStability = 'High scrutiny required';
    } else if (ENERGY_GOODS.includes(goods) && ENERGY_SANCTIONED_COUNTRIES.includes(base.country)) {
      cargoRestrictions += ' SANCTIONS: Energy sector sanctions in effect.';
      sanctionsStatus = 'Energy sanctions active';
    }

    return { ...base, regulatoryStability, sanctionsStatus, cargoRestrictions };
  }

  regionalPorts(region: string): LocationRecord[] {
    return this.tables.ports.filter(port => port.region === region);
  }

  countryPorts(country: string): LocationRecord[] {
    return this.tables.ports.filter(port => port.country === country);
  }

  portSecurityRisk(port: LocationRecord): PortSecurityAssessment {
    let riskScore = 5;

    switch (port.securityLevel) {
      case 'Very High': riskScore -= 2; break;
      case 'High': riskScore -= 1; break;
      case 'Low': riskScore += 2; break;
      case 'Very Low': riskScore += 3; break;
      default: break;
    }
    if (port.laborStability === 'Excellent') riskScore -= 1;
    else if (port.laborStability === 'Poor') riskScore += 2;
    if (port.infrastructure === 'Excellent') riskScore -= 1;
    else if (port.infrastructure === 'Poor') riskScore += 1;

    return {
      overallSecurityLevel: port.securityLevel,
      laborStability: port.laborStability,
      infrastructureQuality: port.infrastructure,
      country: port.country,
      region: port.region,
      riskScore: Math.max(1, Math.min(riskScore, 10))
    };
  }

  private hazardsFor(kind: HazardRule['kind'], a: LocationRecord, b: LocationRecord): string[] {
    const found: string[] = [];
    for (const rule of this.tables.hazardRules) {
      if (rule.kind !== kind || !this.matches(rule.when, a, b)) {
        continue;
      }
      for (const hazard of rule.hazards) {
        if (!found.includes(hazard)) {
          found.push(hazard);
        }
      }
    }
    return found;
  }

  private matches(condition: HazardCondition, a: LocationRecord, b: LocationRecord): boolean {
    switch (condition.type) {
      case 'between': {
        const [x, y] = condition.regions;
        return (a.region.includes(x) && b.region.includes(y)) || (a.region.includes(y) && b.region.includes(x));
      }
      case 'route':
        return a.region.includes(condition.from) && b.region.includes(condition.to);
      case 'eitherRegion':
        return a.region === condition.region || b.region === condition.region;
      case 'eitherCountry':
        return condition.countries.includes(a.country) || condition.countries.includes(b.country);
    }
  }

  private cargoRestrictions(country: string, goods: string): string {
    const restrictions: string[] = [];

    if (TECH_GOODS.includes(goods)) {
      if (TECH_CONTROLLED_COUNTRIES.includes(country)) {
        restrictions.push('Technology export controls');
      }
      if (country === 'China') {
        restrictions.push('CFIUS review may be required');
      }
    }
    if (DUAL_USE_GOODS.includes(goods)) {
      restrictions.push('Dual-use export license may be required');
    }
    if (SANCTIONED_COUNTRIES.includes(country)) {
      restrictions.push('Comprehensive sanctions apply');
    }

    return restrictions.length > 0 ? restrictions.join('; ') : 'Standard regulations';
  }

  private defaultCountry(country: string): CountryAttributes {
    return {
      country,
      politicalStability: 5,
      tradeFreedom: 60,
      corruptionLevel: 'Unknown',
      securityThreat: 'Unknown',
      sanctionsStatus: 'Unknown',
      portSecurity: 'Unknown',
      laborConditions: 'Unknown',
      regulatoryStability: 'Unknown',
      region: 'Unknown'
    };
  }
}
