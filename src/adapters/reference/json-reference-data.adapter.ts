import { readFile } from 'fs/promises';
import { inject, injectable } from 'tsyringe';
import { z } from 'zod';
import {
  INFRASTRUCTURE_QUALITY,
  LABOR_STABILITY,
  ReferenceTables,
  REGIONS,
  SECURITY_LEVELS
} from '../../types/domain.types';
import { DataIntegrityError } from '../../errors/route-risk.errors';
import { IReferenceDataAdapter } from './reference-data-adapter.interface';

const nonEmpty = z.string().trim().min(1);

const LocationRecordSchema = z.object({
  key: nonEmpty,
  name: nonEmpty,
  country: nonEmpty,
  code: nonEmpty,
  coordinates: z.object({
    latitude: z.number().min(-90).max(90, 'Latitude must be between -90 and 90'),
    longitude: z.number().min(-180).max(180, 'Longitude must be between -180 and 180')
  }),
  region: z.enum(REGIONS),
  securityLevel: z.enum(SECURITY_LEVELS),
  laborStability: z.enum(LABOR_STABILITY),
  infrastructure: z.enum(INFRASTRUCTURE_QUALITY)
});

const CountryAttributesSchema = z.object({
  country: nonEmpty,
  politicalStability: z.number().int().min(1).max(10),
  tradeFreedom: z.number().min(0).max(100),
  corruptionLevel: z.string(),
  securityThreat: z.string(),
  sanctionsStatus: z.string(),
  portSecurity: z.string(),
  laborConditions: z.string(),
  regulatoryStability: z.string(),
  region: z.string()
});

const HazardConditionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('between'), regions: z.tuple([nonEmpty, nonEmpty]) }),
  z.object({ type: z.literal('route'), from: nonEmpty, to: nonEmpty }),
  z.object({ type: z.literal('eitherRegion'), region: nonEmpty }),
  z.object({ type: z.literal('eitherCountry'), countries: z.array(nonEmpty).min(1) })
]);

const ReferenceTablesSchema = z.object({
  ports: z.array(LocationRecordSchema).min(1),
  countries: z.array(CountryAttributesSchema),
  chokepoints: z.array(z.object({
    name: nonEmpty,
    description: z.string(),
    status: z.string(),
    riskLevel: z.string(),
    alternatives: z.string(),
    securityConcerns: z.array(z.string())
  })),
  securityZones: z.array(z.object({
    name: nonEmpty,
    threatType: z.string(),
    riskLevel: z.string(),
    affectedRoutes: z.array(z.string()),
    mitigation: z.string()
  })),
  hazardRules: z.array(z.object({
    kind: z.enum(['chokepoint', 'securityZone']),
    hazards: z.array(nonEmpty).min(1),
    when: HazardConditionSchema
  }))
});

@injectable()
export class JsonReferenceDataAdapter implements IReferenceDataAdapter {
  private tables: ReferenceTables | null = null;

  constructor(@inject('ReferenceDataPath') private readonly dataPath: string) {}

  async load(): Promise<ReferenceTables> {
    if (this.tables !== null) {
      return this.tables;
    }

    let raw: unknown;
    try {
      const fileContent = await readFile(this.dataPath, 'utf-8');
      raw = JSON.parse(fileContent);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new DataIntegrityError(`Failed to read reference data from ${this.dataPath}: ${errorMessage}`);
    }

    const validation = ReferenceTablesSchema.safeParse(raw);
    if (!validation.success) {
      const issues = validation.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new DataIntegrityError(`Reference data validation failed: ${issues.join(', ')}`, issues);
    }

    this.assertUniqueKeys(validation.data.ports.map(port => port.key), 'port key');
    this.assertUniqueKeys(validation.data.countries.map(country => country.country), 'country');

    this.tables = validation.data;
    console.log(
      `[Reference Data] Loaded ${this.tables.ports.length} ports, ${this.tables.countries.length} countries, ` +
      `${this.tables.hazardRules.length} hazard rules`
    );
    return this.tables;
  }

  private assertUniqueKeys(keys: string[], label: string): void {
    const seen = new Set<string>();
    for (const key of keys) {
      const normalized = key.toLowerCase();
      if (seen.has(normalized)) {
        throw new DataIntegrityError(`Duplicate ${label} in reference data: ${key}`, [key]);
      }
      seen.add(normalized);
    }
  }
}
