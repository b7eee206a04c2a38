import { inject, injectable } from 'tsyringe';
import { LocationRecord } from '../types/domain.types';
import { RouteAnalysis } from '../types/assessment.types';
import { ReferenceDataStore } from './reference-data-store.service';
import { GeospatialEstimatorService } from './geospatial-estimator.service';

const ICE_COUNTRIES = ['Russia', 'Canada'];

/**
 * Route context for a resolved port pair: hazards, lanes, alternatives and seasonal factors.
 */
@injectable()
export class RouteAnalysisService {
  constructor(
    @inject(ReferenceDataStore) private readonly store: ReferenceDataStore,
    @inject(GeospatialEstimatorService) private readonly estimator: GeospatialEstimatorService
  ) {}

  analyze(
    departure: LocationRecord,
    destination: LocationRecord,
    goodsType: string,
    departureDate: Date
  ): RouteAnalysis {
    const chokepoints = this.store.chokepointsFor(departure, destination);

    return {
      departureCountry: departure.country,
      destinationCountry: destination.country,
      routeType: this.estimator.classifyRoute(departure.coordinates, destination.coordinates),
      chokepoints,
      securityZones: this.store.securityZonesFor(departure, destination),
      shippingLanes: this.shippingLanes(departure, destination),
      alternativeRoutes: this.alternativeRoutes(chokepoints),
      seasonalFactors: this.seasonalFactors(departure, destination, departureDate),
      goodsSpecificRisks: this.goodsRisks(goodsType, chokepoints)
    };
  }

  shippingLanes(departure: LocationRecord, destination: LocationRecord): string {
    const from = departure.region;
    const to = destination.region;

    if (from.includes('Europe') && to.includes('Asia')) return 'Europe-Asia main line (via Suez Canal)';
    if (from.includes('America') && to.includes('Asia')) return 'Trans-Pacific main line';
    if (from.includes('America') && to.includes('Europe')) return 'Trans-Atlantic main line';
    return 'Regional feeder routes';
  }

  alternativeRoutes(chokepoints: readonly string[]): string {
    const alternatives: string[] = [];
    if (chokepoints.includes('Suez Canal')) alternatives.push('Cape of Good Hope (adds ~2 weeks)');
    if (chokepoints.includes('Panama Canal')) alternatives.push('Cape Horn or US land bridge');
    if (chokepoints.includes('Strait of Malacca')) alternatives.push('Lombok Strait or Sunda Strait');

    return alternatives.length > 0 ? alternatives.join('; ') : 'Limited alternative routes';
  }

  // Month is taken from the departure date in UTC
  seasonalFactors(departure: LocationRecord, destination: LocationRecord, departureDate: Date): string {
    const month = departureDate.getUTCMonth() + 1;
    const factors: string[] = [];

    if (month >= 6 && month <= 9 && departure.region.includes('Asia')) {
      factors.push('Monsoon season in Asia');
    }
    if (month >= 6 && month <= 11 && departure.region.includes('America')) {
      factors.push('Hurricane season in Atlantic/Pacific');
    }
    if ([12, 1, 2, 3].includes(month) &&
        (ICE_COUNTRIES.includes(departure.country) || ICE_COUNTRIES.includes(destination.country))) {
      factors.push('Winter ice conditions in northern routes');
    }

    return factors.length > 0 ? factors.join('; ') : 'No significant seasonal factors';
  }

  goodsRisks(goodsType: string, chokepoints: readonly string[]): string {
    const goods = goodsType.trim().toLowerCase();
    const risks: string[] = [];

    if (['electronics', 'technology'].includes(goods) && chokepoints.includes('South China Sea')) {
      risks.push('Technology transfer scrutiny in disputed waters');
    }
    if (['energy', 'oil', 'gas'].includes(goods) && chokepoints.includes('Strait of Hormuz')) {
      risks.push('Energy chokepoint vulnerability');
    }
    if (['food', 'agriculture'].includes(goods)) {
      risks.push('Temperature-sensitive cargo considerations');
    }

    return risks.length > 0 ? risks.join('; ') : 'Standard cargo handling protocols';
  }
}
