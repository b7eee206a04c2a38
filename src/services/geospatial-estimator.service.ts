import { injectable } from 'tsyringe';
import { GeoPoint, LocationRecord } from '../types/domain.types';
import { RouteEstimate, RouteType } from '../types/assessment.types';
import { InvalidLocationError } from '../errors/route-risk.errors';

const EARTH_RADIUS_KM = 6371;
const NOMINAL_SPEED_KMH = 22 * 1.852;   // 22 knots
const DEFAULT_EFFICIENCY = 0.65;
const BASE_PORT_DAYS = 2;

// Cargo buckets match the whole lower-cased goods type, not a substring.
const FAST_CARGO = ['perishables', 'food', 'pharmaceuticals'];
const SLOW_CARGO = ['hazardous', 'chemicals', 'oil', 'gas'];
const HEAVY_CARGO = ['automobiles', 'machinery', 'heavy'];

const DANGEROUS_HANDLING = ['hazardous', 'chemicals'];
const SPECIAL_HANDLING = ['automobiles', 'machinery'];
const STANDARD_HANDLING = ['bulk', 'containers'];

function toRadians(degrees: number): number {
  return degrees * Math.PI / 180;
}

function normalizeGoods(goodsType: string): string {
  return goodsType.trim().toLowerCase();
}

function assertValidPoint(point: GeoPoint, label: string): void {
  const { latitude, longitude } = point;
  if (
    !Number.isFinite(latitude) || !Number.isFinite(longitude) ||
    latitude < -90 || latitude > 90 ||
    longitude < -180 || longitude > 180
  ) {
    throw new InvalidLocationError(`Invalid coordinates for ${label}: (${latitude}, ${longitude})`);
  }
}

/**
 * Great-circle distance and transit-time estimates between two ports.
 */
@injectable()
export class GeospatialEstimatorService {
  /** Haversine distance in kilometres. */
  distance(a: GeoPoint, b: GeoPoint): number {
    assertValidPoint(a, 'first location');
    assertValidPoint(b, 'second location');

    const deltaLat = toRadians(b.latitude - a.latitude);
    const deltaLon = toRadians(b.longitude - a.longitude);
    const h =
      Math.sin(deltaLat / 2) ** 2 +
      Math.cos(toRadians(a.latitude)) * Math.cos(toRadians(b.latitude)) * Math.sin(deltaLon / 2) ** 2;

    return EARTH_RADIUS_KM * 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
  }

  /**
   * Multiplier from great-circle to shipping-lane distance, chosen by region pair.
   */
  routeFactor(regionA: string, regionB: string): number {
    if (regionA === regionB) {
      return 1.1;
    }
    const pairIs = (x: string, y: string) =>
      (regionA.includes(x) && regionB.includes(y)) || (regionA.includes(y) && regionB.includes(x));

    if (pairIs('Asia', 'Europe')) return 1.4;    // Suez or the Cape
    if (pairIs('Asia', 'America')) return 1.3;   // trans-Pacific
    if (pairIs('Europe', 'America')) return 1.2; // trans-Atlantic
    return 1.3;
  }

  speedFactor(goodsType: string): number {
    const goods = normalizeGoods(goodsType);
    if (FAST_CARGO.includes(goods)) return 1.1;
    if (SLOW_CARGO.includes(goods)) return 0.9;
    if (HEAVY_CARGO.includes(goods)) return 0.95;
    return 1.0;
  }

  /**
   * Loading/unloading time for both ends, bounded to 1-4 days.
   */
  portHandlingDays(departure: LocationRecord, destination: LocationRecord, goodsType: string): number {
    const infra = [departure.infrastructure, destination.infrastructure];
    const labor = [departure.laborStability, destination.laborStability];

    let infraFactor = 1.0;
    if (infra.includes('Poor')) {
      infraFactor = 1.5;
    } else if (infra.includes('Fair')) {
      infraFactor = 1.2;
    } else if (infra.every(quality => quality === 'Excellent')) {
      infraFactor = 0.8;
    }

    let laborFactor = 1.0;
    if (labor.includes('Poor')) {
      laborFactor = 1.3;
    } else if (labor.includes('Fair')) {
      laborFactor = 1.1;
    }

    const goods = normalizeGoods(goodsType);
    let cargoFactor = 1.0;
    if (DANGEROUS_HANDLING.includes(goods)) {
      cargoFactor = 1.4;
    } else if (SPECIAL_HANDLING.includes(goods)) {
      cargoFactor = 1.2;
    } else if (STANDARD_HANDLING.includes(goods)) {
      cargoFactor = 0.9;
    }

    const days = Math.floor(BASE_PORT_DAYS * infraFactor * laborFactor * cargoFactor);
    return Math.min(4, Math.max(1, days));
  }

  /**
   * Sailing days at the nominal speed, rounded up, plus port days. Never less than 1.
   */
  estimateDays(
    distanceKm: number,
    routeFactor: number,
    speedFactor: number,
    portDays = 0,
    efficiencyFactor = DEFAULT_EFFICIENCY
  ): number {
    if (!Number.isFinite(distanceKm) || distanceKm < 0) {
      throw new RangeError(`distanceKm must be a non-negative number, got ${distanceKm}`);
    }
    if (!(routeFactor > 0) || !(speedFactor > 0) || !(efficiencyFactor > 0)) {
      throw new RangeError('routeFactor, speedFactor and efficiencyFactor must be positive');
    }
    if (!Number.isFinite(portDays) || portDays < 0) {
      throw new RangeError(`portDays must be a non-negative number, got ${portDays}`);
    }

    const effectiveSpeedKmh = NOMINAL_SPEED_KMH * speedFactor * efficiencyFactor;
    const sailingDays = Math.ceil((distanceKm * routeFactor) / effectiveSpeedKmh / 24);
    return Math.max(1, sailingDays + portDays);
  }

  estimateRoute(departure: LocationRecord, destination: LocationRecord, goodsType: string): RouteEstimate {
    const distanceKm = this.distance(departure.coordinates, destination.coordinates);
    const routeFactor = this.routeFactor(departure.region, destination.region);
    const speedFactor = this.speedFactor(goodsType);
    const portDays = this.portHandlingDays(departure, destination, goodsType);

    return {
      distanceKm: Math.round(distanceKm),
      routeFactor,
      adjustedDistanceKm: Math.round(distanceKm * routeFactor),
      speedFactor,
      portDays,
      transitDays: this.estimateDays(distanceKm, routeFactor, speedFactor, portDays)
    };
  }

  classifyRoute(a: GeoPoint, b: GeoPoint): RouteType {
    const latSpan = Math.abs(a.latitude - b.latitude);
    const lonSpan = Math.abs(a.longitude - b.longitude);

    if (lonSpan > 60) return 'transoceanic';
    if (latSpan < 10 && lonSpan < 30) return 'regional';
    if (Math.max(Math.abs(a.latitude), Math.abs(b.latitude)) > 50) return 'northern_route';
    if (Math.min(a.latitude, b.latitude) < -30) return 'southern_route';
    return 'standard';
  }
}
