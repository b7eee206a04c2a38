import { RouteIntelligence } from '../types/domain.types';

export interface INewsIntelligence {
  gather(
    departureCountry: string,
    destinationCountry: string,
    chokepoints: readonly string[],
    goodsType: string,
    signal?: AbortSignal
  ): Promise<RouteIntelligence>;
  healthCheck(): Promise<string>;
}
