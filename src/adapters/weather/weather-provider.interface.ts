import { WeatherResult } from '../../types/result.types';

export interface IWeatherProvider {
  /**
   * Daily weather at a point for a calendar date (UTC).
   * Rejects only when `signal` is aborted; every other failure is a WeatherResult variant.
   */
  getWeather(
    latitude: number,
    longitude: number,
    date: Date,
    signal?: AbortSignal
  ): Promise<WeatherResult>;
}
