import { inject, injectable } from 'tsyringe';
import { z } from 'zod';
import { WeatherFetchStatus, WeatherResult } from '../../types/result.types';
import { PortWeather } from '../../types/domain.types';
import { AppConfig } from '../../config/app.config';
import {
  HttpError,
  isHttpRetryable,
  isNetworkError,
  retryWithBackoff,
  RetryExhaustedError
} from '../../utils/retry.util';
import { IWeatherProvider } from './weather-provider.interface';

const DAY_MS = 24 * 60 * 60 * 1000;
const DEFAULT_VISIBILITY_KM = 10;

const hourlySeries = z.array(z.number().nullable());

const OpenMeteoForecastSchema = z.object({
  hourly: z.object({
    time: z.array(z.string()),
    temperature_2m: hourlySeries,
    wind_speed_10m: hourlySeries,
    visibility: hourlySeries.optional(),     // metres
    precipitation: hourlySeries.optional()   // mm
  }).optional(),
  error: z.boolean().optional(),
  reason: z.string().optional()
});

type OpenMeteoForecast = z.infer<typeof OpenMeteoForecastSchema>;

function toIsoDay(date: Date): string {
  return date.toISOString().split('T')[0];
}

function startOfUtcDay(date: Date): number {
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

function present(values: readonly (number | null)[] | undefined): number[] {
  return (values ?? []).filter((value): value is number => value !== null);
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Forecast weather from Open-Meteo, reduced to one daily figure per variable:
 * mean temperature, max wind, min visibility and total precipitation.
 */
@injectable()
export class OpenMeteoWeatherProvider implements IWeatherProvider {
  constructor(@inject('AppConfig') private readonly config: AppConfig) {}

  async getWeather(
    latitude: number,
    longitude: number,
    date: Date,
    signal?: AbortSignal
  ): Promise<WeatherResult> {
    const day = toIsoDay(date);
    const offsetDays = Math.round((startOfUtcDay(date) - startOfUtcDay(new Date())) / DAY_MS);

    if (offsetDays < 0) {
      return {
        status: WeatherFetchStatus.NO_DATA_AVAILABLE,
        error: `Forecast API does not cover past dates. Requested date ${day} is in the past.`
      };
    }
    if (offsetDays >= this.config.weather.forecastHorizonDays) {
      return {
        status: WeatherFetchStatus.NO_DATA_AVAILABLE,
        error: `Requested date ${day} is beyond the ${this.config.weather.forecastHorizonDays}-day forecast horizon.`
      };
    }

    try {
      const forecast = await retryWithBackoff(
        () => this.fetchForecast(latitude, longitude, day, signal),
        this.config.retry,
        (error) => this.isRetryableError(error),
        signal
      );

      return this.summarize(forecast);
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }

      if (error instanceof RetryExhaustedError) {
        return {
          status: WeatherFetchStatus.RETRY_EXHAUSTED,
          error: `Failed to fetch weather data after ${error.attempts} attempts: ${error.lastError.message}`
        };
      }

      return {
        status: WeatherFetchStatus.FATAL_ERROR,
        error: error instanceof Error ? error.message : String(error)
      };
    }
  }

  private async fetchForecast(
    latitude: number,
    longitude: number,
    day: string,
    signal?: AbortSignal
  ): Promise<OpenMeteoForecast> {
    const url = new URL(this.config.weather.baseUrl);

    url.searchParams.set('latitude', latitude.toString());
    url.searchParams.set('longitude', longitude.toString());
    url.searchParams.set('start_date', day);
    url.searchParams.set('end_date', day);
    url.searchParams.set('hourly', 'temperature_2m,wind_speed_10m,visibility,precipitation');
    url.searchParams.set('wind_speed_unit', 'kmh');
    url.searchParams.set('timezone', 'UTC');

    // Per-attempt timeout, still cancelled by the caller
    const timeout = AbortSignal.timeout(this.config.weather.timeoutMs);
    const response = await fetch(url.toString(), {
      signal: signal ? AbortSignal.any([signal, timeout]) : timeout
    });

    if (!response.ok) {
      throw new HttpError(`HTTP ${response.status}: ${response.statusText}`, response.status);
    }

    const parsed = OpenMeteoForecastSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Unexpected Open-Meteo response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
    }
    if (parsed.data.error === true) {
      throw new Error(`Open-Meteo API error: ${parsed.data.reason ?? 'Unknown error'}`);
    }

    return parsed.data;
  }

  private summarize(forecast: OpenMeteoForecast): WeatherResult {
    const hourly = forecast.hourly;
    if (!hourly || hourly.time.length === 0) {
      return {
        status: WeatherFetchStatus.NO_DATA_AVAILABLE,
        error: 'No hourly data returned from API'
      };
    }

    const temperatures = present(hourly.temperature_2m);
    const winds = present(hourly.wind_speed_10m);
    if (temperatures.length === 0 || winds.length === 0) {
      return {
        status: WeatherFetchStatus.NO_DATA_AVAILABLE,
        error: 'Temperature or wind speed data is null for every hour'
      };
    }

    const visibilities = present(hourly.visibility);
    const precipitation = present(hourly.precipitation);

    const weather: PortWeather = {
      temperature: round1(temperatures.reduce((sum, t) => sum + t, 0) / temperatures.length),
      windSpeedKph: round1(Math.max(...winds)),
      visibilityKm: visibilities.length > 0 ? round1(Math.min(...visibilities) / 1000) : DEFAULT_VISIBILITY_KM,
      precipitationMm: round1(precipitation.reduce((sum, p) => sum + p, 0))
    };

    return { status: WeatherFetchStatus.SUCCESS, data: weather };
  }

  private isRetryableError(error: Error): boolean {
    if (error instanceof HttpError) {
      return isHttpRetryable(error.statusCode);
    }
    // Covers fetch failures and per-attempt timeouts
    return isNetworkError(error) || error.name === 'TimeoutError';
  }
}
