import 'reflect-metadata';
import { OpenMeteoWeatherProvider } from './open-meteo.provider';
import { WeatherFetchStatus } from '../../types/result.types';
import { testConfig } from '../../testing/fixtures';

// Mock global fetch
global.fetch = jest.fn();

const DAY_MS = 24 * 60 * 60 * 1000;

function daysFromNow(days: number): Date {
  return new Date(Date.now() + days * DAY_MS);
}

function jsonResponse(body: unknown, status = 200, statusText = 'OK') {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    json: async () => body
  };
}

const hourly = {
  time: ['T00:00', 'T06:00', 'T12:00', 'T18:00'],
  temperature_2m: [18.0, 20.0, 24.0, 22.0],
  wind_speed_10m: [12.0, 18.5, 32.4, 20.1],
  visibility: [24140, 9000, 15000, null],
  precipitation: [0.0, 1.2, 3.5, 0.4]
};

describe('OpenMeteoWeatherProvider', () => {
  let provider: OpenMeteoWeatherProvider;
  const fetchMock = global.fetch as jest.Mock;

  beforeEach(() => {
    jest.clearAllMocks();
    provider = new OpenMeteoWeatherProvider(testConfig());
  });

  describe('getWeather - Successful responses', () => {
    // Test: Hourly data is reduced to daily figures
    it('should aggregate mean temperature, max wind, min visibility and total precipitation', async () => {
      // Arrange
      fetchMock.mockResolvedValue(jsonResponse({ hourly }));

      // Act
      const result = await provider.getWeather(1.2966, 103.7764, daysFromNow(3));

      // Assert: 9000 m -> 9 km; precipitation 0 + 1.2 + 3.5 + 0.4 = 5.1
      expect(result).toEqual({
        status: WeatherFetchStatus.SUCCESS,
        data: {
          temperature: 21,
          windSpeedKph: 32.4,
          visibilityKm: 9,
          precipitationMm: 5.1
        }
      });
    });

    // Test: Request parameters
    it('should request the forecast for a single UTC day', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ hourly }));
      const date = daysFromNow(1);
      const day = date.toISOString().split('T')[0];

      await provider.getWeather(51.9225, 4.4792, date);

      const url = new URL(fetchMock.mock.calls[0][0]);
      expect(url.origin + url.pathname).toBe('https://api.open-meteo.com/v1/forecast');
      expect(url.searchParams.get('latitude')).toBe('51.9225');
      expect(url.searchParams.get('start_date')).toBe(day);
      expect(url.searchParams.get('end_date')).toBe(day);
      expect(url.searchParams.get('hourly')).toBe('temperature_2m,wind_speed_10m,visibility,precipitation');
    });

    it('should default visibility to 10 km when the series is missing', async () => {
      fetchMock.mockResolvedValue(jsonResponse({
        hourly: { time: ['T00:00'], temperature_2m: [15], wind_speed_10m: [8] }
      }));

      const result = await provider.getWeather(0, 0, daysFromNow(2));

      expect(result).toEqual({
        status: WeatherFetchStatus.SUCCESS,
        data: { temperature: 15, windSpeedKph: 8, visibilityKm: 10, precipitationMm: 0 }
      });
    });
  });

  describe('getWeather - Forecast window', () => {
    // Test: Dates outside the forecast window never call the API
    it('should return NO_DATA_AVAILABLE beyond the forecast horizon without calling API', async () => {
      const result = await provider.getWeather(0, 0, daysFromNow(40));

      expect(result.status).toBe(WeatherFetchStatus.NO_DATA_AVAILABLE);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should return NO_DATA_AVAILABLE for past dates without calling API', async () => {
      const result = await provider.getWeather(0, 0, daysFromNow(-3));

      expect(result.status).toBe(WeatherFetchStatus.NO_DATA_AVAILABLE);
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('getWeather - Missing or null data', () => {
    it('should return NO_DATA_AVAILABLE when hourly data is missing', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ latitude: 0, longitude: 0 }));

      const result = await provider.getWeather(0, 0, daysFromNow(1));

      expect(result).toEqual({
        status: WeatherFetchStatus.NO_DATA_AVAILABLE,
        error: 'No hourly data returned from API'
      });
    });

    it('should return NO_DATA_AVAILABLE when every wind value is null', async () => {
      fetchMock.mockResolvedValue(jsonResponse({
        hourly: { time: ['T00:00', 'T01:00'], temperature_2m: [10, 11], wind_speed_10m: [null, null] }
      }));

      const result = await provider.getWeather(0, 0, daysFromNow(1));

      expect(result.status).toBe(WeatherFetchStatus.NO_DATA_AVAILABLE);
    });

    it('should return FATAL_ERROR when the body has an unexpected shape', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ hourly: { time: 'not-a-list' } }));

      const result = await provider.getWeather(0, 0, daysFromNow(1));

      expect(result.status).toBe(WeatherFetchStatus.FATAL_ERROR);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });
  });

  describe('getWeather - HTTP errors and retry logic', () => {
    // Test: 4xx is not retried
    it('should return FATAL_ERROR for HTTP 400 without retry', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ error: true, reason: 'Invalid latitude' }, 400, 'Bad Request'));

      const result = await provider.getWeather(0, 0, daysFromNow(1));

      expect(result).toEqual({ status: WeatherFetchStatus.FATAL_ERROR, error: 'HTTP 400: Bad Request' });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    // Test: 5xx is retried and may recover
    it('should retry on HTTP 500 and succeed on second attempt', async () => {
      fetchMock
        .mockResolvedValueOnce(jsonResponse({}, 500, 'Internal Server Error'))
        .mockResolvedValueOnce(jsonResponse({ hourly }));

      const result = await provider.getWeather(0, 0, daysFromNow(1));

      expect(result.status).toBe(WeatherFetchStatus.SUCCESS);
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    // Test: Retry budget is maxRetries + 1 attempts
    it('should return RETRY_EXHAUSTED when 429 persists', async () => {
      fetchMock.mockResolvedValue(jsonResponse({}, 429, 'Too Many Requests'));

      const result = await provider.getWeather(0, 0, daysFromNow(1));

      expect(result).toEqual({
        status: WeatherFetchStatus.RETRY_EXHAUSTED,
        error: 'Failed to fetch weather data after 2 attempts: HTTP 429: Too Many Requests'
      });
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('should retry network failures', async () => {
      fetchMock
        .mockRejectedValueOnce(new TypeError('fetch failed'))
        .mockResolvedValueOnce(jsonResponse({ hourly }));

      const result = await provider.getWeather(0, 0, daysFromNow(1));

      expect(result.status).toBe(WeatherFetchStatus.SUCCESS);
    });
  });

  describe('getWeather - Cancellation', () => {
    // Test: An aborted caller signal rejects instead of producing a result
    it('should reject when the caller signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort(new Error('client went away'));

      await expect(provider.getWeather(0, 0, daysFromNow(1), controller.signal)).rejects.toThrow('client went away');
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });
});
