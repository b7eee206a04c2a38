// Result types for service responses
import { PortWeather } from './domain.types';
import { MitigationPlan } from './mitigation.types';

export enum WeatherFetchStatus {
  SUCCESS = 'SUCCESS',
  NO_DATA_AVAILABLE = 'NO_DATA_AVAILABLE',
  RETRY_EXHAUSTED = 'RETRY_EXHAUSTED',
  FATAL_ERROR = 'FATAL_ERROR'
}

export type WeatherSuccess = {
  readonly status: WeatherFetchStatus.SUCCESS;
  readonly data: PortWeather;
};

export type WeatherFailure =
  | { readonly status: WeatherFetchStatus.NO_DATA_AVAILABLE; readonly error?: string }
  | { readonly status: WeatherFetchStatus.RETRY_EXHAUSTED; readonly error: string }
  | { readonly status: WeatherFetchStatus.FATAL_ERROR; readonly error: string };

export type WeatherResult = WeatherSuccess | WeatherFailure;

/**
 * Outcome of one call to the external risk assessor.
 * The failure variant is returned, never thrown, so the caller can branch to the fallback scorer.
 */
export type AssessorResult =
  | {
      readonly ok: true;
      readonly score: number;
      readonly description: string;
      readonly summary: string;
    }
  | {
      readonly ok: false;
      readonly reason: AssessorFailureReason;
      readonly detail: string;
    };

export type AssessorFailureReason = 'timeout' | 'cancelled' | 'api_error' | 'invalid_response';

/** Outcome of one call to the mitigation advisor; like `AssessorResult`, never thrown. */
export type AdvisorResult =
  | { readonly ok: true; readonly plan: MitigationPlan }
  | { readonly ok: false; readonly reason: AssessorFailureReason; readonly detail: string };

// ============================================================================
// Type Guards
// ============================================================================

export function isWeatherSuccess(result: WeatherResult): result is WeatherSuccess {
  return result.status === WeatherFetchStatus.SUCCESS;
}
