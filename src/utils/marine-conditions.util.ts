// Rough sea-state estimates from surface weather. No marine forecast is fetched.
import { PortWeather } from '../types/domain.types';
import { MarineConditions, WeatherSeverity } from '../types/assessment.types';

interface WindBand {
  below: number;        // km/h, exclusive
  waveHeightM: number;
  seaState: string;
}

const WIND_BANDS: WindBand[] = [
  { below: 10, waveHeightM: 0.3, seaState: 'Calm (slight waves)' },
  { below: 20, waveHeightM: 0.8, seaState: 'Smooth (light waves)' },
  { below: 30, waveHeightM: 1.5, seaState: 'Moderate (regular waves)' },
  { below: 40, waveHeightM: 2.5, seaState: 'Rough (larger waves)' },
  { below: 60, waveHeightM: 4.0, seaState: 'Very rough (high waves)' }
];

const STORM_BAND: WindBand = { below: Infinity, waveHeightM: 6.0, seaState: 'Severe (very high waves)' };

function windBand(windSpeedKph: number): WindBand {
  return WIND_BANDS.find(band => windSpeedKph < band.below) ?? STORM_BAND;
}

/** Significant wave height in metres for a wind speed in km/h. */
export function estimateWaveHeight(windSpeedKph: number): number {
  return windBand(windSpeedKph).waveHeightM;
}

export function estimateSeaState(windSpeedKph: number): string {
  return windBand(windSpeedKph).seaState;
}

export function assessWeatherSeverity(weather: PortWeather): WeatherSeverity {
  let points = 0;

  const wind = weather.windSpeedKph;
  if (wind > 60) points += 4;
  else if (wind > 40) points += 3;
  else if (wind > 25) points += 2;
  else if (wind > 15) points += 1;

  const visibility = weather.visibilityKm;
  if (visibility < 1) points += 3;
  else if (visibility < 5) points += 2;
  else if (visibility < 10) points += 1;

  const precipitation = weather.precipitationMm;
  if (precipitation > 20) points += 2;
  else if (precipitation > 5) points += 1;

  if (points >= 7) return 'SEVERE';
  if (points >= 5) return 'HIGH';
  if (points >= 3) return 'MODERATE';
  if (points >= 1) return 'LOW';
  return 'MINIMAL';
}

export function toMarineConditions(weather: PortWeather): MarineConditions {
  const band = windBand(weather.windSpeedKph);
  return {
    ...weather,
    waveHeightM: band.waveHeightM,
    seaState: band.seaState,
    severity: assessWeatherSeverity(weather)
  };
}
