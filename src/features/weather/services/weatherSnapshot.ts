// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
import { apiService } from '../../../api/backend';
import { FALLBACK_LOCATION } from '../../../core/config/app';
import type {
  CurrentWeather,
  DiseaseRisk,
  ForecastDay,
  GeoLocation,
  LocationStatus,
  SprayWindow,
} from '../../../core/types';

/** Level shown when the backend leaves a risk field out. */
export const UNKNOWN_LEVEL = 'unknown';

export interface WeatherSnapshot {
  weather: Partial<CurrentWeather>;
  risks: DiseaseRisk;
  sprayWindows: SprayWindow[];
  totalGoodDays: number;
  /** Empty when the forecast request fails; the other panels still render. */
  forecast: ForecastDay[];
}

export interface ResolvedLocation {
  location: GeoLocation;
  isFallback: boolean;
}

/**
 * Position to query weather for, or null while the lookup is still running.
 * A refused or missing geolocation falls back to the default location.
 */
export const resolveWeatherLocation = (
  location: GeoLocation | null,
  status: LocationStatus
): ResolvedLocation | null => {
  if (location) return { location, isFallback: false };
  if (status === 'unavailable') return { location: FALLBACK_LOCATION, isFallback: true };
  return null;
};

const levelOr = (value: unknown): string => (typeof value === 'string' && value ? value : UNKNOWN_LEVEL);

const stringsOf = (value: unknown): string[] =>
  Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];

/** Fills every field the dashboard reads, so a partial risk payload still renders. */
export const normalizeDiseaseRisk = (risks: Partial<DiseaseRisk> | null | undefined): DiseaseRisk => ({
  fungal_disease_risk: levelOr(risks?.fungal_disease_risk),
  bacterial_disease_risk: levelOr(risks?.bacterial_disease_risk),
  pest_activity_risk: levelOr(risks?.pest_activity_risk),
  spray_conditions: levelOr(risks?.spray_conditions),
  overall_risk_level: levelOr(risks?.overall_risk_level),
  overall_risk_score:
    typeof risks?.overall_risk_score === 'number' && Number.isFinite(risks.overall_risk_score)
      ? risks.overall_risk_score
      : 0,
  alerts: stringsOf(risks?.alerts),
  recommendations: stringsOf(risks?.recommendations),
});

/** Drops windows without a date and fills the quality and time labels. */
export const normalizeSprayWindows = (windows: Array<Partial<SprayWindow>> | null | undefined): SprayWindow[] =>
  (Array.isArray(windows) ? windows : []).flatMap(entry =>
    typeof entry.date === 'string'
      ? [{
          date: entry.date,
          quality: levelOr(entry.quality),
          recommended_time: typeof entry.recommended_time === 'string' ? entry.recommended_time : '',
          conditions: entry.conditions ?? { wind_speed: 0, precipitation: 0, humidity: 0 },
        }]
      : []
  );

const loadForecast = (latitude: number, longitude: number): Promise<ForecastDay[]> =>
  apiService.getForecast(latitude, longitude).then(
    response =>
      (Array.isArray(response?.forecast) ? response.forecast : []).filter(day => typeof day?.date === 'string'),
    (error: unknown) => {
      console.warn('Forecast unavailable:', error);
      return [];
    }
  );

/**
 * Loads every panel of the weather view in parallel. Current weather, risk
 * and spray windows are required; the forecast strip is optional.
 */
export const loadWeatherSnapshot = async ({ latitude, longitude }: GeoLocation): Promise<WeatherSnapshot> => {
  const [weather, riskReport, sprayReport, forecast] = await Promise.all([
    apiService.getCurrentWeather(latitude, longitude),
    apiService.getDiseaseRisk(latitude, longitude),
    apiService.getSprayWindows(latitude, longitude),
    loadForecast(latitude, longitude),
  ]);

  const sprayWindows = normalizeSprayWindows(sprayReport?.optimal_windows);
  return {
    weather: weather ?? {},
    risks: normalizeDiseaseRisk(riskReport?.risks),
    sprayWindows,
    totalGoodDays: typeof sprayReport?.total_good_days === 'number' ? sprayReport.total_good_days : sprayWindows.length,
    forecast,
  };
};
