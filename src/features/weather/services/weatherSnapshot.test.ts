// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
import { afterEach, describe, expect, it, vi } from 'vitest';
import { apiService } from '../../../api/backend';
import type { CurrentWeather, DiseaseRisk } from '../../../core/types';
import {
  loadWeatherSnapshot,
  normalizeDiseaseRisk,
  normalizeSprayWindows,
  resolveWeatherLocation,
} from './weatherSnapshot';

const weather: CurrentWeather = {
  temperature: 24,
  humidity: 88,
  wind_speed: 6,
  precipitation: 0.4,
  condition: 'Light rain',
};

const risks: DiseaseRisk = {
  fungal_disease_risk: 'high',
  bacterial_disease_risk: 'medium',
  pest_activity_risk: 'low',
  spray_conditions: 'good',
  overall_risk_level: 'high',
  overall_risk_score: 62,
  alerts: ['High humidity'],
  recommendations: ['Scout lower leaves'],
};

describe('resolveWeatherLocation', () => {
  it('uses the device position when one is known', () => {
    expect(resolveWeatherLocation({ latitude: 10, longitude: 20 }, 'available')).toEqual({
      location: { latitude: 10, longitude: 20 },
      isFallback: false,
    });
  });

  it('waits while the lookup is pending', () => {
    expect(resolveWeatherLocation(null, 'idle')).toBeNull();
    expect(resolveWeatherLocation(null, 'pending')).toBeNull();
  });

  it('falls back to the default location when geolocation is refused', () => {
    expect(resolveWeatherLocation(null, 'unavailable')).toEqual({
      location: { latitude: 28.6139, longitude: 77.209 },
      isFallback: true,
    });
  });
});

describe('loadWeatherSnapshot', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('queries every weather endpoint for the same position', async () => {
    const current = vi.spyOn(apiService, 'getCurrentWeather').mockResolvedValue(weather);
    const risk = vi.spyOn(apiService, 'getDiseaseRisk').mockResolvedValue({ weather, risks });
    const spray = vi.spyOn(apiService, 'getSprayWindows').mockResolvedValue({
      optimal_windows: [
        {
          date: '2026-10-20',
          quality: 'excellent',
          recommended_time: 'early_morning',
          conditions: { wind_speed: 5, precipitation: 0, humidity: 60 },
        },
      ],
      total_good_days: 3,
    });
    const forecast = vi.spyOn(apiService, 'getForecast').mockResolvedValue({
      forecast: [{ date: '2026-10-20', temp_max: 30, temp_min: 18 }],
    });

    const snapshot = await loadWeatherSnapshot({ latitude: 12.5, longitude: 77.25 });

    expect(current).toHaveBeenCalledWith(12.5, 77.25);
    expect(risk).toHaveBeenCalledWith(12.5, 77.25);
    expect(spray).toHaveBeenCalledWith(12.5, 77.25);
    expect(forecast).toHaveBeenCalledWith(12.5, 77.25);
    expect(snapshot.weather).toBe(weather);
    expect(snapshot.risks).toEqual(risks);
    expect(snapshot.sprayWindows).toHaveLength(1);
    expect(snapshot.totalGoodDays).toBe(3);
    expect(snapshot.forecast).toEqual([{ date: '2026-10-20', temp_max: 30, temp_min: 18 }]);
  });

  it('counts spray windows when the backend omits the total', async () => {
    vi.spyOn(apiService, 'getCurrentWeather').mockResolvedValue(weather);
    vi.spyOn(apiService, 'getDiseaseRisk').mockResolvedValue({ weather, risks });
    vi.spyOn(apiService, 'getSprayWindows').mockResolvedValue({ optimal_windows: [] });
    vi.spyOn(apiService, 'getForecast').mockResolvedValue({ forecast: [] });

    const snapshot = await loadWeatherSnapshot({ latitude: 1, longitude: 2 });

    expect(snapshot.totalGoodDays).toBe(0);
    expect(snapshot.sprayWindows).toEqual([]);
  });

  it('rejects when any endpoint fails', async () => {
    vi.spyOn(apiService, 'getCurrentWeather').mockResolvedValue(weather);
    vi.spyOn(apiService, 'getDiseaseRisk').mockRejectedValue(new Error('Network Error'));
    vi.spyOn(apiService, 'getSprayWindows').mockResolvedValue({ optimal_windows: [] });
    vi.spyOn(apiService, 'getForecast').mockResolvedValue({ forecast: [] });

    await expect(loadWeatherSnapshot({ latitude: 1, longitude: 2 })).rejects.toThrow('Network Error');
  });

  it('keeps the other panels when only the forecast fails', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(apiService, 'getCurrentWeather').mockResolvedValue(weather);
    vi.spyOn(apiService, 'getDiseaseRisk').mockResolvedValue({ weather, risks });
    vi.spyOn(apiService, 'getSprayWindows').mockResolvedValue({ optimal_windows: [], total_good_days: 0 });
    const failure = new Error('forecast 500');
    vi.spyOn(apiService, 'getForecast').mockRejectedValue(failure);

    const snapshot = await loadWeatherSnapshot({ latitude: 1, longitude: 2 });

    expect(snapshot.forecast).toEqual([]);
    expect(snapshot.weather).toBe(weather);
    expect(snapshot.risks).toEqual(risks);
    expect(warn).toHaveBeenCalledWith('Forecast unavailable:', failure);
  });
});

describe('normalizeDiseaseRisk', () => {
  it('fills placeholders for a partial risk payload', () => {
    expect(normalizeDiseaseRisk({ overall_risk_level: 'high', alerts: ['Frost tonight'] })).toEqual({
      fungal_disease_risk: 'unknown',
      bacterial_disease_risk: 'unknown',
      pest_activity_risk: 'unknown',
      spray_conditions: 'unknown',
      overall_risk_level: 'high',
      overall_risk_score: 0,
      alerts: ['Frost tonight'],
      recommendations: [],
    });
  });

  it('returns a complete placeholder report when risks are missing', () => {
    const normalized = normalizeDiseaseRisk(undefined);
    expect(normalized.overall_risk_level).toBe('unknown');
    expect(normalized.alerts).toEqual([]);
    expect(normalized.recommendations).toEqual([]);
  });

  it('keeps a complete payload unchanged', () => {
    expect(normalizeDiseaseRisk(risks)).toEqual(risks);
  });
});

describe('normalizeSprayWindows', () => {
  it('drops windows without a date and fills missing labels', () => {
    expect(normalizeSprayWindows([{ quality: 'good' }, { date: '2026-10-21' }])).toEqual([
      {
        date: '2026-10-21',
        quality: 'unknown',
        recommended_time: '',
        conditions: { wind_speed: 0, precipitation: 0, humidity: 0 },
      },
    ]);
  });

  it('returns an empty list for a missing payload', () => {
    expect(normalizeSprayWindows(undefined)).toEqual([]);
  });
});
