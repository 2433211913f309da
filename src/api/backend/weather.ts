// Copyright 2025 Roni Tervo
//
// SPDX-License-Identifier: Apache-2.0
import type {
  CurrentWeather,
  DiseaseRiskReport,
  Envelope,
  SprayWindowReport,
  WeatherForecast,
} from '../../core/types';
import { FORECAST_DAYS } from '../../core/config/app';
import { backendClient, tracked } from './client';

const getEnvelope = async <T>(type: string, path: string, params: Record<string, number>): Promise<T> =>
  tracked(type, `GET ${path}`, params, async () => {
    const response = await backendClient.get<Envelope<T>>(path, { params });
    return response.data.data;
  });

export const weatherApi = {
  getCurrentWeather(latitude: number, longitude: number): Promise<CurrentWeather> {
    return getEnvelope('weather.current', '/weather/current', { latitude, longitude });
  },

  getDiseaseRisk(latitude: number, longitude: number): Promise<DiseaseRiskReport> {
    return getEnvelope('weather.diseaseRisk', '/weather/disease-risk', { latitude, longitude });
  },

  getForecast(latitude: number, longitude: number, days: number = FORECAST_DAYS): Promise<WeatherForecast> {
    return getEnvelope('weather.forecast', '/weather/forecast', { latitude, longitude, days });
  },

  getSprayWindows(latitude: number, longitude: number): Promise<SprayWindowReport> {
    return getEnvelope('weather.sprayWindows', '/weather/spray-windows', { latitude, longitude });
  },
};
