// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
import React, { useEffect } from 'react';
import { useShallow } from 'zustand/react/shallow';
import {
  AlertCircle,
  AlertTriangle,
  Bug,
  Calendar,
  CheckCircle,
  Cloud,
  Droplets,
  Leaf,
  Loader2,
  MapPin,
  RefreshCw,
  Thermometer,
  Wind,
} from 'lucide-react';
import { useAgriStore } from '../../../store';
import type { TranslationFunction } from '../../../core/i18n';
import type { DiseaseRisk, ForecastDay, SprayWindow } from '../../../core/types';
import { useLanguage } from '../../session/hooks/useLanguage';
import { useRequest } from '../../../shared/hooks/useRequest';
import { formatMeasure, getLevelClasses, humanize } from '../../../shared/utils/common';
import { loadWeatherSnapshot, resolveWeatherLocation } from '../services/weatherSnapshot';

const MAX_SPRAY_WINDOWS = 5;

const formatDay = (date: string, language: string): string => {
  const parsed = new Date(date);
  if (Number.isNaN(parsed.getTime())) return date;
  return parsed.toLocaleDateString(language, { weekday: 'short', month: 'short', day: 'numeric' });
};

const RiskCard: React.FC<{ label: string; level: string; icon: React.ReactNode }> = ({ label, level, icon }) => (
  <div className={`p-4 rounded-xl ${getLevelClasses(level)}`}>
    <div className="flex items-center gap-2 mb-1">
      {icon}
      <span className="text-sm font-medium">{label}</span>
    </div>
    <p className="text-lg font-bold">{humanize(level)}</p>
  </div>
);

const RiskPanel: React.FC<{ risks: DiseaseRisk; t: TranslationFunction }> = ({ risks, t }) => {
  const score = Math.max(0, Math.min(100, risks.overall_risk_score));
  return (
    <div className="bg-white rounded-2xl border border-gray-200 p-6 shadow-sm">
      <h2 className="text-lg font-semibold text-gray-800 mb-4 flex items-center gap-2">
        <AlertTriangle className="w-5 h-5 text-orange-500" />
        {t('diseaseRiskTitle')}
      </h2>

      <div className="mb-6">
        <div className="flex justify-between items-center mb-2">
          <span className="text-gray-600">{t('overallRisk')}</span>
          <span className={`px-3 py-1 rounded-full text-sm font-medium ${getLevelClasses(risks.overall_risk_level)}`}>
            {risks.overall_risk_level.toUpperCase()}
          </span>
        </div>
        <div className="w-full bg-gray-200 rounded-full h-3">
          <div className="h-3 rounded-full bg-gradient-to-r from-green-500 via-yellow-500 to-red-500" style={{ width: `${score}%` }} />
        </div>
        <p className="text-xs text-gray-500 mt-1">{t('riskScore')}: {score}/100</p>
      </div>

      <div className="grid grid-cols-2 gap-4">
        <RiskCard label={t('fungalDisease')} level={risks.fungal_disease_risk} icon={<Leaf className="w-4 h-4" />} />
        <RiskCard label={t('bacterialRisk')} level={risks.bacterial_disease_risk} icon={<AlertCircle className="w-4 h-4" />} />
        <RiskCard label={t('pestActivity')} level={risks.pest_activity_risk} icon={<Bug className="w-4 h-4" />} />
        <RiskCard label={t('sprayConditions')} level={risks.spray_conditions} icon={<Droplets className="w-4 h-4" />} />
      </div>

      {risks.alerts.length > 0 && (
        <div className="mt-6">
          <h3 className="font-medium text-gray-800 mb-2 flex items-center gap-2">
            <AlertTriangle className="w-4 h-4 text-red-500" />
            {t('alerts')}
          </h3>
          <ul className="space-y-2">
            {risks.alerts.map((alert, idx) => (
              <li key={idx} className="p-3 bg-red-50 text-red-700 rounded-lg text-sm">{alert}</li>
            ))}
          </ul>
        </div>
      )}

      {risks.recommendations.length > 0 && (
        <div className="mt-6">
          <h3 className="font-medium text-gray-800 mb-2 flex items-center gap-2">
            <CheckCircle className="w-4 h-4 text-green-500" />
            {t('recommendations')}
          </h3>
          <ul className="space-y-2">
            {risks.recommendations.map((rec, idx) => (
              <li key={idx} className="p-3 bg-green-50 text-green-700 rounded-lg text-sm">{rec}</li>
            ))}
          </ul>
        </div>
      )}
    </div>
  );
};

const SprayWindowList: React.FC<{ windows: SprayWindow[]; totalGoodDays: number; language: string; t: TranslationFunction }> = ({
  windows,
  totalGoodDays,
  language,
  t,
}) => (
  <div className="bg-white rounded-2xl border border-gray-200 p-6 shadow-sm">
    <div className="flex items-center justify-between mb-4">
      <h2 className="text-lg font-semibold text-gray-800 flex items-center gap-2">
        <Calendar className="w-5 h-5 text-blue-500" />
        {t('sprayWindows')}
      </h2>
      <span className="text-sm text-gray-500">{t('goodDays', { count: totalGoodDays })}</span>
    </div>
    {windows.length > 0 ? (
      <div className="space-y-3">
        {windows.slice(0, MAX_SPRAY_WINDOWS).map(window => (
          <div key={window.date} className="flex items-center justify-between p-3 bg-gray-50 rounded-lg">
            <div>
              <p className="font-medium text-gray-800">{formatDay(window.date, language)}</p>
              {window.recommended_time && (
                <p className="text-sm text-gray-500">
                  {t('recommendedTime')}: {humanize(window.recommended_time)}
                </p>
              )}
            </div>
            <span className={`px-3 py-1 rounded-full text-sm font-medium ${getLevelClasses(window.quality)}`}>
              {humanize(window.quality)}
            </span>
          </div>
        ))}
      </div>
    ) : (
      <p className="text-gray-500 text-center py-4">{t('noSprayWindows')}</p>
    )}
  </div>
);

const ForecastStrip: React.FC<{ days: ForecastDay[]; language: string; t: TranslationFunction }> = ({ days, language, t }) => (
  <div className="bg-white rounded-2xl border border-gray-200 p-6 shadow-sm">
    <h2 className="text-lg font-semibold text-gray-800 mb-4 flex items-center gap-2">
      <Thermometer className="w-5 h-5 text-red-400" />
      {t('forecast')}
    </h2>
    <div className="grid grid-cols-2 sm:grid-cols-4 md:grid-cols-7 gap-2">
      {days.map(day => (
        <div key={day.date} className="p-3 bg-gray-50 rounded-lg text-center">
          <p className="text-xs text-gray-500">{formatDay(day.date, language)}</p>
          <p className="font-semibold text-gray-800 mt-1">
            {formatMeasure(day.temp_max, '°')}
            <span className="text-gray-400 font-normal">
              {' / '}{formatMeasure(day.temp_min, '°')}
            </span>
          </p>
          {day.precipitation !== undefined && (
            <p className="text-xs text-blue-600 mt-1">{day.precipitation} mm</p>
          )}
        </div>
      ))}
    </div>
  </div>
);

const WeatherDashboard: React.FC = () => {
  const { t, language } = useLanguage();
  const { location, locationStatus } = useAgriStore(
    useShallow(state => ({ location: state.location, locationStatus: state.locationStatus }))
  );
  const snapshot = useRequest(loadWeatherSnapshot, 'Weather snapshot');
  const { run } = snapshot;

  const resolved = resolveWeatherLocation(location, locationStatus);
  const latitude = resolved?.location.latitude;
  const longitude = resolved?.location.longitude;

  useEffect(() => {
    if (latitude === undefined || longitude === undefined) return;
    run({ latitude, longitude });
  }, [latitude, longitude, run]);

  const refresh = () => {
    if (resolved) run(resolved.location);
  };

  const { state } = snapshot;
  const data = state.status === 'success' || state.status === 'pending' ? state.data : undefined;

  if (!resolved || (state.status === 'pending' && !data) || state.status === 'idle') {
    return (
      <div className="flex items-center justify-center h-full">
        <div className="text-center">
          <Loader2 className="w-10 h-10 animate-spin text-green-600 mx-auto" />
          <p className="mt-4 text-gray-600">{t('loadingWeather')}</p>
        </div>
      </div>
    );
  }

  if (state.status === 'error' || !data) {
    return (
      <div className="p-6">
        <div className="max-w-md mx-auto p-6 bg-red-50 border border-red-200 rounded-xl text-center">
          <AlertCircle className="w-12 h-12 text-red-500 mx-auto" />
          <p className="mt-4 text-red-700">{t('failedWeather')}</p>
          <button
            onClick={refresh}
            className="mt-4 px-4 py-2 bg-red-600 text-white rounded-lg hover:bg-red-700"
          >
            {t('tryAgain')}
          </button>
        </div>
      </div>
    );
  }

  const { weather, risks, sprayWindows, totalGoodDays, forecast } = data;
  const isRefreshing = state.status === 'pending';

  return (
    <div className="p-6 h-full overflow-y-auto">
      <div className="max-w-4xl mx-auto space-y-6">
        <div className="flex items-center justify-between">
          <div className="flex items-center gap-2 text-gray-600">
            <MapPin className="w-5 h-5" />
            <span>
              {resolved.location.latitude.toFixed(4)}, {resolved.location.longitude.toFixed(4)}
            </span>
            {resolved.isFallback && (
              <span className="text-xs text-gray-400">({t('defaultLocation')})</span>
            )}
          </div>
          <button
            onClick={refresh}
            disabled={isRefreshing}
            className="flex items-center gap-2 px-4 py-2 bg-white border border-gray-200 rounded-lg hover:bg-gray-50 disabled:opacity-50"
            title={t('refreshWeather')}
          >
            <RefreshCw className={`w-4 h-4 ${isRefreshing ? 'animate-spin' : ''}`} />
            {t('refreshWeather')}
          </button>
        </div>

        <div className="bg-gradient-to-br from-blue-500 to-blue-600 rounded-2xl p-6 text-white">
          <h2 className="text-lg font-medium opacity-90">{t('currentWeather')}</h2>
          <div className="flex items-center justify-between mt-4">
            <div>
              <p className="text-5xl font-bold">{formatMeasure(weather.temperature, '°C')}</p>
              <p className="text-xl mt-2 opacity-90">{weather.condition || '-'}</p>
            </div>
            <Cloud className="w-20 h-20 opacity-80" />
          </div>
          <div className="grid grid-cols-3 gap-4 mt-6">
            <div className="flex items-center gap-2">
              <Droplets className="w-5 h-5 opacity-80" />
              <div>
                <p className="text-sm opacity-80">{t('humidity')}</p>
                <p className="font-semibold">{formatMeasure(weather.humidity, '%')}</p>
              </div>
            </div>
            <div className="flex items-center gap-2">
              <Wind className="w-5 h-5 opacity-80" />
              <div>
                <p className="text-sm opacity-80">{t('wind')}</p>
                <p className="font-semibold">{formatMeasure(weather.wind_speed, ' km/h', 1)}</p>
              </div>
            </div>
            <div className="flex items-center gap-2">
              <Cloud className="w-5 h-5 opacity-80" />
              <div>
                <p className="text-sm opacity-80">{t('rain')}</p>
                <p className="font-semibold">{formatMeasure(weather.precipitation, ' mm', 1)}</p>
              </div>
            </div>
          </div>
        </div>

        <RiskPanel risks={risks} t={t} />

        {forecast.length > 0 && <ForecastStrip days={forecast} language={language} t={t} />}

        <SprayWindowList windows={sprayWindows} totalGoodDays={totalGoodDays} language={language} t={t} />
      </div>
    </div>
  );
};

export default WeatherDashboard;
