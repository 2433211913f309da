// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
/**
 * Weather Feature - Public API
 *
 * Current conditions, disease risk, forecast and spray windows for the
 * device position, or the default location when geolocation is refused.
 */

export { default as WeatherDashboard } from './components/WeatherDashboard';
export { loadWeatherSnapshot, resolveWeatherLocation } from './services/weatherSnapshot';
export type { WeatherSnapshot, ResolvedLocation } from './services/weatherSnapshot';
