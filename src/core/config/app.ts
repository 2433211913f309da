// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
import type { GeoLocation } from '../types';

export const APP_TITLE_KEY = 'appName';

/** Backend origin; overridable with VITE_API_URL at build time. */
export const API_BASE_URL: string = import.meta.env.VITE_API_URL || 'http://localhost:8000';

export const LOCAL_STORAGE_LANGUAGE_KEY = 'agriguard-language';

/** Used by the weather view when the browser refuses geolocation. */
export const FALLBACK_LOCATION: GeoLocation = { latitude: 28.6139, longitude: 77.209 };

export const MAX_SPOKEN_CHARS = 500;

export const FORECAST_DAYS = 7;

export const CROPS = [
  'tomato', 'potato', 'corn', 'rice', 'wheat',
  'cotton', 'cucumber', 'pepper', 'grapes', 'apple',
] as const;

export interface DiseasePreset {
  value: string;
  label: string;
  crops: string[];
}

export const COMMON_DISEASES: DiseasePreset[] = [
  { value: 'late_blight', label: 'Late Blight', crops: ['tomato', 'potato'] },
  { value: 'powdery_mildew', label: 'Powdery Mildew', crops: ['cucumber', 'squash', 'grapes'] },
  { value: 'aphids', label: 'Aphid Infestation', crops: ['all'] },
  { value: 'fall_armyworm', label: 'Fall Armyworm', crops: ['corn', 'rice'] },
  { value: 'bacterial_spot', label: 'Bacterial Spot', crops: ['tomato', 'pepper'] },
  { value: 'rust', label: 'Rust Disease', crops: ['wheat', 'corn'] },
  { value: 'downy_mildew', label: 'Downy Mildew', crops: ['grapes', 'cucumber'] },
  { value: 'root_rot', label: 'Root Rot', crops: ['all'] },
];
