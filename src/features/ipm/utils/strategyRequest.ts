// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
import type { GeoLocation, IpmStrategyRequest } from '../../../core/types';

/** Select value standing for "type the name yourself". */
export const CUSTOM_DISEASE = 'custom';

export const resolveDiseaseName = (selected: string, customName: string): string =>
  (selected === CUSTOM_DISEASE ? customName : selected).trim();

/**
 * Strategy request for the planner form, or null when no disease is named.
 * Coordinates are sent only when the device position is known.
 */
export const buildStrategyRequest = (
  selected: string,
  customName: string,
  crop: string,
  location: GeoLocation | null
): IpmStrategyRequest | null => {
  const disease = resolveDiseaseName(selected, customName);
  if (!disease) return null;
  return {
    disease,
    crop,
    ...(location ? { latitude: location.latitude, longitude: location.longitude } : {}),
  };
};
