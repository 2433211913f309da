// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
/**
 * Location Slice - manages the device position
 *
 * Responsibilities:
 * - One-shot geolocation lookup at startup
 * - Status tracking; absence of location is never an error for callers
 */

import type { StateCreator } from 'zustand';
import type { GeoLocation, LocationStatus } from '../../core/types';
import type { AgriStore } from '../agriStore';

export interface LocationSlice {
  // State
  location: GeoLocation | null;
  locationStatus: LocationStatus;

  // Actions
  requestLocation: () => void;
}

export const createLocationSlice: StateCreator<
  AgriStore,
  [['zustand/subscribeWithSelector', never], ['zustand/devtools', never]],
  [],
  LocationSlice
> = (set, get) => ({
  // Initial state
  location: null,
  locationStatus: 'idle',

  // Actions
  requestLocation: () => {
    if (get().locationStatus !== 'idle') return;

    const geolocation = typeof navigator !== 'undefined' ? navigator.geolocation : undefined;
    if (!geolocation) {
      console.info('Geolocation is not available in this browser.');
      set({ locationStatus: 'unavailable' });
      return;
    }

    set({ locationStatus: 'pending' });
    geolocation.getCurrentPosition(
      position => {
        set({
          location: { latitude: position.coords.latitude, longitude: position.coords.longitude },
          locationStatus: 'available',
        });
      },
      error => {
        console.info('Location not available:', error.message);
        set({ locationStatus: 'unavailable' });
      }
    );
  },
});
