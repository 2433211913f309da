// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { useAgriStore } from '../agriStore';

const initialState = useAgriStore.getState();

describe('locationSlice', () => {
  beforeEach(() => {
    useAgriStore.setState(initialState, true);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('stores the position reported by the browser', () => {
    const getCurrentPosition = vi.fn((onSuccess: (position: { coords: { latitude: number; longitude: number } }) => void) => {
      onSuccess({ coords: { latitude: 19.07, longitude: 72.87 } });
    });
    vi.stubGlobal('navigator', { geolocation: { getCurrentPosition } });

    useAgriStore.getState().requestLocation();
    useAgriStore.getState().requestLocation();

    expect(getCurrentPosition).toHaveBeenCalledTimes(1);
    expect(useAgriStore.getState().location).toEqual({ latitude: 19.07, longitude: 72.87 });
    expect(useAgriStore.getState().locationStatus).toBe('available');
  });

  it('marks location unavailable when permission is denied', () => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.stubGlobal('navigator', {
      geolocation: {
        getCurrentPosition: (_onSuccess: unknown, onError: (error: { message: string }) => void) => {
          onError({ message: 'User denied Geolocation' });
        },
      },
    });

    useAgriStore.getState().requestLocation();

    expect(useAgriStore.getState().location).toBeNull();
    expect(useAgriStore.getState().locationStatus).toBe('unavailable');
  });

  it('marks location unavailable when the browser has no geolocation', () => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.stubGlobal('navigator', {});

    useAgriStore.getState().requestLocation();

    expect(useAgriStore.getState().locationStatus).toBe('unavailable');
  });
});
