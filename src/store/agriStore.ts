// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
/**
 * AgriGuard Store - Root Zustand store combining all slices
 *
 * This is the single source of truth for all shared application state.
 * Each feature owns a slice that exposes its state and actions.
 *
 * Middleware:
 * - subscribeWithSelector: enables fine-grained subscriptions
 * - devtools: enables Redux DevTools in development
 */

import { create } from 'zustand';
import { subscribeWithSelector } from 'zustand/middleware';
import { devtools } from 'zustand/middleware';

import { createSettingsSlice, type SettingsSlice } from './slices/settingsSlice';
import { createChatSlice, type ChatSlice } from './slices/chatSlice';
import { createSpeechSlice, type SpeechSlice } from './slices/speechSlice';
import { createBrowserSpeechPorts, type SpeechPorts } from '../features/speech/services/browserSpeech';
import { createLocationSlice, type LocationSlice } from './slices/locationSlice';
import { createUiSlice, type UiSlice } from './slices/uiSlice';

/**
 * Combined store type - intersection of all slices
 */
export type AgriStore =
  SettingsSlice &
  ChatSlice &
  SpeechSlice &
  LocationSlice &
  UiSlice;

const isDev = import.meta.env.DEV && import.meta.env.MODE !== 'test' && typeof window !== 'undefined';

/**
 * Builds a store instance. The app keeps one; tests build their own over
 * stand-in speech ports.
 */
export const createAgriStore = (speechPorts: SpeechPorts) =>
  create<AgriStore>()(
    subscribeWithSelector(
      devtools(
        (...a) => ({
          ...createSettingsSlice(...a),
          ...createChatSlice(...a),
          ...createSpeechSlice(speechPorts)(...a),
          ...createLocationSlice(...a),
          ...createUiSlice(...a),
        }),
        {
          name: 'AgriStore',
          // DevTools enabled in non-production browser builds
          enabled: isDev,
        }
      )
    )
  );

export const useAgriStore = createAgriStore(createBrowserSpeechPorts());

// Re-export slice types for convenience
export type { SettingsSlice, AppSettings } from './slices/settingsSlice';
export type { ChatSlice, NewChatMessage } from './slices/chatSlice';
export type { SpeechSlice } from './slices/speechSlice';
export type { LocationSlice } from './slices/locationSlice';
export type { UiSlice, BackendStatus } from './slices/uiSlice';
