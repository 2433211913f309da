// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
/**
 * Settings Slice - manages the active language and user preferences
 *
 * Responsibilities:
 * - Active language code, read once from localStorage at store creation
 * - Language changes written to storage and state together
 * - Voice output toggles and crop selection
 */

import type { StateCreator } from 'zustand';
import { ALL_LANGUAGES, findLanguage, type LanguageDefinition } from '../../core/config/languages';
import { loadLanguagePreference, saveLanguagePreference } from '../../features/session/services/languagePreference';
import type { AgriStore } from '../agriStore';

export interface AppSettings {
  /** Speaker toggle; assistant replies are read aloud only while it is on. */
  voiceEnabled: boolean;
  autoSpeak: boolean;
  /** Crop sent with chat requests, or null for "any crop". */
  cropType: string | null;
}

const initialSettings: AppSettings = {
  voiceEnabled: true,
  autoSpeak: true,
  cropType: null,
};

export interface SettingsSlice {
  // State
  language: string;
  settings: AppSettings;

  // Actions
  setLanguage: (code: string) => void;
  getActiveLanguage: () => LanguageDefinition;
  updateSetting: <K extends keyof AppSettings>(key: K, value: AppSettings[K]) => void;
  toggleVoiceEnabled: () => void;
}

// ============================================================
// DERIVED SELECTORS
// ============================================================

export const selectShouldSpeakReplies = (state: Pick<SettingsSlice, 'settings'>) =>
  state.settings.voiceEnabled && state.settings.autoSpeak;

export const createSettingsSlice: StateCreator<
  AgriStore,
  [['zustand/subscribeWithSelector', never], ['zustand/devtools', never]],
  [],
  SettingsSlice
> = (set, get) => ({
  // Initial state
  language: loadLanguagePreference(),
  settings: initialSettings,

  // Actions
  setLanguage: (code: string) => {
    saveLanguagePreference(code);
    set({ language: code });
  },

  getActiveLanguage: () => findLanguage(get().language) ?? ALL_LANGUAGES[0],

  updateSetting: <K extends keyof AppSettings>(key: K, value: AppSettings[K]) => {
    set(state => ({ settings: { ...state.settings, [key]: value } }));
  },

  toggleVoiceEnabled: () => {
    const next = !get().settings.voiceEnabled;
    if (!next) get().stopSpeaking();
    get().updateSetting('voiceEnabled', next);
  },
});
