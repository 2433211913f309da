// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
/**
 * Session Feature - Public API
 *
 * This is the single entry point for language and shell header functionality.
 * External code should only import from this file.
 *
 * Owned Store Slices: settingsSlice, uiSlice
 */

// Components
export { default as Header, TABS } from './components/Header';
export { default as LanguageSelector } from './components/LanguageSelector';

// Hooks
export { useLanguage } from './hooks/useLanguage';

// Services
export {
  loadLanguagePreference,
  saveLanguagePreference,
} from './services/languagePreference';
