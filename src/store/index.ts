// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
/**
 * Store Public API
 *
 * This is the single entry point for all store access.
 * Import from here, not from individual slices.
 */

export { useAgriStore } from './agriStore';

export { selectShouldSpeakReplies } from './slices/settingsSlice';

export { selectIsSending } from './slices/chatSlice';

export { selectIsBackendOffline } from './slices/uiSlice';

export type {
  AgriStore,
  AppSettings,
  SettingsSlice,
  ChatSlice,
  NewChatMessage,
  SpeechSlice,
  LocationSlice,
  UiSlice,
  BackendStatus,
} from './agriStore';
