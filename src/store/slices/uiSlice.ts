// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
/**
 * UI Slice - manages cross-component UI state
 *
 * Responsibilities:
 * - Active tab of the shell
 * - Backend reachability and AI provider status (drives the offline banner)
 * - Language menu and request log panel visibility
 */

import type { StateCreator } from 'zustand';
import type { AIStatus, AppTab } from '../../core/types';
import { apiService } from '../../api/backend';
import type { AgriStore } from '../agriStore';

export type BackendStatus = 'unknown' | 'checking' | 'online' | 'offline';

export interface UiSlice {
  // Shell
  activeTab: AppTab;
  isLanguageMenuOpen: boolean;
  isDebugLogOpen: boolean;

  // Backend
  backendStatus: BackendStatus;
  aiStatus: AIStatus | null;

  // Actions - Shell
  setActiveTab: (tab: AppTab) => void;
  setIsLanguageMenuOpen: (value: boolean) => void;
  toggleDebugLog: () => void;

  // Actions - Backend
  checkBackendStatus: () => Promise<void>;
}

export const selectIsBackendOffline = (state: Pick<UiSlice, 'backendStatus'>) => state.backendStatus === 'offline';

export const createUiSlice: StateCreator<
  AgriStore,
  [['zustand/subscribeWithSelector', never], ['zustand/devtools', never]],
  [],
  UiSlice
> = (set) => ({
  // Initial Shell state
  activeTab: 'agent',
  isLanguageMenuOpen: false,
  isDebugLogOpen: false,

  // Initial Backend state
  backendStatus: 'unknown',
  aiStatus: null,

  // Shell Actions
  setActiveTab: (tab: AppTab) => {
    set({ activeTab: tab });
  },

  setIsLanguageMenuOpen: (value: boolean) => {
    set({ isLanguageMenuOpen: value });
  },

  toggleDebugLog: () => {
    set(state => ({ isDebugLogOpen: !state.isDebugLogOpen }));
  },

  // Backend Actions
  // Liveness comes from /health; a failing /ai-status only hides the provider.
  checkBackendStatus: async () => {
    set({ backendStatus: 'checking' });
    try {
      await apiService.checkHealth();
    } catch (error) {
      console.warn('Backend not reachable:', error);
      set({ aiStatus: null, backendStatus: 'offline' });
      return;
    }
    set({ backendStatus: 'online' });
    try {
      set({ aiStatus: await apiService.getAIStatus() });
    } catch (error) {
      console.warn('AI provider status unavailable:', error);
      set({ aiStatus: null });
    }
  },
});
