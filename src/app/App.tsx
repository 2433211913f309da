// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
/**
 * App.tsx - The Composition Root
 *
 * Hollow shell: runs startup, renders the header, the active tab and the
 * request log. Views read the store themselves.
 */

import React from 'react';
import { useShallow } from 'zustand/react/shallow';
import { WifiOff } from 'lucide-react';

// --- Features Components ---
import { ChatInterface } from '../features/chat';
import { Header } from '../features/session';
import { PlantScanner } from '../features/scanner';
import { WeatherDashboard } from '../features/weather';
import { IPMPlanner } from '../features/ipm';
import { DebugLogPanel } from '../features/diagnostics';

// --- Hooks ---
import { useAppInitialization } from './hooks';
import { selectIsBackendOffline, useAgriStore } from '../store';
import type { AppTab } from '../core/types';

const renderTab = (tab: AppTab) => {
  switch (tab) {
    case 'agent':
      return <ChatInterface />;
    case 'scanner':
      return <PlantScanner />;
    case 'weather':
      return <WeatherDashboard />;
    case 'ipm':
      return <IPMPlanner />;
  }
};

const App: React.FC = () => {
  const { t } = useAppInitialization();

  const { activeTab, isDebugLogOpen, toggleDebugLog } = useAgriStore(
    useShallow(state => ({
      activeTab: state.activeTab,
      isDebugLogOpen: state.isDebugLogOpen,
      toggleDebugLog: state.toggleDebugLog,
    }))
  );
  const isBackendOffline = useAgriStore(selectIsBackendOffline);

  return (
    <div className="h-screen flex flex-col bg-gray-50">
      <Header />

      {isBackendOffline && (
        <div role="alert" className="px-4 py-2 bg-yellow-50 border-b border-yellow-200 text-yellow-800 text-sm flex items-center gap-2">
          <WifiOff className="w-4 h-4" />
          {t('backendOffline')}
        </div>
      )}

      <main className="flex-1 overflow-hidden">{renderTab(activeTab)}</main>

      {isDebugLogOpen && <DebugLogPanel onClose={toggleDebugLog} t={t} />}
    </div>
  );
};

export default App;
