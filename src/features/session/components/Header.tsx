// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
import React from 'react';
import { useShallow } from 'zustand/react/shallow';
import { Bot, Camera, Cloud, Leaf, Shield, Terminal, Volume2, VolumeX, type LucideIcon } from 'lucide-react';
import { useAgriStore } from '../../../store';
import type { AppTab } from '../../../core/types';
import { useLanguage } from '../hooks/useLanguage';
import LanguageSelector from './LanguageSelector';

interface TabDefinition {
  id: AppTab;
  labelKey: string;
  icon: LucideIcon;
}

export const TABS: readonly TabDefinition[] = [
  { id: 'agent', labelKey: 'agent', icon: Bot },
  { id: 'scanner', labelKey: 'scanner', icon: Camera },
  { id: 'weather', labelKey: 'weather', icon: Cloud },
  { id: 'ipm', labelKey: 'ipm', icon: Shield },
];

const Header: React.FC = () => {
  const { t } = useLanguage();
  const {
    activeTab,
    setActiveTab,
    aiStatus,
    settings,
    updateSetting,
    toggleVoiceEnabled,
    toggleDebugLog,
    synthesisSupported,
  } = useAgriStore(
    useShallow(state => ({
      activeTab: state.activeTab,
      setActiveTab: state.setActiveTab,
      aiStatus: state.aiStatus,
      settings: state.settings,
      updateSetting: state.updateSetting,
      toggleVoiceEnabled: state.toggleVoiceEnabled,
      toggleDebugLog: state.toggleDebugLog,
      synthesisSupported: state.speechSupport.synthesis,
    }))
  );

  return (
    <header className="bg-green-700 text-white shadow-md">
      <div className="px-4 py-3 flex items-center justify-between gap-3">
        <div className="flex items-center gap-3">
          <div className="w-10 h-10 bg-white/15 rounded-xl flex items-center justify-center">
            <Leaf className="w-6 h-6" />
          </div>
          <div>
            <h1 className="font-bold text-lg leading-tight">{t('appName')}</h1>
            {aiStatus && (
              <p className="text-xs text-green-100">{t('aiProvider', { provider: aiStatus.primary_provider })}</p>
            )}
          </div>
        </div>

        <div className="flex items-center gap-2">
          {synthesisSupported && (
            <>
              <button
                onClick={toggleVoiceEnabled}
                className="p-2 rounded-full hover:bg-white/15 transition-colors"
                title={settings.voiceEnabled ? t('voiceEnabled') : t('voiceDisabled')}
                aria-pressed={settings.voiceEnabled}
              >
                {settings.voiceEnabled ? <Volume2 className="w-5 h-5" /> : <VolumeX className="w-5 h-5 opacity-60" />}
              </button>
              <label className="hidden md:flex items-center gap-1.5 text-xs cursor-pointer select-none">
                <input
                  type="checkbox"
                  className="accent-white"
                  checked={settings.autoSpeak}
                  disabled={!settings.voiceEnabled}
                  onChange={e => updateSetting('autoSpeak', e.target.checked)}
                />
                {t('autoSpeak')}
              </label>
            </>
          )}
          <LanguageSelector />
          <button
            onClick={toggleDebugLog}
            className="p-2 rounded-full hover:bg-white/15 transition-colors"
            title={t('requestLog')}
          >
            <Terminal className="w-5 h-5" />
          </button>
        </div>
      </div>

      <nav className="flex px-2 gap-1 overflow-x-auto">
        {TABS.map(tab => {
          const Icon = tab.icon;
          return (
            <button
              key={tab.id}
              onClick={() => setActiveTab(tab.id)}
              className={`flex items-center gap-2 px-4 py-2.5 rounded-t-lg text-sm font-medium transition-colors ${
                activeTab === tab.id ? 'bg-gray-50 text-green-800' : 'text-green-50 hover:bg-white/10'
              }`}
            >
              <Icon className="w-4 h-4" />
              {t(tab.labelKey)}
            </button>
          );
        })}
      </nav>
    </header>
  );
};

export default Header;
