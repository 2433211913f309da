// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
import React from 'react';
import { Bug, CloudSun, Lightbulb, Mic, Microscope } from 'lucide-react';
import type { TranslationFunction } from '../../../core/i18n';

interface WelcomePanelProps {
  greeting: string;
  t: TranslationFunction;
}

const CAPABILITIES = [
  { key: 'diagnose', icon: Microscope },
  { key: 'weatherAdvice', icon: CloudSun },
  { key: 'pest', icon: Bug },
  { key: 'voice', icon: Mic },
  { key: 'tips', icon: Lightbulb },
] as const;

/** Shown above the transcript; re-renders in place when the language changes. */
const WelcomePanel: React.FC<WelcomePanelProps> = ({ greeting, t }) => (
  <div className="flex justify-start">
    <div className="max-w-[80%] rounded-2xl rounded-bl-md px-4 py-3 bg-white border border-gray-200 shadow-sm">
      <p className="font-medium">{greeting}</p>
      <p className="mt-3 text-sm text-gray-600">{t('helpWith')}</p>
      <ul className="mt-1 space-y-1 text-sm">
        {CAPABILITIES.map(({ key, icon: Icon }) => (
          <li key={key} className="flex items-center gap-2">
            <Icon className="w-4 h-4 text-green-600" />
            {t(key)}
          </li>
        ))}
      </ul>
      <p className="mt-3 text-sm">{t('askMe')}</p>
    </div>
  </div>
);

export default WelcomePanel;
