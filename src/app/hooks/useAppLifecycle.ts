// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
/**
 * useAppLifecycle - App-wide lifecycle effects.
 *
 * Handles document title and splash screen removal.
 */

import { useEffect } from 'react';
import type { TranslationFunction } from '../../core/i18n';
import { APP_TITLE_KEY } from '../../core/config/app';

const SPLASH_FADE_DELAY_MS = 200;

export const useAppLifecycle = (t: TranslationFunction) => {
  useEffect(() => {
    document.title = t(APP_TITLE_KEY);
  }, [t]);

  useEffect(() => {
    const splashScreen = document.getElementById('splash-screen');
    if (!splashScreen) return;
    const timer = setTimeout(() => {
      splashScreen.classList.add('fade-out');
      splashScreen.addEventListener('transitionend', () => {
        splashScreen.remove();
      });
    }, SPLASH_FADE_DELAY_MS);
    return () => clearTimeout(timer);
  }, []);
};

export default useAppLifecycle;
