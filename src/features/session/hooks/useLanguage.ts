// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
import { useCallback } from 'react';
import { useShallow } from 'zustand/react/shallow';
import { useAgriStore } from '../../../store';
import { translate, type TranslationFunction } from '../../../core/i18n';
import { ALL_LANGUAGES } from '../../../core/config/languages';

/**
 * Active language for components: the code, its registry entry,
 * a bound translation function and the setter.
 */
export const useLanguage = () => {
  const { language, setLanguage, getActiveLanguage } = useAgriStore(
    useShallow(state => ({
      language: state.language,
      setLanguage: state.setLanguage,
      getActiveLanguage: state.getActiveLanguage,
    }))
  );

  const t: TranslationFunction = useCallback(
    (key, replacements) => translate(language, key, replacements),
    [language]
  );

  return { language, setLanguage, t, getActiveLanguage, languages: ALL_LANGUAGES };
};

export default useLanguage;
