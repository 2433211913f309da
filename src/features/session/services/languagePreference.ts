// Copyright 2025 Roni Tervo
//
// SPDX-License-Identifier: Apache-2.0
import { LOCAL_STORAGE_LANGUAGE_KEY } from '../../../core/config/app';
import { DEFAULT_LANGUAGE_CODE } from '../../../core/config/languages';

const getStorage = (): Storage | null => {
  try {
    return typeof window !== 'undefined' && window.localStorage ? window.localStorage : null;
  } catch {
    // Access itself throws when storage is disabled by the browser.
    return null;
  }
};

export const loadLanguagePreference = (): string => {
  const storage = getStorage();
  if (!storage) return DEFAULT_LANGUAGE_CODE;
  try {
    return storage.getItem(LOCAL_STORAGE_LANGUAGE_KEY) || DEFAULT_LANGUAGE_CODE;
  } catch (error) {
    console.warn(`Error reading localStorage key "${LOCAL_STORAGE_LANGUAGE_KEY}":`, error);
    return DEFAULT_LANGUAGE_CODE;
  }
};

export const saveLanguagePreference = (code: string): void => {
  const storage = getStorage();
  if (!storage) return;
  try {
    storage.setItem(LOCAL_STORAGE_LANGUAGE_KEY, code);
  } catch (error) {
    console.warn(`Error writing localStorage key "${LOCAL_STORAGE_LANGUAGE_KEY}":`, error);
  }
};
