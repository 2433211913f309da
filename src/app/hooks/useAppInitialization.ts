// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
/**
 * useAppInitialization - Centralized app startup hook.
 *
 * Responsibilities:
 * - App lifecycle (title + splash removal)
 * - One-shot geolocation lookup
 * - Backend reachability check for the offline banner
 */

import { useEffect } from 'react';
import { useAgriStore } from '../../store';
import { useLanguage } from '../../features/session';
import { useAppLifecycle } from './useAppLifecycle';

export const useAppInitialization = () => {
  const { t } = useLanguage();
  useAppLifecycle(t);

  const requestLocation = useAgriStore(state => state.requestLocation);
  const checkBackendStatus = useAgriStore(state => state.checkBackendStatus);

  useEffect(() => {
    requestLocation();
    checkBackendStatus().catch(error => console.error('Backend status check failed:', error));
  }, [requestLocation, checkBackendStatus]);

  return { t };
};

export default useAppInitialization;
