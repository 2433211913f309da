// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
/**
 * Backend gateway - one typed call per backend capability.
 *
 * Calls never catch: transport and non-2xx errors reach the caller as axios
 * raised them. Callers own the user-facing fallback.
 */

import { statusApi } from './status';
import { chatApi } from './chat';
import { analysisApi } from './analysis';
import { weatherApi } from './weather';
import { ipmApi } from './ipm';

export const apiService = {
  ...statusApi,
  ...chatApi,
  ...analysisApi,
  ...weatherApi,
  ...ipmApi,
};

export type ApiService = typeof apiService;

export { backendClient } from './client';

export default apiService;
