// Copyright 2025 Roni Tervo
//
// SPDX-License-Identifier: Apache-2.0
import axios, { type AxiosInstance } from 'axios';
import { API_BASE_URL } from '../../core/config/app';
import { debugLogService } from '../../services/debugLogService';

export const backendClient: AxiosInstance = axios.create({
  baseURL: API_BASE_URL,
  headers: {
    'Content-Type': 'application/json',
  },
});

export const MULTIPART_HEADERS = { 'Content-Type': 'multipart/form-data' } as const;

/**
 * Records the call in the request log and hands back the result or the
 * original error untouched.
 */
export const tracked = async <T>(
  type: string,
  endpoint: string,
  payload: unknown,
  run: () => Promise<T>
): Promise<T> => {
  const log = debugLogService.logRequest(type, endpoint, payload);
  try {
    const result = await run();
    log.complete(result);
    return result;
  } catch (error) {
    log.error(error);
    throw error;
  }
};
