// Copyright 2025 Roni Tervo
//
// SPDX-License-Identifier: Apache-2.0
import type { AIStatus, HealthStatus } from '../../core/types';
import { backendClient, tracked } from './client';

export const statusApi = {
  async checkHealth(): Promise<HealthStatus> {
    return tracked('status.health', 'GET /health', null, async () => {
      const response = await backendClient.get<HealthStatus>('/health');
      return response.data;
    });
  },

  async getAIStatus(): Promise<AIStatus> {
    return tracked('status.ai', 'GET /ai-status', null, async () => {
      const response = await backendClient.get<AIStatus>('/ai-status');
      return response.data;
    });
  },
};
