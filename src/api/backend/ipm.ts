// Copyright 2025 Roni Tervo
//
// SPDX-License-Identifier: Apache-2.0
import type {
  Envelope,
  IpmStrategy,
  IpmStrategyRequest,
  OutbreakPrediction,
  QuickRecommendation,
} from '../../core/types';
import { backendClient, tracked } from './client';

export const ipmApi = {
  async generateIPMStrategy(request: IpmStrategyRequest): Promise<IpmStrategy> {
    return tracked('ipm.strategy', 'POST /ipm/strategy', request, async () => {
      const response = await backendClient.post<Envelope<IpmStrategy>>('/ipm/strategy', request);
      return response.data.data;
    });
  },

  async getQuickRecommendation(disease: string, crop: string = 'general'): Promise<QuickRecommendation> {
    const path = `/ipm/quick/${encodeURIComponent(disease)}`;
    return tracked('ipm.quick', `GET ${path}`, { crop }, async () => {
      const response = await backendClient.get<QuickRecommendation>(path, { params: { crop } });
      return response.data;
    });
  },

  async predictOutbreak(latitude: number, longitude: number, crop: string = 'general'): Promise<OutbreakPrediction> {
    const params = { latitude, longitude, crop };
    return tracked('ipm.predictOutbreak', 'GET /ipm/predict-outbreak', params, async () => {
      const response = await backendClient.get<Envelope<OutbreakPrediction>>('/ipm/predict-outbreak', { params });
      return response.data.data;
    });
  },
};
