// Copyright 2025 Roni Tervo
//
// SPDX-License-Identifier: Apache-2.0
import type { Envelope, LeafAnalysis, QuickDiagnosis } from '../../core/types';
import { backendClient, MULTIPART_HEADERS, tracked } from './client';

export const analysisApi = {
  async analyzeLeaf(file: Blob, fileName: string, cropType?: string, context?: string): Promise<LeafAnalysis> {
    const formData = new FormData();
    formData.append('file', file, fileName);
    if (cropType) formData.append('crop_type', cropType);
    if (context) formData.append('context', context);

    return tracked('analysis.leaf', 'POST /analysis/leaf/upload', formData, async () => {
      const response = await backendClient.post<Envelope<LeafAnalysis>>('/analysis/leaf/upload', formData, {
        headers: MULTIPART_HEADERS,
      });
      return response.data.data;
    });
  },

  async quickDiagnosis(file: Blob, fileName: string, question: string): Promise<QuickDiagnosis> {
    const formData = new FormData();
    formData.append('file', file, fileName);
    formData.append('question', question);

    return tracked('analysis.quick', 'POST /analysis/quick', formData, async () => {
      const response = await backendClient.post<QuickDiagnosis>('/analysis/quick', formData, {
        headers: MULTIPART_HEADERS,
      });
      return response.data;
    });
  },
};
