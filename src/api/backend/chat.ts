// Copyright 2025 Roni Tervo
//
// SPDX-License-Identifier: Apache-2.0
import type { ChatRequest, ChatResponse } from '../../core/types';
import { backendClient, MULTIPART_HEADERS, tracked } from './client';

export const chatApi = {
  async sendMessage(request: ChatRequest): Promise<ChatResponse> {
    const body = {
      message: request.message,
      session_id: request.sessionId,
      latitude: request.location?.latitude,
      longitude: request.location?.longitude,
      crop_type: request.cropType,
      language: request.language,
    };
    return tracked('chat.message', 'POST /chat/message', body, async () => {
      const response = await backendClient.post<ChatResponse>('/chat/message', body);
      return response.data;
    });
  },

  async sendMessageWithImage(request: ChatRequest, file: Blob, fileName: string): Promise<ChatResponse> {
    const formData = new FormData();
    formData.append('message', request.message);
    formData.append('file', file, fileName);
    formData.append('language', request.language);
    if (request.sessionId) formData.append('session_id', request.sessionId);
    if (request.location) {
      formData.append('latitude', request.location.latitude.toString());
      formData.append('longitude', request.location.longitude.toString());
    }
    if (request.cropType) formData.append('crop_type', request.cropType);

    return tracked('chat.upload', 'POST /chat/message/upload', formData, async () => {
      const response = await backendClient.post<ChatResponse>('/chat/message/upload', formData, {
        headers: MULTIPART_HEADERS,
      });
      return response.data;
    });
  },
};
