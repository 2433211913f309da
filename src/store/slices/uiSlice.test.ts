// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { useAgriStore } from '../agriStore';
import { apiService } from '../../api/backend';

const initialState = useAgriStore.getState();

describe('uiSlice', () => {
  beforeEach(() => {
    useAgriStore.setState(initialState, true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('records the AI provider when the backend answers', async () => {
    const aiStatus = {
      primary_provider: 'groq',
      ollama: { status: 'offline', models: [] },
      groq: { status: 'configured' },
      gemini: { status: 'not_configured' },
    };
    const health = vi.spyOn(apiService, 'checkHealth').mockResolvedValue({ status: 'healthy' });
    vi.spyOn(apiService, 'getAIStatus').mockResolvedValue(aiStatus);

    await useAgriStore.getState().checkBackendStatus();

    expect(health).toHaveBeenCalledTimes(1);
    expect(useAgriStore.getState().backendStatus).toBe('online');
    expect(useAgriStore.getState().aiStatus).toEqual(aiStatus);
  });

  it('flags the backend offline when the health check fails', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(apiService, 'checkHealth').mockRejectedValue(new Error('Network Error'));
    const aiStatus = vi.spyOn(apiService, 'getAIStatus');

    await useAgriStore.getState().checkBackendStatus();

    expect(useAgriStore.getState().backendStatus).toBe('offline');
    expect(useAgriStore.getState().aiStatus).toBeNull();
    expect(aiStatus).not.toHaveBeenCalled();
  });

  it('stays online without a provider when only the AI status call fails', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const failure = new Error('ai-status 500');
    vi.spyOn(apiService, 'checkHealth').mockResolvedValue({ status: 'healthy' });
    vi.spyOn(apiService, 'getAIStatus').mockRejectedValue(failure);

    await useAgriStore.getState().checkBackendStatus();

    expect(useAgriStore.getState().backendStatus).toBe('online');
    expect(useAgriStore.getState().aiStatus).toBeNull();
    expect(warn).toHaveBeenCalledWith('AI provider status unavailable:', failure);
  });

  it('toggles the request log panel', () => {
    useAgriStore.getState().toggleDebugLog();
    expect(useAgriStore.getState().isDebugLogOpen).toBe(true);
    useAgriStore.getState().toggleDebugLog();
    expect(useAgriStore.getState().isDebugLogOpen).toBe(false);
  });
});
