// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
import { describe, expect, it, vi } from 'vitest';
import { DebugLogService, MAX_LOG_ENTRIES } from './debugLogService';

describe('DebugLogService', () => {
  it('emits the current entries on subscribe and after every change', () => {
    const service = new DebugLogService();
    const listener = vi.fn();
    const unsubscribe = service.subscribe(listener);

    const handle = service.logRequest('status.ai', 'GET /ai-status', null);
    handle.complete({ primary_provider: 'groq' });
    unsubscribe();
    service.clear();

    expect(listener).toHaveBeenCalledTimes(3);
    expect(listener.mock.calls[0][0]).toEqual([]);
    const [entry] = listener.mock.calls[2][0];
    expect(entry.endpoint).toBe('GET /ai-status');
    expect(entry.response).toEqual({ primary_provider: 'groq' });
    expect(entry.duration).toBeGreaterThanOrEqual(0);
  });

  it('records form fields and describes attached files', () => {
    const service = new DebugLogService();
    const form = new FormData();
    form.append('message', 'check this');
    form.append('file', new Blob(['abcd'], { type: 'image/png' }), 'leaf.png');

    service.logRequest('chat.upload', 'POST /chat/message/upload', form);

    expect(service.getLogs()[0].request).toEqual({ message: 'check this', file: '[file leaf.png 4B]' });
  });

  it('stores errors by name and message', () => {
    const service = new DebugLogService();

    service.logRequest('weather.current', 'GET /weather/current', { latitude: 1 }).error(new TypeError('bad'));

    expect(service.getLogs()[0].error).toEqual({ name: 'TypeError', message: 'bad' });
  });

  it('keeps only the most recent entries, newest first', () => {
    const service = new DebugLogService();
    for (let i = 0; i < MAX_LOG_ENTRIES + 5; i++) {
      service.logRequest('chat.message', `POST /chat/message #${i}`, null);
    }

    const logs = service.getLogs();
    expect(logs).toHaveLength(MAX_LOG_ENTRIES);
    expect(logs[0].endpoint).toBe(`POST /chat/message #${MAX_LOG_ENTRIES + 4}`);
  });
});
