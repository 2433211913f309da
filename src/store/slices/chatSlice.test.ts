// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { useAgriStore } from '../agriStore';
import { apiService } from '../../api/backend';
import type { ChatImageAttachment, ChatResponse } from '../../core/types';

const initialState = useAgriStore.getState();

const reply = (message: string, sessionId = 'abc123'): ChatResponse => ({
  status: 'success',
  session_id: sessionId,
  message,
});

describe('chatSlice', () => {
  const speak = vi.fn();

  beforeEach(() => {
    useAgriStore.setState({ ...initialState, speak }, true);
    speak.mockReset();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('ignores a blank message with no image', async () => {
    const send = vi.spyOn(apiService, 'sendMessage');

    await useAgriStore.getState().sendMessage('   ');

    expect(send).not.toHaveBeenCalled();
    expect(useAgriStore.getState().messages).toEqual([]);
    expect(useAgriStore.getState().chatStatus).toBe('idle');
  });

  it('sends the text with the active language and appends the reply', async () => {
    useAgriStore.setState({ language: 'hi-IN' });
    const send = vi.spyOn(apiService, 'sendMessage').mockResolvedValue({
      ...reply('Use neem oil'),
      suggestions: ['When should I spray?'],
      actions_available: [{ action: 'check_weather', label: 'Check weather' }],
    });

    await useAgriStore.getState().sendMessage('  yellow leaves  ');

    expect(send).toHaveBeenCalledWith({
      message: 'yellow leaves',
      sessionId: undefined,
      location: undefined,
      cropType: undefined,
      language: 'hi-IN',
    });
    const { messages, chatStatus, sessionId } = useAgriStore.getState();
    expect(messages.map(m => [m.role, m.content])).toEqual([
      ['user', 'yellow leaves'],
      ['assistant', 'Use neem oil'],
    ]);
    expect(messages[1].suggestions).toEqual(['When should I spray?']);
    expect(messages[1].actions).toEqual([{ action: 'check_weather', label: 'Check weather' }]);
    expect(chatStatus).toBe('idle');
    expect(sessionId).toBe('abc123');
  });

  it('includes location and crop when known', async () => {
    useAgriStore.setState({
      location: { latitude: 18.5, longitude: 73.8 },
      settings: { ...initialState.settings, cropType: 'tomato' },
    });
    const send = vi.spyOn(apiService, 'sendMessage').mockResolvedValue(reply('ok'));

    await useAgriStore.getState().sendMessage('hello');

    expect(send).toHaveBeenCalledWith({
      message: 'hello',
      sessionId: undefined,
      location: { latitude: 18.5, longitude: 73.8 },
      cropType: 'tomato',
      language: 'en-US',
    });
  });

  it('keeps the first session id for the rest of the conversation', async () => {
    const send = vi
      .spyOn(apiService, 'sendMessage')
      .mockResolvedValueOnce(reply('first', 'abc123'))
      .mockResolvedValueOnce(reply('second', 'xyz999'))
      .mockResolvedValueOnce(reply('third', 'xyz999'));

    await useAgriStore.getState().sendMessage('one');
    await useAgriStore.getState().sendMessage('two');
    await useAgriStore.getState().sendMessage('three');

    expect(useAgriStore.getState().sessionId).toBe('abc123');
    expect(send.mock.calls[1][0].sessionId).toBe('abc123');
    expect(send.mock.calls[2][0].sessionId).toBe('abc123');
  });

  it('answers a failed request with the localized connection error', async () => {
    useAgriStore.setState({ language: 'es-ES' });
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const failure = new Error('Network Error');
    vi.spyOn(apiService, 'sendMessage').mockRejectedValue(failure);

    await useAgriStore.getState().sendMessage('hola');

    const { messages, chatStatus, draft } = useAgriStore.getState();
    expect(messages.map(m => [m.role, m.content])).toEqual([
      ['user', 'hola'],
      ['assistant', 'Tengo problemas para conectar con el servidor.'],
    ]);
    expect(chatStatus).toBe('errored');
    expect(draft).toBe('hola');
    expect(error).toHaveBeenCalledWith('Error sending message:', failure);
  });

  it('does not overwrite text typed while the failed request was pending', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    let rejectSend: (reason: Error) => void = () => undefined;
    vi.spyOn(apiService, 'sendMessage').mockReturnValue(
      new Promise<ChatResponse>((_, reject) => {
        rejectSend = reject;
      })
    );

    const pending = useAgriStore.getState().sendMessage('first question');
    useAgriStore.getState().setDraft('follow-up');
    rejectSend(new Error('timeout'));
    await pending;

    expect(useAgriStore.getState().draft).toBe('follow-up');
  });

  it('rejects a second send while one is in flight', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    let resolveSend: (value: ChatResponse) => void = () => undefined;
    const send = vi.spyOn(apiService, 'sendMessage').mockReturnValue(
      new Promise<ChatResponse>(resolve => {
        resolveSend = resolve;
      })
    );

    const first = useAgriStore.getState().sendMessage('first');
    expect(useAgriStore.getState().chatStatus).toBe('pending');
    await useAgriStore.getState().sendMessage('second');
    resolveSend(reply('done'));
    await first;

    expect(send).toHaveBeenCalledTimes(1);
    expect(useAgriStore.getState().messages.map(m => m.content)).toEqual(['first', 'done']);
  });

  it('only ever appends: earlier messages are left untouched', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(apiService, 'sendMessage')
      .mockResolvedValueOnce(reply('a1'))
      .mockRejectedValueOnce(new Error('down'))
      .mockResolvedValueOnce(reply('a3'));

    await useAgriStore.getState().sendMessage('q1');
    const afterFirst = useAgriStore.getState().messages;
    await useAgriStore.getState().sendMessage('q2');
    await useAgriStore.getState().sendMessage('q3');

    const { messages } = useAgriStore.getState();
    expect(messages).toHaveLength(6);
    expect(messages[0]).toBe(afterFirst[0]);
    expect(messages[1]).toBe(afterFirst[1]);
    expect(new Set(messages.map(m => m.id)).size).toBe(6);
  });

  describe('with an attached image', () => {
    const image: ChatImageAttachment = {
      file: new Blob(['leaf'], { type: 'image/jpeg' }),
      fileName: 'leaf.jpg',
      dataUrl: 'data:image/jpeg;base64,bGVhZg==',
    };

    it('uploads the photo and uses default prompts when no text is given', async () => {
      useAgriStore.setState({ attachedImage: image });
      const upload = vi.spyOn(apiService, 'sendMessageWithImage').mockResolvedValue(reply('Healthy leaf'));
      const send = vi.spyOn(apiService, 'sendMessage');

      await useAgriStore.getState().sendMessage('', image);

      expect(send).not.toHaveBeenCalled();
      expect(upload).toHaveBeenCalledWith(
        {
          message: 'What can you tell me about this plant?',
          sessionId: undefined,
          location: undefined,
          cropType: undefined,
          language: 'en-US',
        },
        image.file,
        'leaf.jpg'
      );
      const [userMessage] = useAgriStore.getState().messages;
      expect(userMessage.content).toBe('Please analyze this image');
      expect(userMessage.image).toBe(image.dataUrl);
      expect(useAgriStore.getState().attachedImage).toBeNull();
    });

    it('keeps the photo attached when the upload fails', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      useAgriStore.setState({ attachedImage: image });
      vi.spyOn(apiService, 'sendMessageWithImage').mockRejectedValue(new Error('413'));

      await useAgriStore.getState().sendMessage('what is this?', image);

      expect(useAgriStore.getState().attachedImage).toBe(image);
      expect(useAgriStore.getState().chatStatus).toBe('errored');
    });
  });

  describe('voice output', () => {
    it('reads the reply aloud when voice is on', async () => {
      vi.spyOn(apiService, 'sendMessage').mockResolvedValue(reply('Spray at dusk'));

      await useAgriStore.getState().sendMessage('when to spray?');

      expect(speak).toHaveBeenCalledWith('Spray at dusk');
    });

    it('stays silent when voice is off', async () => {
      useAgriStore.setState({ settings: { ...initialState.settings, voiceEnabled: false } });
      vi.spyOn(apiService, 'sendMessage').mockResolvedValue(reply('Spray at dusk'));

      await useAgriStore.getState().sendMessage('when to spray?');

      expect(speak).not.toHaveBeenCalled();
    });
  });

  describe('runAction', () => {
    it('sends the localized prompt for a known action', async () => {
      const send = vi.spyOn(apiService, 'sendMessage').mockResolvedValue(reply('Sunny'));

      await useAgriStore.getState().runAction('check_weather');

      expect(send.mock.calls[0][0].message).toBe('What are the current weather conditions and disease risks?');
    });

    it('ignores unknown actions', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const send = vi.spyOn(apiService, 'sendMessage');

      await useAgriStore.getState().runAction('order_seeds');

      expect(send).not.toHaveBeenCalled();
    });

    it('treats names inherited from Object.prototype as unknown actions', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const send = vi.spyOn(apiService, 'sendMessage');

      await expect(useAgriStore.getState().runAction('constructor')).resolves.toBeUndefined();
      await expect(useAgriStore.getState().runAction('toString')).resolves.toBeUndefined();

      expect(send).not.toHaveBeenCalled();
      expect(warn).toHaveBeenCalledWith('Unknown chat action "constructor"');
      expect(useAgriStore.getState().messages).toHaveLength(0);
    });
  });
});
