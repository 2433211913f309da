// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
/**
 * Chat Slice - manages the conversation with the AI agronomist
 *
 * Responsibilities:
 * - Append-only transcript of user and assistant messages
 * - Backend session id (first one received is kept for the page lifetime)
 * - Composer draft and attached photo
 * - One request in flight at a time; failures become a localized reply
 */

import type { StateCreator } from 'zustand';
import type { ChatImageAttachment, ChatMessage, ChatRequest, ChatResponse, ChatStatus } from '../../core/types';
import { translate } from '../../core/i18n';
import { apiService } from '../../api/backend';
import type { AgriStore } from '../agriStore';
import { selectShouldSpeakReplies } from './settingsSlice';

/** Chat actions the backend may offer, mapped to the prompt each one sends. */
const ACTION_PROMPT_KEYS: ReadonlyMap<string, string> = new Map([
  ['get_ipm_strategy', 'actionIpmPrompt'],
  ['check_weather', 'actionWeatherPrompt'],
]);

export type NewChatMessage = Omit<ChatMessage, 'id' | 'timestamp'>;

export interface ChatSlice {
  // State
  messages: ChatMessage[];
  sessionId: string | null;
  chatStatus: ChatStatus;
  draft: string;
  attachedImage: ChatImageAttachment | null;

  // Actions
  addMessage: (message: NewChatMessage) => string;
  sendMessage: (text: string, image?: ChatImageAttachment | null) => Promise<void>;
  runAction: (action: string) => Promise<void>;
  setDraft: (draft: string) => void;
  setAttachedImage: (image: ChatImageAttachment | null) => void;
}

// ============================================================
// DERIVED SELECTORS
// ============================================================

export const selectIsSending = (state: Pick<ChatSlice, 'chatStatus'>) => state.chatStatus === 'pending';

export const createChatSlice: StateCreator<
  AgriStore,
  [['zustand/subscribeWithSelector', never], ['zustand/devtools', never]],
  [],
  ChatSlice
> = (set, get) => ({
  // Initial state
  messages: [],
  sessionId: null,
  chatStatus: 'idle',
  draft: '',
  attachedImage: null,

  // Actions
  addMessage: (message) => {
    const id = crypto.randomUUID();
    set(state => ({ messages: [...state.messages, { ...message, id, timestamp: Date.now() }] }));
    return id;
  },

  sendMessage: async (text, image = null) => {
    const trimmed = text.trim();
    if (!trimmed && !image) return;
    if (get().chatStatus === 'pending') {
      console.warn('Chat request already in flight; ignoring send.');
      return;
    }

    const { language, location, sessionId, settings } = get();
    get().addMessage({
      role: 'user',
      content: trimmed || translate(language, 'imagePromptDefault'),
      image: image?.dataUrl,
    });
    set({ chatStatus: 'pending', draft: '' });

    const request: ChatRequest = {
      message: trimmed || translate(language, 'imageQuestionDefault'),
      sessionId: sessionId ?? undefined,
      location: location ?? undefined,
      cropType: settings.cropType ?? undefined,
      language,
    };

    let response: ChatResponse;
    try {
      response = image
        ? await apiService.sendMessageWithImage(request, image.file, image.fileName)
        : await apiService.sendMessage(request);
    } catch (error) {
      console.error('Error sending message:', error);
      get().addMessage({ role: 'assistant', content: translate(get().language, 'connectionError') });
      set(state => ({
        chatStatus: 'errored',
        draft: state.draft === '' ? text : state.draft,
      }));
      return;
    }

    if (get().sessionId === null && response.session_id) {
      set({ sessionId: response.session_id });
    }
    get().addMessage({
      role: 'assistant',
      content: response.message,
      analysis: response.analysis,
      suggestions: response.suggestions,
      actions: response.actions_available,
    });
    set(state => ({
      chatStatus: 'idle',
      attachedImage: state.attachedImage === image ? null : state.attachedImage,
    }));

    if (selectShouldSpeakReplies(get()) && response.message) {
      get().speak(response.message);
    }
  },

  runAction: async (action) => {
    const promptKey = ACTION_PROMPT_KEYS.get(action);
    if (!promptKey) {
      console.warn(`Unknown chat action "${action}"`);
      return;
    }
    await get().sendMessage(translate(get().language, promptKey));
  },

  setDraft: (draft) => set({ draft }),

  setAttachedImage: (image) => set({ attachedImage: image }),
});
