// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
/**
 * Speech Slice - mirrors the browser speech engine into the store
 *
 * Responsibilities:
 * - Capability flags read once at store creation
 * - Listening / speaking state and the text being spoken
 * - Recognition failures surface as sttError; synthesis failures stay in the log
 * - Recognition results overwrite the chat draft
 * - Engine calls always use the language active at call time
 */

import type { StateCreator } from 'zustand';
import type { SpeechSupport } from '../../core/types';
import { BrowserSpeechEngine, type SpeechPorts } from '../../features/speech/services/browserSpeech';
import type { AgriStore } from '../agriStore';

export interface SpeechSlice {
  // State
  speechSupport: SpeechSupport;
  isListening: boolean;
  isSpeaking: boolean;
  speakingText: string | null;
  sttError: string | null;

  // Actions
  startListening: () => void;
  stopListening: () => void;
  toggleListening: () => void;
  speak: (text: string) => void;
  stopSpeaking: () => void;
}

/** Builds the slice over the given ports; the app store passes the browser's. */
export const createSpeechSlice = (ports: SpeechPorts): StateCreator<
  AgriStore,
  [['zustand/subscribeWithSelector', never], ['zustand/devtools', never]],
  [],
  SpeechSlice
> => (set, get) => {
  const engine = new BrowserSpeechEngine(ports, {
    onTranscript: transcript => get().setDraft(transcript),
    onRecognitionError: code => set({ sttError: code }),
  });

  engine.subscribe(state => {
    set({
      isListening: state.listening,
      isSpeaking: state.speaking,
      speakingText: state.speakingText,
    });
  });

  return {
    // Initial state
    speechSupport: engine.support,
    isListening: false,
    isSpeaking: false,
    speakingText: null,
    sttError: null,

    // Actions
    startListening: () => {
      set({ sttError: null });
      engine.startListening(get().language);
    },

    stopListening: () => engine.stopListening(),

    toggleListening: () => {
      if (get().isListening) {
        get().stopListening();
      } else {
        get().startListening();
      }
    },

    speak: (text: string) => {
      engine.speak(text, get().language);
    },

    stopSpeaking: () => engine.stopSpeaking(),
  };
};
