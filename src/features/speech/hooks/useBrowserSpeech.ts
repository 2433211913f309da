// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
import { useEffect } from 'react';
import { useShallow } from 'zustand/react/shallow';
import { useAgriStore } from '../../../store';
import type { SpeechSupport } from '../../../core/types';

interface UseBrowserSpeechReturn {
  support: SpeechSupport;
  isListening: boolean;
  isSpeaking: boolean;
  speakingText: string | null;
  sttError: string | null;
  toggleListening: () => void;
  stopListening: () => void;
  speak: (text: string) => void;
  stopSpeaking: () => void;
}

/**
 * Component-facing view of the speech slice.
 * Stops any recognition or playback when the owning component unmounts.
 */
export const useBrowserSpeech = (): UseBrowserSpeechReturn => {
  const speech = useAgriStore(
    useShallow(state => ({
      support: state.speechSupport,
      isListening: state.isListening,
      isSpeaking: state.isSpeaking,
      speakingText: state.speakingText,
      sttError: state.sttError,
      toggleListening: state.toggleListening,
      stopListening: state.stopListening,
      speak: state.speak,
      stopSpeaking: state.stopSpeaking,
    }))
  );

  // Cleanup on unmount
  useEffect(() => {
    return () => {
      const state = useAgriStore.getState();
      state.stopListening();
      state.stopSpeaking();
    };
  }, []);

  return speech;
};

export default useBrowserSpeech;
