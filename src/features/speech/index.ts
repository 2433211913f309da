// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
/**
 * Speech Feature - Public API
 *
 * This is the single entry point for speech (TTS/STT) functionality.
 * External code should only import from this file.
 *
 * Owned Store Slice: speechSlice
 */

// Hooks
export { default as useBrowserSpeech } from './hooks/useBrowserSpeech';

// Services
export {
  BrowserSpeechEngine,
  createBrowserSpeechPorts,
  detectSpeechSupport,
  pickVoice,
  type SpeechPorts,
  type SpeechRecognitionPort,
  type SpeechSynthesisPort,
  type SpeechEngineState,
} from './services/browserSpeech';

// Utils
export { sanitizeForSpeech } from './utils/speechText';
