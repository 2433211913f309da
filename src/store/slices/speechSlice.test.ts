// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createAgriStore } from '../agriStore';
import type {
  RecognitionSession,
  SpeechRecognitionPort,
  SpeechSynthesisPort,
  UtteranceRequest,
} from '../../features/speech/services/browserSpeech';

class FakeSynthesis implements SpeechSynthesisPort {
  requests: UtteranceRequest[] = [];

  speak = (request: UtteranceRequest) => {
    this.requests.push(request);
  };
  cancel = () => undefined;
  getVoices = () => [];
}

class FakeRecognition implements SpeechRecognitionPort {
  sessions: RecognitionSession[] = [];

  start = (session: RecognitionSession) => {
    this.sessions.push(session);
  };
  stop = () => undefined;
}

describe('speechSlice', () => {
  let recognition: FakeRecognition;
  let synthesis: FakeSynthesis;
  let store: ReturnType<typeof createAgriStore>;

  beforeEach(() => {
    recognition = new FakeRecognition();
    synthesis = new FakeSynthesis();
    store = createAgriStore({ recognition, synthesis });
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('listens in the active language and writes results into the draft', () => {
    store.setState({ language: 'hi-IN' });

    store.getState().toggleListening();
    recognition.sessions[0].onResult('टमाटर के पत्ते', true);

    expect(recognition.sessions[0].lang).toBe('hi-IN');
    expect(store.getState().draft).toBe('टमाटर के पत्ते');
    expect(store.getState().isListening).toBe(false);
  });

  it('keeps the recognition error until listening starts again', () => {
    store.getState().startListening();
    recognition.sessions[0].onError('not-allowed');

    expect(store.getState().sttError).toBe('not-allowed');
    expect(store.getState().isListening).toBe(false);

    store.getState().startListening();
    expect(store.getState().sttError).toBeNull();
    expect(store.getState().isListening).toBe(true);
  });

  it('leaves sttError alone when playback fails', () => {
    store.getState().speak('Spray in the evening');
    expect(store.getState().speakingText).toBe('Spray in the evening');

    synthesis.requests[0].onError('audio-busy');

    expect(store.getState().sttError).toBeNull();
    expect(store.getState().isSpeaking).toBe(false);
    expect(store.getState().speakingText).toBeNull();
  });
});
