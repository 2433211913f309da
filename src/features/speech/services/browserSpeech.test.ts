// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  BrowserSpeechEngine,
  pickVoice,
  type RecognitionSession,
  type SpeechRecognitionPort,
  type SpeechSynthesisPort,
  type UtteranceRequest,
  type VoiceInfo,
} from './browserSpeech';

class FakeSynthesis implements SpeechSynthesisPort {
  requests: UtteranceRequest[] = [];
  cancelCount = 0;
  voices: VoiceInfo[] = [];

  speak = (request: UtteranceRequest) => {
    this.requests.push(request);
  };
  cancel = () => {
    this.cancelCount += 1;
  };
  getVoices = () => this.voices;
}

class FakeRecognition implements SpeechRecognitionPort {
  sessions: RecognitionSession[] = [];
  stopCount = 0;

  start = (session: RecognitionSession) => {
    this.sessions.push(session);
  };
  stop = () => {
    this.stopCount += 1;
  };
}

describe('BrowserSpeechEngine', () => {
  let synthesis: FakeSynthesis;
  let recognition: FakeRecognition;

  beforeEach(() => {
    synthesis = new FakeSynthesis();
    recognition = new FakeRecognition();
  });

  describe('speaking', () => {
    it('cancels the current utterance before starting a new one', () => {
      const engine = new BrowserSpeechEngine({ recognition: null, synthesis });

      engine.speak('First reply', 'en-US');
      engine.speak('Second reply', 'en-US');

      expect(synthesis.cancelCount).toBe(2);
      expect(synthesis.requests.map(r => r.text)).toEqual(['First reply', 'Second reply']);
      expect(engine.getState()).toEqual({ listening: false, speaking: true, speakingText: 'Second reply' });
    });

    it('ignores completion of a cancelled utterance', () => {
      const engine = new BrowserSpeechEngine({ recognition: null, synthesis });

      engine.speak('First reply', 'en-US');
      engine.speak('Second reply', 'en-US');
      synthesis.requests[0].onEnd();

      expect(engine.getState().speaking).toBe(true);
      expect(engine.getState().speakingText).toBe('Second reply');

      synthesis.requests[1].onEnd();
      expect(engine.getState()).toEqual({ listening: false, speaking: false, speakingText: null });
    });

    it('sends sanitized text to the synthesizer', () => {
      const engine = new BrowserSpeechEngine({ recognition: null, synthesis });

      engine.speak('🌱 **Late blight** detected\n\nAct now ✅', 'en-US');

      expect(synthesis.requests[0].text).toBe('Late blight detected. Act now');
    });

    it('does not speak text that sanitizes to nothing', () => {
      const engine = new BrowserSpeechEngine({ recognition: null, synthesis });

      expect(engine.speak('🌱 ✅', 'en-US')).toBe(false);
      expect(synthesis.requests).toHaveLength(0);
    });

    it('picks a voice for the requested language', () => {
      synthesis.voices = [
        { name: 'English', lang: 'en-GB', voiceURI: 'voice-en' },
        { name: 'Hindi', lang: 'hi-IN', voiceURI: 'voice-hi' },
      ];
      const engine = new BrowserSpeechEngine({ recognition: null, synthesis });

      engine.speak('नमस्ते', 'hi-IN');
      engine.speak('Hello', 'en-US');

      expect(synthesis.requests[0].voiceURI).toBe('voice-hi');
      expect(synthesis.requests[0].lang).toBe('hi-IN');
      expect(synthesis.requests[1].voiceURI).toBe('voice-en');
    });

    it('stops speaking immediately and ignores the late end event', () => {
      const engine = new BrowserSpeechEngine({ recognition: null, synthesis });
      const states: boolean[] = [];
      engine.subscribe(s => states.push(s.speaking));

      engine.speak('Spray in the evening', 'en-US');
      engine.stopSpeaking();
      synthesis.requests[0].onEnd();

      expect(states).toEqual([true, false]);
      expect(synthesis.cancelCount).toBe(2);
    });

    it('logs a synthesis failure without reporting it as a recognition error', () => {
      const onRecognitionError = vi.fn();
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const engine = new BrowserSpeechEngine({ recognition, synthesis }, { onRecognitionError });

      engine.speak('Spray in the evening', 'en-US');
      synthesis.requests[0].onError('audio-busy');

      expect(warn).toHaveBeenCalledWith('Speech synthesis error:', 'audio-busy');
      expect(onRecognitionError).not.toHaveBeenCalled();
      expect(engine.getState()).toEqual({ listening: false, speaking: false, speakingText: null });
      warn.mockRestore();
    });

    it('is a no-op when synthesis is unsupported', () => {
      const engine = new BrowserSpeechEngine({ recognition: null, synthesis: null });

      expect(engine.support).toEqual({ recognition: false, synthesis: false });
      expect(engine.speak('Hello', 'en-US')).toBe(false);
      engine.stopSpeaking();
      expect(engine.getState().speaking).toBe(false);
    });
  });

  describe('listening', () => {
    it('forwards every result and returns to idle on the final one', () => {
      const onTranscript = vi.fn();
      const engine = new BrowserSpeechEngine({ recognition, synthesis: null }, { onTranscript });

      expect(engine.startListening('es-ES')).toBe(true);
      const [session] = recognition.sessions;
      expect(session.lang).toBe('es-ES');

      session.onResult('hojas', false);
      expect(engine.getState().listening).toBe(true);
      session.onResult('hojas amarillas', true);

      expect(onTranscript.mock.calls).toEqual([['hojas'], ['hojas amarillas']]);
      expect(engine.getState().listening).toBe(false);
    });

    it('does not open a second session while listening', () => {
      const engine = new BrowserSpeechEngine({ recognition, synthesis: null });

      engine.startListening('en-US');
      expect(engine.startListening('en-US')).toBe(false);

      expect(recognition.sessions).toHaveLength(1);
    });

    it('returns to idle on a recognition error', () => {
      const onRecognitionError = vi.fn();
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const engine = new BrowserSpeechEngine({ recognition, synthesis: null }, { onRecognitionError });

      engine.startListening('en-US');
      recognition.sessions[0].onError('no-speech');

      expect(onRecognitionError).toHaveBeenCalledWith('no-speech');
      expect(engine.getState().listening).toBe(false);
      warn.mockRestore();
    });

    it('ignores results from a stopped session', () => {
      const onTranscript = vi.fn();
      const engine = new BrowserSpeechEngine({ recognition, synthesis: null }, { onTranscript });

      engine.startListening('en-US');
      engine.stopListening();
      engine.startListening('hi-IN');
      recognition.sessions[0].onResult('stale words', true);
      recognition.sessions[0].onEnd();

      expect(recognition.stopCount).toBe(1);
      expect(onTranscript).not.toHaveBeenCalled();
      expect(engine.getState().listening).toBe(true);
      expect(recognition.sessions[1].lang).toBe('hi-IN');
    });

    it('is a no-op when recognition is unsupported', () => {
      const engine = new BrowserSpeechEngine({ recognition: null, synthesis });

      expect(engine.startListening('en-US')).toBe(false);
      engine.stopListening();
      expect(engine.getState().listening).toBe(false);
    });
  });
});

describe('pickVoice', () => {
  const voices: VoiceInfo[] = [
    { name: 'Spanish (Mexico)', lang: 'es-MX', voiceURI: 'es-mx' },
    { name: 'Spanish (Spain)', lang: 'es_ES', voiceURI: 'es-es' },
  ];

  it('prefers an exact locale match', () => {
    expect(pickVoice(voices, 'es-ES')?.voiceURI).toBe('es-es');
  });

  it('falls back to the base language', () => {
    expect(pickVoice(voices, 'es-AR')?.voiceURI).toBe('es-mx');
  });

  it('returns undefined when no voice shares the language', () => {
    expect(pickVoice(voices, 'ta-IN')).toBeUndefined();
  });
});
