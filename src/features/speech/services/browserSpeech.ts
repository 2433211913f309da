// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
/**
 * Browser speech engine.
 *
 * Wraps the Web Speech API behind two small ports so the state machine can be
 * driven by fakes. One recognizer session and one utterance at a time: a new
 * utterance cancels the previous one, and callbacks from a superseded session
 * or utterance are ignored.
 */

import type { SpeechRecognitionConstructor, SpeechSupport } from '../../../core/types';
import { getBaseSubtag } from '../../../shared/utils/languageUtils';
import { sanitizeForSpeech } from '../utils/speechText';

export interface RecognitionSession {
  lang: string;
  onResult: (transcript: string, isFinal: boolean) => void;
  onError: (code: string) => void;
  onEnd: () => void;
}

export interface SpeechRecognitionPort {
  start: (session: RecognitionSession) => void;
  stop: () => void;
}

export interface VoiceInfo {
  name: string;
  lang: string;
  voiceURI: string;
}

export interface UtteranceRequest {
  text: string;
  lang: string;
  voiceURI?: string;
  onStart: () => void;
  onEnd: () => void;
  onError: (code: string) => void;
}

export interface SpeechSynthesisPort {
  speak: (request: UtteranceRequest) => void;
  cancel: () => void;
  getVoices: () => VoiceInfo[];
}

export interface SpeechPorts {
  recognition: SpeechRecognitionPort | null;
  synthesis: SpeechSynthesisPort | null;
}

export interface SpeechEngineState {
  listening: boolean;
  speaking: boolean;
  speakingText: string | null;
}

export interface SpeechEngineHandlers {
  /** Every recognition result, interim or final. */
  onTranscript?: (transcript: string) => void;
  /** Recognition failures only; synthesis failures are logged and end the utterance. */
  onRecognitionError?: (code: string) => void;
}

type StateListener = (state: SpeechEngineState) => void;

const IDLE_STATE: SpeechEngineState = { listening: false, speaking: false, speakingText: null };

/** Exact locale first, then any voice sharing the base subtag. */
export const pickVoice = (voices: VoiceInfo[], lang: string): VoiceInfo | undefined => {
  const normalized = lang.replace('_', '-').toLowerCase();
  const exact = voices.find(v => v.lang.replace('_', '-').toLowerCase() === normalized);
  if (exact) return exact;
  const base = getBaseSubtag(lang);
  return voices.find(v => getBaseSubtag(v.lang.replace('_', '-')) === base);
};

const createRecognitionPort = (Recognition: SpeechRecognitionConstructor): SpeechRecognitionPort => {
  const recognizer = new Recognition();
  return {
    start: (session) => {
      recognizer.continuous = false;
      recognizer.interimResults = true;
      recognizer.lang = session.lang;
      recognizer.onresult = (event) => {
        const last = event.results[event.results.length - 1];
        if (!last || last.length === 0) return;
        session.onResult(last[0].transcript, last.isFinal);
      };
      recognizer.onerror = (event) => session.onError(event.error);
      recognizer.onend = () => session.onEnd();
      recognizer.start();
    },
    stop: () => recognizer.stop(),
  };
};

const createSynthesisPort = (synth: SpeechSynthesis): SpeechSynthesisPort => ({
  speak: (request) => {
    const utterance = new SpeechSynthesisUtterance(request.text);
    utterance.lang = request.lang;
    utterance.rate = 1;
    utterance.pitch = 1;
    const voice = request.voiceURI ? synth.getVoices().find(v => v.voiceURI === request.voiceURI) : undefined;
    if (voice) utterance.voice = voice;
    utterance.onstart = () => request.onStart();
    utterance.onend = () => request.onEnd();
    utterance.onerror = (event) => request.onError(event.error);
    synth.speak(utterance);
  },
  cancel: () => synth.cancel(),
  getVoices: () => synth.getVoices().map(v => ({ name: v.name, lang: v.lang, voiceURI: v.voiceURI })),
});

/** Ports backed by the real browser APIs; halves the host lacks are null. */
export const createBrowserSpeechPorts = (): SpeechPorts => {
  if (typeof window === 'undefined') return { recognition: null, synthesis: null };
  const Recognition = window.SpeechRecognition ?? window.webkitSpeechRecognition;
  const hasSynthesis = 'speechSynthesis' in window && typeof SpeechSynthesisUtterance !== 'undefined';
  return {
    recognition: Recognition ? createRecognitionPort(Recognition) : null,
    synthesis: hasSynthesis ? createSynthesisPort(window.speechSynthesis) : null,
  };
};

export const detectSpeechSupport = (ports: SpeechPorts): SpeechSupport => ({
  recognition: ports.recognition !== null,
  synthesis: ports.synthesis !== null,
});

export class BrowserSpeechEngine {
  public readonly support: SpeechSupport;
  private state: SpeechEngineState = IDLE_STATE;
  private listeners: Set<StateListener> = new Set();
  private sessionSeq = 0;
  private activeSession = 0;
  private utteranceSeq = 0;
  private activeUtterance = 0;

  constructor(private readonly ports: SpeechPorts, private readonly handlers: SpeechEngineHandlers = {}) {
    this.support = detectSpeechSupport(ports);
  }

  public getState(): SpeechEngineState {
    return this.state;
  }

  public subscribe(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private update(patch: Partial<SpeechEngineState>) {
    this.state = { ...this.state, ...patch };
    const snapshot = this.state;
    this.listeners.forEach(l => l(snapshot));
  }

  /** Returns false when recognition is unsupported or a session is already running. */
  public startListening(lang: string): boolean {
    const recognition = this.ports.recognition;
    if (!recognition || this.state.listening) return false;

    const session = ++this.sessionSeq;
    this.activeSession = session;
    this.update({ listening: true });

    const finish = () => {
      if (this.activeSession !== session) return;
      this.activeSession = 0;
      this.update({ listening: false });
    };

    try {
      recognition.start({
        lang,
        onResult: (transcript, isFinal) => {
          if (this.activeSession !== session) return;
          this.handlers.onTranscript?.(transcript);
          if (isFinal) finish();
        },
        onError: (code) => {
          if (this.activeSession !== session) return;
          console.warn('Speech recognition error:', code);
          this.handlers.onRecognitionError?.(code);
          finish();
        },
        onEnd: finish,
      });
    } catch (error) {
      console.error('Failed to start speech recognition:', error);
      this.handlers.onRecognitionError?.(error instanceof Error ? error.message : String(error));
      finish();
      return false;
    }
    return true;
  }

  public stopListening() {
    if (!this.ports.recognition || !this.state.listening) return;
    this.activeSession = 0;
    this.ports.recognition.stop();
    this.update({ listening: false });
  }

  /** Returns false when synthesis is unsupported or nothing speakable remains. */
  public speak(text: string, lang: string): boolean {
    const synthesis = this.ports.synthesis;
    if (!synthesis) return false;
    const spoken = sanitizeForSpeech(text);
    if (!spoken) return false;

    synthesis.cancel();
    const utterance = ++this.utteranceSeq;
    this.activeUtterance = utterance;
    this.update({ speaking: true, speakingText: spoken });

    const finish = () => {
      if (this.activeUtterance !== utterance) return;
      this.activeUtterance = 0;
      this.update({ speaking: false, speakingText: null });
    };

    synthesis.speak({
      text: spoken,
      lang,
      voiceURI: pickVoice(synthesis.getVoices(), lang)?.voiceURI,
      onStart: () => {
        if (this.activeUtterance === utterance && !this.state.speaking) {
          this.update({ speaking: true, speakingText: spoken });
        }
      },
      onEnd: finish,
      onError: (code) => {
        if (this.activeUtterance !== utterance) return;
        console.warn('Speech synthesis error:', code);
        finish();
      },
    });
    return true;
  }

  public stopSpeaking() {
    if (!this.ports.synthesis) return;
    this.activeUtterance = 0;
    this.ports.synthesis.cancel();
    if (this.state.speaking) this.update({ speaking: false, speakingText: null });
  }
}
