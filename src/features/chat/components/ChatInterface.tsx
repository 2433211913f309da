// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
import React, { useCallback, useEffect, useRef } from 'react';
import { useShallow } from 'zustand/react/shallow';
import { selectIsSending, useAgriStore } from '../../../store';
import { useLanguage } from '../../session/hooks/useLanguage';
import { useBrowserSpeech } from '../../speech/hooks/useBrowserSpeech';
import ChatMessageBubble from './ChatMessageBubble';
import InputArea from './InputArea';
import WelcomePanel from './WelcomePanel';

const ChatInterface: React.FC = () => {
  const { t, getActiveLanguage } = useLanguage();
  const speech = useBrowserSpeech();
  const messagesEndRef = useRef<HTMLDivElement>(null);

  const {
    messages,
    draft,
    attachedImage,
    isSending,
    voiceEnabled,
    sendMessage,
    runAction,
    setDraft,
    setAttachedImage,
    toggleVoiceEnabled,
  } = useAgriStore(
    useShallow(state => ({
      messages: state.messages,
      draft: state.draft,
      attachedImage: state.attachedImage,
      isSending: selectIsSending(state),
      voiceEnabled: state.settings.voiceEnabled,
      sendMessage: state.sendMessage,
      runAction: state.runAction,
      setDraft: state.setDraft,
      setAttachedImage: state.setAttachedImage,
      toggleVoiceEnabled: state.toggleVoiceEnabled,
    }))
  );

  // Auto-scroll to the newest message
  useEffect(() => {
    messagesEndRef.current?.scrollIntoView({ behavior: 'smooth' });
  }, [messages.length, isSending]);

  const handleSend = useCallback(() => {
    if (speech.isListening) speech.stopListening();
    sendMessage(draft, attachedImage).catch(error => console.error('Chat send failed:', error));
  }, [draft, attachedImage, sendMessage, speech]);

  const handleAction = useCallback((action: string) => {
    runAction(action).catch(error => console.error('Chat action failed:', error));
  }, [runAction]);

  return (
    <div className="flex flex-col h-full bg-gray-50">
      <div className="flex-1 overflow-y-auto p-4 space-y-4">
        <WelcomePanel greeting={getActiveLanguage().greeting} t={t} />

        {messages.map(message => (
          <ChatMessageBubble
            key={message.id}
            message={message}
            t={t}
            isSending={isSending}
            onSuggestionClick={setDraft}
            onActionClick={handleAction}
          />
        ))}

        {isSending && (
          <div className="flex justify-start" aria-label={t('analyzing')}>
            <div className="bg-white border border-gray-200 rounded-2xl rounded-bl-md px-4 py-3 shadow-sm">
              <div className="flex items-center gap-1">
                <div className="w-2 h-2 bg-green-500 rounded-full animate-bounce" />
                <div className="w-2 h-2 bg-green-500 rounded-full animate-bounce [animation-delay:150ms]" />
                <div className="w-2 h-2 bg-green-500 rounded-full animate-bounce [animation-delay:300ms]" />
              </div>
            </div>
          </div>
        )}

        <div ref={messagesEndRef} />
      </div>

      <InputArea
        t={t}
        draft={draft}
        attachedImage={attachedImage}
        isSending={isSending}
        isListening={speech.isListening}
        isSpeaking={speech.isSpeaking}
        speakingText={speech.speakingText}
        sttError={speech.sttError}
        voiceEnabled={voiceEnabled}
        recognitionSupported={speech.support.recognition}
        synthesisSupported={speech.support.synthesis}
        onDraftChange={setDraft}
        onAttachImage={setAttachedImage}
        onSend={handleSend}
        onToggleListening={speech.toggleListening}
        onStopSpeaking={speech.stopSpeaking}
        onToggleVoice={toggleVoiceEnabled}
      />
    </div>
  );
};

export default ChatInterface;
