// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
import React from 'react';
import { Bug } from 'lucide-react';
import type { ChatAnalysis, ChatMessage } from '../../../core/types';
import type { TranslationFunction } from '../../../core/i18n';
import { formatConfidence, getLevelClasses } from '../../../shared/utils/common';
import SuggestionsList from './SuggestionsList';

interface ChatMessageBubbleProps {
  message: ChatMessage;
  t: TranslationFunction;
  isSending: boolean;
  onSuggestionClick: (suggestion: string) => void;
  onActionClick: (action: string) => void;
}

const AnalysisCard: React.FC<{ analysis: ChatAnalysis; t: TranslationFunction }> = ({ analysis, t }) => {
  const confidence = formatConfidence(analysis.confidence);
  return (
    <div className="mt-3 p-3 bg-gray-50 rounded-lg border text-gray-800">
      <h4 className="font-semibold text-sm mb-2 flex items-center gap-2">
        <Bug className="w-4 h-4 text-red-500" />
        {t('detectionResults')}
      </h4>
      <div className="space-y-1 text-sm">
        <p>
          <span className="font-medium">{t('disease')}:</span> {analysis.disease_name || '—'}
        </p>
        {confidence && (
          <p>
            <span className="font-medium">{t('confidence')}:</span> {confidence}
          </p>
        )}
        {analysis.urgency_level && (
          <p>
            <span className={`inline-block px-2 py-0.5 rounded text-xs font-medium ${getLevelClasses(analysis.urgency_level)}`}>
              {t('urgencyBadge', { level: analysis.urgency_level.toUpperCase() })}
            </span>
          </p>
        )}
      </div>
    </div>
  );
};

const ChatMessageBubble: React.FC<ChatMessageBubbleProps> = ({
  message,
  t,
  isSending,
  onSuggestionClick,
  onActionClick,
}) => {
  const isUser = message.role === 'user';

  return (
    <div className={`flex ${isUser ? 'justify-end' : 'justify-start'}`}>
      <div
        className={`max-w-[80%] rounded-2xl px-4 py-3 ${
          isUser
            ? 'bg-green-600 text-white rounded-br-md'
            : 'bg-white border border-gray-200 rounded-bl-md shadow-sm'
        }`}
      >
        {message.image && (
          <img src={message.image} alt="" className="max-w-full h-auto rounded-lg mb-2 max-h-48" />
        )}

        <p className="whitespace-pre-wrap">{message.content}</p>

        {message.analysis && !message.analysis.parse_error && (
          <AnalysisCard analysis={message.analysis} t={t} />
        )}

        <SuggestionsList
          suggestions={message.suggestions}
          actions={message.actions}
          disabled={isSending}
          onSuggestionClick={onSuggestionClick}
          onActionClick={onActionClick}
        />
      </div>
    </div>
  );
};

export default ChatMessageBubble;
