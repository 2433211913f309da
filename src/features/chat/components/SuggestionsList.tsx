// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
import React from 'react';
import type { ChatAction } from '../../../core/types';

interface SuggestionsListProps {
  suggestions?: string[];
  actions?: ChatAction[];
  disabled: boolean;
  onSuggestionClick: (suggestion: string) => void;
  onActionClick: (action: string) => void;
}

const SuggestionsList: React.FC<SuggestionsListProps> = ({
  suggestions = [],
  actions = [],
  disabled,
  onSuggestionClick,
  onActionClick,
}) => {
  if (suggestions.length === 0 && actions.length === 0) return null;

  return (
    <div className="mt-3 flex flex-wrap gap-2">
      {suggestions.map((suggestion, idx) => (
        <button
          key={`s-${idx}`}
          onClick={() => onSuggestionClick(suggestion)}
          className="text-xs px-3 py-1.5 bg-green-50 text-green-700 rounded-full hover:bg-green-100 transition-colors"
        >
          {suggestion}
        </button>
      ))}
      {actions.map((action, idx) => (
        <button
          key={`a-${idx}`}
          onClick={() => onActionClick(action.action)}
          disabled={disabled}
          className="text-xs px-3 py-1.5 bg-green-600 text-white rounded-full hover:bg-green-700 disabled:opacity-50 transition-colors"
        >
          {action.label}
        </button>
      ))}
    </div>
  );
};

export default SuggestionsList;
