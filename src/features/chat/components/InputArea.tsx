// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
import React, { useRef } from 'react';
import { Image as ImageIcon, Leaf, Mic, MicOff, Send, Sun, Upload, Volume2, VolumeX, X } from 'lucide-react';
import type { ChatImageAttachment } from '../../../core/types';
import type { TranslationFunction } from '../../../core/i18n';
import { isImageFile, readFileAsDataUrl } from '../../../utils/mediaUtils';

interface InputAreaProps {
  t: TranslationFunction;
  draft: string;
  attachedImage: ChatImageAttachment | null;
  isSending: boolean;
  isListening: boolean;
  isSpeaking: boolean;
  speakingText: string | null;
  sttError: string | null;
  voiceEnabled: boolean;
  recognitionSupported: boolean;
  synthesisSupported: boolean;
  onDraftChange: (draft: string) => void;
  onAttachImage: (image: ChatImageAttachment | null) => void;
  onSend: () => void;
  onToggleListening: () => void;
  onStopSpeaking: () => void;
  onToggleVoice: () => void;
}

const InputArea: React.FC<InputAreaProps> = ({
  t,
  draft,
  attachedImage,
  isSending,
  isListening,
  isSpeaking,
  speakingText,
  sttError,
  voiceEnabled,
  recognitionSupported,
  synthesisSupported,
  onDraftChange,
  onAttachImage,
  onSend,
  onToggleListening,
  onStopSpeaking,
  onToggleVoice,
}) => {
  const fileInputRef = useRef<HTMLInputElement>(null);
  const canSend = !isSending && (draft.trim().length > 0 || attachedImage !== null);

  const handleImageSelect = (e: React.ChangeEvent<HTMLInputElement>) => {
    const file = e.target.files?.[0];
    if (!file || !isImageFile(file)) return;
    readFileAsDataUrl(file)
      .then(dataUrl => onAttachImage({ file, fileName: file.name, dataUrl }))
      .catch(error => console.error('Failed to read selected image:', error));
  };

  const handleRemoveImage = () => {
    onAttachImage(null);
    if (fileInputRef.current) fileInputRef.current.value = '';
  };

  const handleKeyDown = (e: React.KeyboardEvent<HTMLTextAreaElement>) => {
    if (e.key === 'Enter' && !e.shiftKey) {
      e.preventDefault();
      if (canSend) onSend();
    }
  };

  const handleSpeakerClick = () => {
    if (isSpeaking) {
      onStopSpeaking();
    } else {
      onToggleVoice();
    }
  };

  return (
    <div className="bg-white border-t border-gray-200">
      {attachedImage && (
        <div className="px-4 pt-3">
          <div className="relative inline-block">
            <img src={attachedImage.dataUrl} alt="" className="h-20 w-auto rounded-lg border border-gray-200" />
            <button
              onClick={handleRemoveImage}
              className="absolute -top-2 -right-2 bg-red-500 text-white rounded-full p-1 hover:bg-red-600"
              title={t('removeImage')}
            >
              <X className="w-3 h-3" />
            </button>
          </div>
        </div>
      )}

      <div className="p-4">
        <div className="flex items-end gap-2">
          <input
            type="file"
            ref={fileInputRef}
            onChange={handleImageSelect}
            accept="image/*"
            className="hidden"
          />
          <button
            onClick={() => fileInputRef.current?.click()}
            className="p-3 text-gray-500 hover:text-green-600 hover:bg-gray-100 rounded-full transition-colors"
            title={t('attachImage')}
          >
            <ImageIcon className="w-5 h-5" />
          </button>

          {recognitionSupported && (
            <button
              onClick={onToggleListening}
              className={`p-3 rounded-full transition-colors ${
                isListening
                  ? 'bg-red-500 text-white animate-pulse hover:bg-red-600'
                  : 'text-gray-500 hover:text-green-600 hover:bg-gray-100'
              }`}
              title={isListening ? t('stopListening') : t('voiceInput')}
            >
              {isListening ? <MicOff className="w-5 h-5" /> : <Mic className="w-5 h-5" />}
            </button>
          )}

          <textarea
            value={draft}
            onChange={e => onDraftChange(e.target.value)}
            onKeyDown={handleKeyDown}
            placeholder={isListening ? t('listening') : t('placeholder')}
            className={`flex-1 px-4 py-3 border rounded-2xl resize-none focus:outline-none focus:ring-2 focus:ring-green-500 focus:border-transparent ${
              isListening ? 'border-red-300 bg-red-50' : 'border-gray-200'
            }`}
            rows={1}
          />

          {synthesisSupported && (
            <button
              onClick={handleSpeakerClick}
              className={`p-3 rounded-full transition-colors ${
                isSpeaking
                  ? 'bg-green-500 text-white animate-pulse'
                  : voiceEnabled
                    ? 'text-green-600 hover:bg-gray-100'
                    : 'text-gray-400 hover:bg-gray-100'
              }`}
              title={isSpeaking ? t('stopSpeaking') : voiceEnabled ? t('voiceEnabled') : t('voiceDisabled')}
            >
              {voiceEnabled ? <Volume2 className="w-5 h-5" /> : <VolumeX className="w-5 h-5" />}
            </button>
          )}

          <button
            onClick={onSend}
            disabled={!canSend}
            className="p-3 bg-green-600 text-white rounded-full hover:bg-green-700 disabled:opacity-50 disabled:cursor-not-allowed transition-colors"
            title={t('send')}
          >
            <Send className="w-5 h-5" />
          </button>
        </div>

        {isListening && (
          <div className="mt-2 flex items-center justify-center gap-2 text-red-600 text-sm">
            <div className="w-2 h-2 bg-red-500 rounded-full animate-pulse" />
            <span>{t('speakQuestion')}</span>
          </div>
        )}

        {!isListening && sttError && (
          <p role="alert" className="mt-2 text-center text-sm text-red-600">
            {t('voiceInputError', { code: sttError })}
          </p>
        )}

        {isSpeaking && speakingText && (
          <div className="mt-2 flex items-center gap-2 text-green-700 text-sm">
            <Volume2 className="w-4 h-4 flex-shrink-0" />
            <span className="truncate" title={speakingText}>{speakingText}</span>
          </div>
        )}

        <div className="mt-3 flex flex-wrap gap-2">
          <button
            onClick={() => onDraftChange(t('quickWeatherPrompt'))}
            className="text-xs px-3 py-1.5 bg-gray-100 text-gray-700 rounded-full hover:bg-gray-200 transition-colors flex items-center gap-1"
          >
            <Sun className="w-3 h-3" /> {t('weatherRisk')}
          </button>
          <button
            onClick={() => fileInputRef.current?.click()}
            className="text-xs px-3 py-1.5 bg-gray-100 text-gray-700 rounded-full hover:bg-gray-200 transition-colors flex items-center gap-1"
          >
            <Upload className="w-3 h-3" /> {t('scanPlant')}
          </button>
          <button
            onClick={() => onDraftChange(t('quickDiseasePrompt'))}
            className="text-xs px-3 py-1.5 bg-gray-100 text-gray-700 rounded-full hover:bg-gray-200 transition-colors flex items-center gap-1"
          >
            <Leaf className="w-3 h-3" /> {t('diseaseGuide')}
          </button>
          {recognitionSupported && (
            <button
              onClick={onToggleListening}
              className="text-xs px-3 py-1.5 bg-green-100 text-green-700 rounded-full hover:bg-green-200 transition-colors flex items-center gap-1"
            >
              <Mic className="w-3 h-3" /> {t('voiceCommand')}
            </button>
          )}
        </div>
      </div>
    </div>
  );
};

export default InputArea;
