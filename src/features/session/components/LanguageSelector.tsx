// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
import React, { useEffect, useRef } from 'react';
import { Check, Globe } from 'lucide-react';
import { useAgriStore } from '../../../store';
import { useLanguage } from '../hooks/useLanguage';

const LanguageSelector: React.FC = () => {
  const { language, setLanguage, getActiveLanguage, languages, t } = useLanguage();
  const isOpen = useAgriStore(state => state.isLanguageMenuOpen);
  const setIsOpen = useAgriStore(state => state.setIsLanguageMenuOpen);
  const containerRef = useRef<HTMLDivElement>(null);
  const active = getActiveLanguage();

  // Close on outside click
  useEffect(() => {
    if (!isOpen) return;
    const handlePointerDown = (e: PointerEvent) => {
      if (containerRef.current && e.target instanceof Node && !containerRef.current.contains(e.target)) {
        setIsOpen(false);
      }
    };
    document.addEventListener('pointerdown', handlePointerDown);
    return () => document.removeEventListener('pointerdown', handlePointerDown);
  }, [isOpen, setIsOpen]);

  const handleSelect = (code: string) => {
    setLanguage(code);
    setIsOpen(false);
  };

  return (
    <div className="relative" ref={containerRef}>
      <button
        onClick={() => setIsOpen(!isOpen)}
        className="flex items-center gap-2 px-3 py-1.5 bg-white/10 hover:bg-white/20 rounded-full transition-colors text-sm"
        title={t('language')}
        aria-haspopup="listbox"
        aria-expanded={isOpen}
      >
        <Globe className="w-4 h-4" />
        <span>{active.flag}</span>
        <span className="hidden sm:inline">{active.displayName}</span>
      </button>

      {isOpen && (
        <ul
          role="listbox"
          className="absolute right-0 top-full mt-1 bg-white text-gray-800 rounded-lg shadow-lg border border-gray-200 py-2 z-50 max-h-80 overflow-y-auto w-48"
        >
          {languages.map(lang => (
            <li key={lang.code} role="option" aria-selected={language === lang.code}>
              <button
                onClick={() => handleSelect(lang.code)}
                className={`w-full px-4 py-2 text-left hover:bg-gray-100 flex items-center gap-2 text-sm ${
                  language === lang.code ? 'bg-green-50 text-green-700' : ''
                }`}
              >
                <span>{lang.flag}</span>
                <span>{lang.displayName}</span>
                {language === lang.code && <Check className="w-4 h-4 ml-auto text-green-600" />}
              </button>
            </li>
          ))}
        </ul>
      )}
    </div>
  );
};

export default LanguageSelector;
