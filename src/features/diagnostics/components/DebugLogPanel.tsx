// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
import React, { useEffect, useState } from 'react';
import { ChevronDown, ChevronUp, Terminal, Trash2, X } from 'lucide-react';
import { debugLogService, type LogEntry } from '../../../services/debugLogService';
import type { TranslationFunction } from '../../../core/i18n';

interface DebugLogPanelProps {
  onClose: () => void;
  t: TranslationFunction;
}

const formatTime = (timestamp: number) =>
  new Date(timestamp).toLocaleTimeString([], { hour12: false, hour: '2-digit', minute: '2-digit', second: '2-digit' });

const DebugLogPanel: React.FC<DebugLogPanelProps> = ({ onClose, t }) => {
  const [logs, setLogs] = useState<LogEntry[]>([]);
  const [expandedId, setExpandedId] = useState<string | null>(null);

  useEffect(() => debugLogService.subscribe(setLogs), []);

  const toggleExpand = (id: string) => {
    setExpandedId(prev => (prev === id ? null : id));
  };

  return (
    <div className="fixed inset-y-0 right-0 w-full sm:w-[480px] bg-slate-900 shadow-2xl z-[100] flex flex-col border-l border-slate-700 font-mono text-sm">
      <div className="flex items-center justify-between px-4 py-3 bg-slate-800 border-b border-slate-700">
        <h2 className="text-slate-200 font-semibold flex items-center gap-2">
          <Terminal className="w-4 h-4 text-green-400" /> {t('requestLog')}
        </h2>
        <div className="flex items-center gap-2">
          <button
            onClick={() => debugLogService.clear()}
            className="p-1.5 text-slate-400 hover:text-red-400 hover:bg-slate-700 rounded transition-colors"
            title={t('clearLog')}
          >
            <Trash2 className="w-4 h-4" />
          </button>
          <button
            onClick={onClose}
            className="p-1.5 text-slate-400 hover:text-white hover:bg-slate-700 rounded transition-colors"
            title={t('close')}
          >
            <X className="w-5 h-5" />
          </button>
        </div>
      </div>

      <div className="flex-1 overflow-y-auto p-2 space-y-2 bg-slate-900">
        {logs.length === 0 && (
          <div className="text-slate-500 text-center py-10 italic">{t('noLogEntries')}</div>
        )}
        {logs.map(log => {
          const isExpanded = expandedId === log.id;
          const isError = log.error !== undefined;
          const duration = log.duration !== undefined ? `${log.duration}ms` : t('pendingRequest');

          return (
            <div
              key={log.id}
              className={`rounded border ${isError ? 'border-red-800 bg-red-900/10' : 'border-slate-700 bg-slate-800/50'} overflow-hidden`}
            >
              <button
                className="w-full px-3 py-2 flex items-center justify-between hover:bg-white/5 text-left"
                onClick={() => toggleExpand(log.id)}
              >
                <div className="flex items-center gap-2 overflow-hidden">
                  <span className={`text-xs ${isError ? 'text-red-400' : 'text-slate-500'}`}>{formatTime(log.timestamp)}</span>
                  <span className={`font-semibold truncate ${isError ? 'text-red-300' : 'text-blue-300'}`}>{log.type}</span>
                  <span className="text-xs text-slate-500 truncate hidden sm:inline-block">{log.endpoint}</span>
                </div>
                <div className="flex items-center gap-2 text-xs">
                  <span className={isError ? 'text-red-400' : 'text-green-400'}>{duration}</span>
                  {isExpanded ? <ChevronUp className="w-3 h-3 text-slate-600" /> : <ChevronDown className="w-3 h-3 text-slate-600" />}
                </div>
              </button>

              {isExpanded && (
                <div className="border-t border-slate-700/50">
                  <div className="bg-slate-950/50 p-2">
                    <div className="text-xs text-slate-400 uppercase font-bold mb-1 px-1">{t('requestPayload')}</div>
                    <pre className="text-xs text-slate-300 whitespace-pre-wrap break-all bg-black/20 p-2 rounded max-h-60 overflow-y-auto">
                      {JSON.stringify(log.request, null, 2)}
                    </pre>
                  </div>

                  {(log.response !== undefined || isError) && (
                    <div className="bg-slate-950/30 p-2 border-t border-slate-800/50">
                      <div className={`text-xs uppercase font-bold mb-1 px-1 ${isError ? 'text-red-400' : 'text-green-400'}`}>
                        {isError ? t('error') : t('responsePayload')}
                      </div>
                      <pre className={`text-xs whitespace-pre-wrap break-all bg-black/20 p-2 rounded max-h-60 overflow-y-auto ${isError ? 'text-red-300' : 'text-green-300'}`}>
                        {JSON.stringify(isError ? log.error : log.response, null, 2)}
                      </pre>
                    </div>
                  )}
                </div>
              )}
            </div>
          );
        })}
      </div>
    </div>
  );
};

export default DebugLogPanel;
