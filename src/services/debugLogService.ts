// Copyright 2025 Roni Tervo
//
// SPDX-License-Identifier: Apache-2.0

export interface LogEntry {
  id: string;
  timestamp: number;
  /** Gateway operation, e.g. "chat.message". */
  type: string;
  /** HTTP method and path. */
  endpoint: string;
  request: unknown;
  response?: unknown;
  error?: unknown;
  duration?: number;
}

export interface LogHandle {
  complete: (responsePayload: unknown) => void;
  error: (errorPayload: unknown) => void;
}

type LogListener = (logs: LogEntry[]) => void;

export const MAX_LOG_ENTRIES = 50;

const toSerializable = (payload: unknown): unknown => {
  if (typeof FormData !== 'undefined' && payload instanceof FormData) {
    const fields: Record<string, string> = {};
    payload.forEach((value, key) => {
      fields[key] = typeof value === 'string' ? value : `[file ${value.name || 'blob'} ${value.size}B]`;
    });
    return fields;
  }
  try {
    return JSON.parse(JSON.stringify(payload ?? null));
  } catch {
    return '[Unserializable Payload]';
  }
};

const describeError = (errorPayload: unknown): unknown => {
  if (errorPayload instanceof Error) {
    return { name: errorPayload.name, message: errorPayload.message };
  }
  return toSerializable(errorPayload);
};

export class DebugLogService {
  private logs: LogEntry[] = [];
  private listeners: Set<LogListener> = new Set();

  public subscribe(listener: LogListener): () => void {
    this.listeners.add(listener);
    listener([...this.logs]);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify() {
    const logsCopy = [...this.logs];
    this.listeners.forEach(l => l(logsCopy));
  }

  public logRequest(type: string, endpoint: string, requestPayload: unknown): LogHandle {
    const id = Math.random().toString(36).substring(7);
    const timestamp = Date.now();

    const entry: LogEntry = {
      id,
      timestamp,
      type,
      endpoint,
      request: toSerializable(requestPayload),
    };

    this.logs = [entry, ...this.logs].slice(0, MAX_LOG_ENTRIES);
    this.notify();

    return {
      complete: (responsePayload: unknown) => {
        this.updateEntry(id, { response: toSerializable(responsePayload), duration: Date.now() - timestamp });
      },
      error: (errorPayload: unknown) => {
        this.updateEntry(id, { error: describeError(errorPayload), duration: Date.now() - timestamp });
      },
    };
  }

  private updateEntry(id: string, updates: Partial<LogEntry>) {
    this.logs = this.logs.map(log => log.id === id ? { ...log, ...updates } : log);
    this.notify();
  }

  public getLogs(): LogEntry[] {
    return [...this.logs];
  }

  public clear() {
    this.logs = [];
    this.notify();
  }
}

export const debugLogService = new DebugLogService();
