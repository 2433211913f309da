// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
/**
 * Diagnostics Feature - Public API
 *
 * Request log of every backend call made through the gateway.
 * Panel visibility lives in uiSlice (isDebugLogOpen).
 */

// Components
export { default as DebugLogPanel } from './components/DebugLogPanel';

// Services
export { debugLogService, DebugLogService, MAX_LOG_ENTRIES } from '../../services/debugLogService';
export type { LogEntry, LogHandle } from '../../services/debugLogService';
