// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
/**
 * Chat Feature - Public API
 *
 * This is the single entry point for chat functionality.
 * External code should only import from this file.
 *
 * Owned Store Slice: chatSlice
 */

// Components
export { default as ChatInterface } from './components/ChatInterface';
export { default as ChatMessageBubble } from './components/ChatMessageBubble';
export { default as InputArea } from './components/InputArea';
export { default as SuggestionsList } from './components/SuggestionsList';
export { default as WelcomePanel } from './components/WelcomePanel';
