// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
import { MAX_SPOKEN_CHARS } from '../../../core/config/app';

// Pictographs, regional-indicator flags, variation selectors and joiners.
const EMOJI_PATTERN = /[\p{Extended_Pictographic}\u{1F1E6}-\u{1F1FF}\u{FE0F}\u{200D}]/gu;
const MARKDOWN_MARKERS = /\*\*|__|[*`#]/g;

/**
 * Turns an assistant reply into text a speech engine can read aloud.
 * Line breaks become sentence pauses; the result is capped at MAX_SPOKEN_CHARS
 * code points, so a surrogate pair is never split.
 */
export const sanitizeForSpeech = (text: string, maxChars: number = MAX_SPOKEN_CHARS): string => {
  const cleaned = text
    .replace(EMOJI_PATTERN, '')
    .replace(MARKDOWN_MARKERS, '')
    .replace(/\s*\n+\s*/g, '. ')
    .replace(/\.(\s*\.)+/g, '.')
    .replace(/\s+/g, ' ')
    .trim();
  return Array.from(cleaned).slice(0, maxChars).join('').trim();
};
