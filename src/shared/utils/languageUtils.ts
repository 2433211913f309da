// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
/** "en" for "en-US"; the tag itself when it has no region. */
export const getBaseSubtag = (code: string): string => (code || '').split('-')[0].trim().toLowerCase();
