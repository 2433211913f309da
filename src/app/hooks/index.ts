// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
/**
 * App Hooks - Barrel exports for application-level hooks.
 */

export { useAppLifecycle } from './useAppLifecycle';
export { useAppInitialization } from './useAppInitialization';
