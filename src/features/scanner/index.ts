// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
/**
 * Scanner Feature - Public API
 *
 * Leaf photo analysis and quick photo questions. Holds no store state;
 * requests run through useRequest.
 */

export { default as PlantScanner } from './components/PlantScanner';
