// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
/**
 * IPM Feature - Public API
 *
 * Integrated pest management planner: full strategy, quick recommendation
 * and 7-day outbreak prediction.
 */

export { default as IPMPlanner } from './components/IPMPlanner';
export { buildStrategyRequest, resolveDiseaseName, CUSTOM_DISEASE } from './utils/strategyRequest';
