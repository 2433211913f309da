// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0

/** Tailwind classes for urgency and risk levels reported by the backend. */
export const getLevelClasses = (level: string | undefined): string => {
  switch ((level || '').toLowerCase()) {
    case 'critical':
    case 'very_high':
      return 'bg-red-100 text-red-800';
    case 'high':
    case 'poor':
      return 'bg-orange-100 text-orange-800';
    case 'medium':
    case 'moderate':
      return 'bg-yellow-100 text-yellow-800';
    case 'unknown':
      return 'bg-gray-100 text-gray-600';
    default:
      return 'bg-green-100 text-green-800';
  }
};

/** Backend confidences are 0..1; rounds to a whole percentage. */
export const formatConfidence = (confidence: number | undefined): string | null =>
  typeof confidence === 'number' && Number.isFinite(confidence) ? `${Math.round(confidence * 100)}%` : null;

/** "late_blight" -> "Late Blight" */
export const humanize = (value: string): string =>
  value
    .split('_')
    .filter(Boolean)
    .map(part => part.charAt(0).toUpperCase() + part.slice(1))
    .join(' ');

/** Rounded reading with its unit, or "-" when the backend sent none. */
export const formatMeasure = (value: number | undefined, unit: string, digits: number = 0): string =>
  typeof value === 'number' && Number.isFinite(value) ? `${value.toFixed(digits)}${unit}` : '-';
