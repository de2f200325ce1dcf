import { ValidationError } from './errors.js';

/**
 * Convert a whole-number percentage (1..100) to the stored fraction.
 */
export function percentToFraction(value: number): number {
  if (!Number.isInteger(value) || value < 1 || value > 100) {
    throw new ValidationError('Percentage must be a whole number between 1 and 100', {
      field: 'percentage',
      value,
    });
  }
  return value / 100;
}

/** Stored fraction back to whole percent points (0.6 -> 60). */
export function fractionToPercent(fraction: number): number {
  return Math.round(fraction * 100);
}

export function formatPercent(points: number): string {
  return `${points}%`;
}
