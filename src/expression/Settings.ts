/**
 * Smoothing configuration for minimum, maximum and Heaviside nodes.
 * Passed explicitly to the factories that need it.
 */

import { SettingsError } from './Errors.js';

/**
 * 'exact' keeps the non-smooth operator, a number is the smoothing coefficient k
 */
export type Smoothing = 'exact' | number;

export interface SmoothingSettings {
  minSmoothing: Smoothing;
  maxSmoothing: Smoothing;
  heavisideSmoothing: Smoothing;
}

export const defaultSettings: Readonly<SmoothingSettings> = {
  minSmoothing: 'exact',
  maxSmoothing: 'exact',
  heavisideSmoothing: 'exact'
};

function validate(setting: keyof SmoothingSettings, value: Smoothing): Smoothing {
  if (value === 'exact') return value;
  if (!Number.isFinite(value) || value <= 0) {
    throw new SettingsError('smoothing coefficient must be a positive finite number', setting, value);
  }
  return value;
}

/**
 * Merge overrides onto the defaults and validate every coefficient
 */
export function resolveSettings(overrides: Partial<SmoothingSettings> = {}): SmoothingSettings {
  const {
    minSmoothing = defaultSettings.minSmoothing,
    maxSmoothing = defaultSettings.maxSmoothing,
    heavisideSmoothing = defaultSettings.heavisideSmoothing
  } = overrides;

  return {
    minSmoothing: validate('minSmoothing', minSmoothing),
    maxSmoothing: validate('maxSmoothing', maxSmoothing),
    heavisideSmoothing: validate('heavisideSmoothing', heavisideSmoothing)
  };
}
