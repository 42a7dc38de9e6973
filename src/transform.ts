/**
 * Pure normalization of a RawObservation.
 *
 * No I/O, no clock: the same input always yields the same output, so the
 * stage is never retried.
 */

import { MalformedRecordError } from './errors.js';
import type { DataQuality, ProcessedObservation, RawObservation } from './types.js';

export const KELVIN_OFFSET = 273.15;

/** Humidity band considered plausible; anything else is flagged. */
export const GOOD_HUMIDITY_RANGE = { min: 20, max: 100 } as const;

export function round2(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

export function kelvinToCelsius(kelvin: number): number {
  return round2(kelvin - KELVIN_OFFSET);
}

export function qualityFlag(humidity: number): DataQuality {
  return humidity >= GOOD_HUMIDITY_RANGE.min && humidity <= GOOD_HUMIDITY_RANGE.max
    ? 'Good'
    : 'Suspicious';
}

/**
 * Upper-case the first letter of every run of letters, lower-case the rest.
 * "NEW york" -> "New York", "stoke-on-trent" -> "Stoke-On-Trent".
 */
export function titleCase(text: string): string {
  return text
    .trim()
    .replace(/\p{L}+/gu, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

function requireFinite(value: number, field: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new MalformedRecordError(`${field} is missing or not a finite number`);
  }
  return value;
}

function requireText(value: string, field: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new MalformedRecordError(`${field} is missing or empty`);
  }
  return value.trim();
}

export function transformObservation(raw: RawObservation): ProcessedObservation {
  if (!(raw.observedAt instanceof Date) || Number.isNaN(raw.observedAt.getTime())) {
    throw new MalformedRecordError('observedAt is missing or not a valid date');
  }

  const city = requireText(raw.city, 'city');
  const description = requireText(raw.description, 'description');
  const tempKelvin = requireFinite(raw.tempKelvin, 'tempKelvin');
  const humidity = requireFinite(raw.humidity, 'humidity');

  if (humidity < 0 || humidity > 100) {
    throw new MalformedRecordError(`humidity ${humidity} is outside [0, 100]`);
  }

  // The flag describes the stored humidity
  const storedHumidity = Math.round(humidity);

  return {
    observedAt: new Date(raw.observedAt.getTime()),
    city: titleCase(city),
    tempKelvin: round2(tempKelvin),
    tempCelsius: kelvinToCelsius(tempKelvin),
    humidity: storedHumidity,
    description,
    dataQuality: qualityFlag(storedHumidity),
  };
}
