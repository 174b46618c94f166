/**
 * CF (Climate and Forecast) Conventions time utilities
 * Decodes CF-encoded time coordinates of stored cubes into Dates
 */

import { Attributes, CoordinateValue } from '../types.js';

const MILLISECONDS_PER_UNIT: { [unit: string]: number } = {
  second: 1000,
  minute: 60 * 1000,
  hour: 60 * 60 * 1000,
  day: 24 * 60 * 60 * 1000,
  week: 7 * 24 * 60 * 60 * 1000
};

/**
 * Parse CF-compliant time units string
 * Format: "<units> since <reference_date>"
 * Examples:
 *   - "seconds since 1970-01-01"
 *   - "days since 2000-01-01 00:00:00"
 *   - "hours since 1990-01-01T00:00:00Z"
 */
export function parseCFTimeUnits(unitsStr: string): { unit: string; referenceDate: Date } | null {
  const match = unitsStr.trim().match(/^(seconds?|minutes?|hours?|days?|weeks?)\s+since\s+(.+)$/i);
  if (!match) return null;

  const unit = match[1].toLowerCase().replace(/s$/, ''); // normalize to singular
  let dateStr = match[2].trim();

  // If date/time separated by space, normalize to ISO 8601 with 'T'
  if (!dateStr.includes('T') && dateStr.includes(' ')) {
    const parts = dateStr.split(/\s+/);
    dateStr = `${parts[0]}T${parts[1]}`;
  }

  // Detect existing timezone designator (Z or ±hh[:mm]); otherwise read as UTC
  const hasTimezone = /([zZ]|[+-]\d{2}:?\d{2})$/.test(dateStr);
  if (!hasTimezone) {
    dateStr = dateStr.includes('T') ? `${dateStr}Z` : `${dateStr}T00:00:00Z`;
  }

  const referenceDate = new Date(dateStr);
  if (Number.isNaN(referenceDate.getTime())) {
    return null;
  }

  return { unit, referenceDate };
}

/**
 * Convert CF time value to Date
 * @param value - Numeric time value
 * @param unitsStr - CF units string (e.g., "seconds since 1970-01-01")
 */
export function cfTimeToDate(value: number, unitsStr: string): Date | null {
  const parsed = parseCFTimeUnits(unitsStr);
  if (!parsed) return null;

  const factor = MILLISECONDS_PER_UNIT[parsed.unit];
  if (factor === undefined) return null;

  return new Date(parsed.referenceDate.getTime() + value * factor);
}

/**
 * Check if coordinate appears to be a time coordinate based on attributes
 */
export function isTimeCoordinate(attrs: Attributes | undefined): boolean {
  if (!attrs) return false;

  const text = (key: string): string => {
    const value = attrs[key];
    return typeof value === 'string' ? value.toLowerCase() : '';
  };

  return text('standard_name') === 'time' || text('long_name') === 'time' || text('units').includes('since');
}

/**
 * Decode a coordinate's values into Dates when its attributes carry CF time
 * units. Values that cannot be decoded are returned unchanged.
 */
export function decodeTimeCoordinate(
  values: readonly CoordinateValue[],
  attrs: Attributes | undefined
): CoordinateValue[] {
  const units = attrs?.units;
  if (!isTimeCoordinate(attrs) || typeof units !== 'string') {
    return [...values];
  }

  return values.map(value => {
    if (typeof value !== 'number') return value;
    return cfTimeToDate(value, units) ?? value;
  });
}
