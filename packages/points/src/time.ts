import { DateTime, Duration, FixedOffsetZone } from 'luxon';
import { ConfigurationError } from './errors';
import type { Instant, TimeInterval } from './types';

const TIMESPAN_PATTERN = /^(-)?(?:(\d+)\.)?(\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,7}))?)?$/;

export const UTC_ZONE = 'utc';

/**
 * Parses an ISO 8601 timestamp. Text without an offset is read in `zone`.
 */
export function parseIsoInstant(text: string, zone: string = UTC_ZONE): Instant | undefined {
  const parsed = DateTime.fromISO(text.trim(), { zone });
  return parsed.isValid ? parsed.toMillis() : undefined;
}

export function parseFormattedInstant(text: string, format: string, zone: string = UTC_ZONE): Instant | undefined {
  const parsed = DateTime.fromFormat(text.trim(), format, { zone });
  return parsed.isValid ? parsed.toMillis() : undefined;
}

export function parseInstant(text: string): Instant {
  const parsed = parseIsoInstant(text);
  if (parsed === undefined) {
    throw new ConfigurationError(`'${text}' can't be parsed as an unambiguous date time`);
  }
  return parsed;
}

/**
 * Accepts ISO 8601 durations (`PT15M`) and `[-][d.]hh:mm[:ss[.fffffff]]` time spans.
 */
export function parseDurationMs(text: string): number {
  const trimmed = text.trim();
  if (/^-?p/i.test(trimmed)) {
    const duration = Duration.fromISO(trimmed.toUpperCase());
    if (duration.isValid) {
      return duration.toMillis();
    }
  }

  const match = TIMESPAN_PATTERN.exec(trimmed);
  if (!match) {
    throw new ConfigurationError(`'${text}' is not a valid duration. Use ISO 8601 (PT15M) or [d.]hh:mm[:ss] format`);
  }
  const [, sign, days, hours, minutes, seconds, fraction] = match;
  const hourValue = Number(hours);
  const minuteValue = Number(minutes);
  const secondValue = seconds ? Number(seconds) : 0;
  if (hourValue > 23 || minuteValue > 59 || secondValue > 59) {
    throw new ConfigurationError(`'${text}' is not a valid duration`);
  }
  const millis = fraction ? Number(fraction.padEnd(3, '0').slice(0, 3)) : 0;
  const total =
    (days ? Number(days) : 0) * 86_400_000 + hourValue * 3_600_000 + minuteValue * 60_000 + secondValue * 1000 + millis;
  return sign ? -total : total;
}

export function parseTimeRange(text: string): TimeInterval {
  const components = text.split('/').filter((component) => component.trim().length > 0);
  if (components.length !== 2) {
    throw new ConfigurationError(
      `'${text}' is an invalid time range. Use 'StartInstant/EndInstant' (two ISO 8601 timestamps separated by a forward slash)`
    );
  }
  const start = parseInstant(components[0]);
  const end = parseInstant(components[1]);
  if (end < start) {
    throw new ConfigurationError(
      `Invalid time range: start ${formatInstant(start)} must be less than or equal to end ${formatInstant(end)}`
    );
  }
  return { start, end };
}

/**
 * Converts `+12:00`, `-07:00`, `UTC+5` or `Z` into a luxon zone name.
 */
export function parseUtcOffset(text: string): string {
  const trimmed = text.trim();
  if (/^(z|utc)$/i.test(trimmed)) {
    return UTC_ZONE;
  }
  const specifier = /^utc/i.test(trimmed) ? trimmed : `UTC${trimmed}`;
  const zone = FixedOffsetZone.parseSpecifier(specifier);
  if (!zone) {
    throw new ConfigurationError(`'${text}' is not a valid UTC offset`);
  }
  return zone.name;
}

/**
 * Milliseconds after midnight for an ISO time of day (`hh:mm[:ss[.fff]]`) or one matching `format`.
 */
export function parseTimeOfDay(text: string, format?: string): number | undefined {
  const trimmed = text.trim();
  if (format) {
    const parsed = DateTime.fromFormat(trimmed, format, { zone: UTC_ZONE });
    if (!parsed.isValid) {
      return undefined;
    }
    return parsed.toMillis() - parsed.startOf('day').toMillis();
  }
  const duration = Duration.fromISOTime(trimmed);
  return duration.isValid ? duration.toMillis() : undefined;
}

export function parseDate(text: string, format: string | undefined, zone: string): DateTime | undefined {
  const trimmed = text.trim();
  const parsed = format ? DateTime.fromFormat(trimmed, format, { zone }) : DateTime.fromISO(trimmed, { zone });
  return parsed.isValid ? parsed.startOf('day') : undefined;
}

export function formatInstant(time: Instant): string {
  return new Date(time).toISOString();
}
