const ISO_TIMESTAMP =
  /^((\d{4})-(\d{2})-(\d{2}))(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?)?(Z|[+-]\d{2}:?\d{2})?$/i;

function normalizeOffset(offset: string | undefined): string {
  if (!offset || offset.toUpperCase() === 'Z') {
    return 'Z';
  }
  return offset.includes(':') ? offset : `${offset.slice(0, 3)}:${offset.slice(3)}`;
}

/** True when the wall-clock fields name a real instant, so Feb 30 or hour 24 is rejected. */
function isCalendarValid(year: number, month: number, day: number, hours: number, minutes: number, seconds: number): boolean {
  const wall = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));
  return (
    wall.getUTCFullYear() === year &&
    wall.getUTCMonth() === month - 1 &&
    wall.getUTCDate() === day &&
    wall.getUTCHours() === hours &&
    wall.getUTCMinutes() === minutes &&
    wall.getUTCSeconds() === seconds
  );
}

/**
 * Parses an ISO-8601 `last_update`. A value without an offset is taken as UTC;
 * fractional seconds beyond milliseconds are truncated. Returns null when the
 * value is not a timestamp or names a date that does not exist.
 */
export function parseLastUpdate(value: string): Date | null {
  const match = ISO_TIMESTAMP.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, date, year, month, day, hours = '00', minutes = '00', seconds = '00', fraction = '', offset] = match;
  if (!isCalendarValid(Number(year), Number(month), Number(day), Number(hours), Number(minutes), Number(seconds))) {
    return null;
  }

  const millis = fraction.slice(0, 3).padEnd(3, '0');
  const parsed = new Date(`${date}T${hours}:${minutes}:${seconds}.${millis}${normalizeOffset(offset)}`);

  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

export function ageInHours(from: Date, now: Date): number {
  return (now.getTime() - from.getTime()) / 3_600_000;
}
