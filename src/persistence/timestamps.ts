export function toDbTimestamp(date: Date): string {
  return date.toISOString();
}

// Older stores hold "2024-01-01 10:00:00.123456789+00:00" style values
const LEGACY_TIMESTAMP =
  /^(\d{4}-\d{2}-\d{2})[ T](\d{2}:\d{2}:\d{2})(?:\.(\d+))?\s*(Z|[+-]\d{2}:?\d{2})?/;

export function parseDbTimestamp(value: string): Date {
  const match = LEGACY_TIMESTAMP.exec(value);
  if (!match) {
    return new Date(value);
  }
  const [, day, time, fraction = '', zone = 'Z'] = match;
  const millis = fraction.padEnd(3, '0').slice(0, 3);
  const offset = zone === 'Z' || zone.includes(':') ? zone : `${zone.slice(0, 3)}:${zone.slice(3)}`;
  return new Date(`${day}T${time}.${millis}${offset}`);
}
