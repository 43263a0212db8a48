import {InvalidTimestamp} from '../components/observation/errors/InvalidTimestamp';


const zoneDesignatorRegex = /(Z|[+-]\d{2}(:?\d{2})?)$/i;
const localDateTimeRegex = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;


// A date-time without a zone designator would otherwise be read in the local timezone of whichever machine runs this.
export function parseTimestamp(value: unknown): Date {

  let date: Date;

  if (value instanceof Date) {
    date = new Date(value.getTime());
  } else if (typeof value === 'number') {
    date = new Date(value);
  } else if (typeof value === 'string') {
    const trimmed = value.trim();
    if (localDateTimeRegex.test(trimmed) && !zoneDesignatorRegex.test(trimmed)) {
      date = new Date(`${trimmed.replace(' ', 'T')}Z`);
    } else {
      date = new Date(trimmed);
    }
  } else {
    throw new InvalidTimestamp(`Expected a timestamp, received ${value === null ? 'null' : typeof value}`);
  }

  if (Number.isNaN(date.getTime())) {
    throw new InvalidTimestamp(`Unable to parse '${String(value)}' as a timestamp`);
  }

  return date;

}


export function formatTimestamp(date: Date): string {
  return date.toISOString();
}


const timeWithZoneRegex = /[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(Z|([+-])(\d{2}):?(\d{2})?)?$/i;

// Keeps the wall-clock time and offset the source gave us: '12:00:00+02:00' stays '12:00:00+02:00', a value without a zone stays without one.
export function normaliseTimeseriesTimestamp(value: unknown): string {

  const date = parseTimestamp(value);

  if (typeof value !== 'string') {
    return formatTimestamp(date);
  }

  const match = timeWithZoneRegex.exec(value.trim());
  if (!match) {
    return formatTimestamp(date);
  }

  const [, zone, sign, hours, minutes] = match;

  if (zone === undefined) {
    return formatWallClock(date, 0);
  }
  if (sign === undefined) {
    return `${formatWallClock(date, 0)}Z`;
  }

  const offsetMinutes = (sign === '-' ? -1 : 1) * (Number(hours) * 60 + Number(minutes || 0));
  if (offsetMinutes === 0) {
    return `${formatWallClock(date, 0)}Z`;
  }
  return `${formatWallClock(date, offsetMinutes)}${sign}${hours}:${minutes || '00'}`;

}


// 'YYYY-MM-DDTHH:mm:ss', with milliseconds only when there are some.
function formatWallClock(date: Date, offsetMinutes: number): string {
  const shifted = new Date(date.getTime() + offsetMinutes * 60000).toISOString();
  const millis = shifted.slice(19, 23);
  return `${shifted.slice(0, 19)}${millis === '.000' ? '' : millis}`;
}


// Snapshot timestamps are passed through untouched unless they're already Date objects.
export function normaliseSnapshotTimestamp(value: Date | string | number): string {
  if (value instanceof Date) {
    return formatTimestamp(value);
  }
  return String(value);
}
