/** Date formatting shared by connectors that take date ranges. All UTC. */

const pad = (n: number, width = 2): string => String(n).padStart(width, '0');

/** YYYY-MM-DD */
export function isoDate(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

/** YYYY-MM-DDTHH:mm:ss */
export function isoSeconds(date: Date): string {
  return `${isoDate(date)}T${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
}

export function startOfDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

/** Last second of the day `date` falls on. */
export function endOfDay(date: Date): Date {
  return new Date(startOfDay(date).getTime() + 86_400_000 - 1000);
}

/** Parses YYYY-MM-DD (or any ISO timestamp) from the command line. */
export function parseDate(value: string): Date {
  const date = new Date(value);
  if (isNaN(date.getTime())) throw new RangeError(`Invalid date: ${value}`);
  return date;
}

/** Wall-clock time in `timeZone` as "YYYY-MM-DD HH:mm:ss". */
export function zonedDateTime(date: Date, timeZone: string): string {
  return new Intl.DateTimeFormat('sv-SE', {
    timeZone,
    year: 'numeric', month: '2-digit', day: '2-digit',
    hour: '2-digit', minute: '2-digit', second: '2-digit',
    hourCycle: 'h23',
  }).format(date);
}
