/**
 * Human-readable durations ("90s", "6 hrs", "1h 30m", "12 days")
 */

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;
const WEEK = 7 * DAY;

const UNIT_MS: Record<string, number> = {
  ms: 1,
  msec: 1,
  msecs: 1,
  millisecond: 1,
  milliseconds: 1,
  s: SECOND,
  sec: SECOND,
  secs: SECOND,
  second: SECOND,
  seconds: SECOND,
  m: MINUTE,
  min: MINUTE,
  mins: MINUTE,
  minute: MINUTE,
  minutes: MINUTE,
  h: HOUR,
  hr: HOUR,
  hrs: HOUR,
  hour: HOUR,
  hours: HOUR,
  d: DAY,
  day: DAY,
  days: DAY,
  w: WEEK,
  week: WEEK,
  weeks: WEEK,
};

const TERM = /(\d+(?:\.\d+)?)\s*([a-z]+)/gy;
const SEPARATOR = /[\s,]*/y;

export class InvalidDurationError extends Error {
  constructor(readonly text: string, reason: string) {
    super(`Invalid duration ${JSON.stringify(text)}: ${reason}`);
    this.name = 'InvalidDurationError';
  }
}

/**
 * Parse a duration into milliseconds. A bare number counts as seconds.
 */
export function parseDuration(text: string): number {
  const input = text.trim().toLowerCase();
  if (input === '') {
    throw new InvalidDurationError(text, 'empty');
  }

  if (/^\d+(?:\.\d+)?$/.test(input)) {
    return Math.round(parseFloat(input) * SECOND);
  }

  let total = 0;
  let position = 0;
  while (position < input.length) {
    TERM.lastIndex = position;
    const term = TERM.exec(input);
    if (!term) {
      throw new InvalidDurationError(text, `unexpected input at ${JSON.stringify(input.slice(position))}`);
    }

    const [, amount, unit] = term;
    const scale = UNIT_MS[unit];
    if (scale === undefined) {
      throw new InvalidDurationError(text, `unknown unit ${JSON.stringify(unit)}`);
    }
    total += parseFloat(amount) * scale;

    SEPARATOR.lastIndex = TERM.lastIndex;
    SEPARATOR.exec(input);
    position = SEPARATOR.lastIndex;
  }

  return Math.round(total);
}

/**
 * Render milliseconds as `hh:mm:ss`; hours grow past 24 instead of rolling into days.
 */
export function formatDuration(ms: number): string {
  const sign = ms < 0 ? '-' : '';
  const totalSeconds = Math.floor(Math.abs(ms) / SECOND);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${sign}${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;
}
