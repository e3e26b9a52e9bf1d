import type { DailyTime } from '../config/app-config.types';

interface IZonedDateTime {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
}

const formatters: Map<string, Intl.DateTimeFormat> = new Map<string, Intl.DateTimeFormat>();

const getFormatter = (timeZone: string): Intl.DateTimeFormat => {
  const cached: Intl.DateTimeFormat | undefined = formatters.get(timeZone);

  if (cached !== undefined) {
    return cached;
  }

  const formatter: Intl.DateTimeFormat = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  });
  formatters.set(timeZone, formatter);
  return formatter;
};

export const toZonedDateTime = (epochMs: number, timeZone: string): IZonedDateTime => {
  const parts: Map<string, number> = new Map<string, number>();

  for (const part of getFormatter(timeZone).formatToParts(new Date(epochMs))) {
    if (part.type !== 'literal') {
      parts.set(part.type, Number.parseInt(part.value, 10));
    }
  }

  return {
    year: parts.get('year') ?? 1970,
    month: parts.get('month') ?? 1,
    day: parts.get('day') ?? 1,
    hour: parts.get('hour') ?? 0,
    minute: parts.get('minute') ?? 0,
    second: parts.get('second') ?? 0,
  };
};

const getZoneOffsetMs = (epochMs: number, timeZone: string): number => {
  const zoned: IZonedDateTime = toZonedDateTime(epochMs, timeZone);
  const wallClockAsUtcMs: number = Date.UTC(
    zoned.year,
    zoned.month - 1,
    zoned.day,
    zoned.hour,
    zoned.minute,
    zoned.second,
  );

  return wallClockAsUtcMs - Math.floor(epochMs / 1000) * 1000;
};

/** Epoch of a wall-clock time in `timeZone`; a time skipped by a DST jump resolves past the gap. */
const zonedWallTimeToEpochMs = (
  year: number,
  month: number,
  day: number,
  time: DailyTime,
  timeZone: string,
): number => {
  const wallClockAsUtcMs: number = Date.UTC(year, month - 1, day, time.hour, time.minute);
  const firstGuessMs: number = wallClockAsUtcMs - getZoneOffsetMs(wallClockAsUtcMs, timeZone);
  const correctedOffsetMs: number = getZoneOffsetMs(firstGuessMs, timeZone);

  return wallClockAsUtcMs - correctedOffsetMs;
};

/** First instant strictly after `nowMs` at which the wall clock in `timeZone` reads `time`. */
export const resolveNextDailyFireAt = (
  nowMs: number,
  time: DailyTime,
  timeZone: string,
): number => {
  const today: IZonedDateTime = toZonedDateTime(nowMs, timeZone);
  const todayFireAtMs: number = zonedWallTimeToEpochMs(
    today.year,
    today.month,
    today.day,
    time,
    timeZone,
  );

  if (todayFireAtMs > nowMs) {
    return todayFireAtMs;
  }

  const tomorrow: Date = new Date(Date.UTC(today.year, today.month - 1, today.day + 1));

  return zonedWallTimeToEpochMs(
    tomorrow.getUTCFullYear(),
    tomorrow.getUTCMonth() + 1,
    tomorrow.getUTCDate(),
    time,
    timeZone,
  );
};

/** Calendar date of `epochMs` in `timeZone` as `YYYY-MM-DD`. */
export const formatZonedDate = (epochMs: number, timeZone: string): string => {
  const zoned: IZonedDateTime = toZonedDateTime(epochMs, timeZone);

  return `${String(zoned.year)}-${String(zoned.month).padStart(2, '0')}-${String(zoned.day).padStart(2, '0')}`;
};
