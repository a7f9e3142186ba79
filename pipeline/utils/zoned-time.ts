import type { Weekday } from "../../packages/shared/src/contracts.js";

export interface ZonedDateParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  weekday: Weekday;
}

export const WEEKDAY_NAMES = [
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
  "Sunday"
] as const;

const SHORT_WEEKDAYS: Record<string, Weekday> = {
  Mon: 0,
  Tue: 1,
  Wed: 2,
  Thu: 3,
  Fri: 4,
  Sat: 5,
  Sun: 6
};

const formatterCache = new Map<string, Intl.DateTimeFormat>();

const getFormatter = (timeZone: string): Intl.DateTimeFormat => {
  const cached = formatterCache.get(timeZone);
  if (cached) {
    return cached;
  }

  const formatter = new Intl.DateTimeFormat("en-US", {
    timeZone,
    weekday: "short",
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23"
  });
  formatterCache.set(timeZone, formatter);
  return formatter;
};

export const isValidTimeZone = (timeZone: string): boolean => {
  try {
    getFormatter(timeZone);
    return true;
  } catch {
    return false;
  }
};

export const getZonedParts = (date: Date, timeZone: string): ZonedDateParts => {
  const parts = new Map(
    getFormatter(timeZone)
      .formatToParts(date)
      .map((part) => [part.type, part.value])
  );
  const numberPart = (type: Intl.DateTimeFormatPartTypes): number => Number(parts.get(type) ?? "0");

  return {
    year: numberPart("year"),
    month: numberPart("month"),
    day: numberPart("day"),
    hour: numberPart("hour"),
    minute: numberPart("minute"),
    second: numberPart("second"),
    weekday: SHORT_WEEKDAYS[parts.get("weekday") ?? ""] ?? 0
  };
};

const pad = (value: number): string => String(value).padStart(2, "0");

export const formatTimeOfDay = (hour: number, minute: number): string =>
  `${pad(hour)}:${pad(minute)}`;

/** `YYYY-MM-DD HH:mm:ss` wall-clock time in `timeZone`. */
export const formatZonedTimestamp = (date: Date, timeZone: string): string => {
  const parts = getZonedParts(date, timeZone);
  return (
    `${parts.year}-${pad(parts.month)}-${pad(parts.day)} ` +
    `${pad(parts.hour)}:${pad(parts.minute)}:${pad(parts.second)}`
  );
};
