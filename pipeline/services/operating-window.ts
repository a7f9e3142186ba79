import type {
  OperatingWindow,
  TimeOfDay,
  WindowVerdict
} from "../../packages/shared/src/contracts.js";
import { consoleLogger, type ScrapeLogger } from "../utils/run-log.js";
import {
  WEEKDAY_NAMES,
  formatTimeOfDay,
  getZonedParts,
  isValidTimeZone
} from "../utils/zoned-time.js";

export const FALLBACK_TIME_ZONE = "UTC";

const minuteOfDay = ({ hour, minute }: TimeOfDay): number => hour * 60 + minute;

/**
 * Answers "may the scraper run right now?" for a weekly window of permitted
 * days and an inclusive start/end time of day. Times are compared at minute
 * granularity, so the whole end minute is inside the window.
 */
export class OperatingWindowOracle {
  readonly window: OperatingWindow;

  constructor(window: OperatingWindow, logger: ScrapeLogger = consoleLogger) {
    let timeZone = window.timeZone;
    if (!isValidTimeZone(timeZone)) {
      logger.warn(
        `[window] Unknown timezone "${timeZone}", falling back to ${FALLBACK_TIME_ZONE}.`
      );
      timeZone = FALLBACK_TIME_ZONE;
    }

    this.window = {
      days: [...new Set(window.days)].sort((left, right) => left - right),
      start: { ...window.start },
      end: { ...window.end },
      timeZone
    };
  }

  describe(): string {
    const days = this.window.days
      .map((day) => WEEKDAY_NAMES[day].slice(0, 3))
      .join(", ");
    return `${days || "no days"} ${this.describeHours()}`;
  }

  evaluate(now: Date): WindowVerdict {
    const { days, start, end, timeZone } = this.window;
    const parts = getZonedParts(now, timeZone);
    const dayName = WEEKDAY_NAMES[parts.weekday];
    const clock = formatTimeOfDay(parts.hour, parts.minute);
    const localTime = `${dayName} ${clock}`;

    if (!days.includes(parts.weekday)) {
      const operatingDays = days.map((day) => WEEKDAY_NAMES[day].slice(0, 3)).join(", ");
      return {
        permitted: false,
        kind: "WRONG_DAY",
        reason: `${dayName} is not an operating day (operating days: ${operatingDays || "none"})`,
        localTime
      };
    }

    const current = minuteOfDay(parts);
    if (current < minuteOfDay(start)) {
      return {
        permitted: false,
        kind: "BEFORE_WINDOW",
        reason: `${clock} is before operating hours (${this.describeHours()})`,
        localTime
      };
    }

    if (current > minuteOfDay(end)) {
      return {
        permitted: false,
        kind: "AFTER_WINDOW",
        reason: `${clock} is after operating hours (${this.describeHours()})`,
        localTime
      };
    }

    return {
      permitted: true,
      kind: "WITHIN_WINDOW",
      reason: `${dayName} ${clock} is within operating hours (${this.describeHours()})`,
      localTime
    };
  }

  private describeHours(): string {
    const { start, end, timeZone } = this.window;
    return `${formatTimeOfDay(start.hour, start.minute)}-${formatTimeOfDay(end.hour, end.minute)} ${timeZone}`;
  }
}
