import type { TimeZone } from "../../core/ports/formatter.js";

/**
 * Layout-driven timestamp rendering.
 *
 *   YYYY  four-digit year        HH  hour 00-23      SSS  milliseconds
 *   MM    month 01-12           hh  hour 01-12      A    AM / PM
 *   DD    day 01-31             h   hour 1-12       Z    "Z" or ±hh:mm
 *   mm    minute                ss  second          [..] literal text
 *
 * Letters outside brackets that spell a token are replaced, so words need
 * brackets: "[Thursday] HH", not "Thursday HH".
 */

export const TIME_LAYOUTS = {
  RFC3339: "YYYY-MM-DDTHH:mm:ssZ",
  RFC3339Milli: "YYYY-MM-DDTHH:mm:ss.SSSZ",
  DateTime: "YYYY-MM-DD HH:mm:ss",
  TimeOnly: "HH:mm:ss",
  Kitchen: "h:mmA",
} as const;

export type NamedLayout = keyof typeof TIME_LAYOUTS;

export const DEFAULT_TIME_LAYOUT: NamedLayout = "RFC3339";

const TOKEN_PATTERN = /\[([^\]]*)\]|YYYY|SSS|MM|DD|HH|hh|mm|ss|h|A|Z/g;

interface Clock {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hours: number;
  readonly minutes: number;
  readonly seconds: number;
  readonly millis: number;
  /** Minutes east of UTC */
  readonly offset: number;
}

const readClock = (date: Date, zone: TimeZone): Clock =>
  zone === "utc"
    ? {
        year: date.getUTCFullYear(),
        month: date.getUTCMonth() + 1,
        day: date.getUTCDate(),
        hours: date.getUTCHours(),
        minutes: date.getUTCMinutes(),
        seconds: date.getUTCSeconds(),
        millis: date.getUTCMilliseconds(),
        offset: 0,
      }
    : {
        year: date.getFullYear(),
        month: date.getMonth() + 1,
        day: date.getDate(),
        hours: date.getHours(),
        minutes: date.getMinutes(),
        seconds: date.getSeconds(),
        millis: date.getMilliseconds(),
        offset: -date.getTimezoneOffset(),
      };

const pad = (n: number, width = 2): string => String(n).padStart(width, "0");

const formatOffset = (offset: number): string => {
  if (offset === 0) return "Z";
  const sign = offset > 0 ? "+" : "-";
  const abs = Math.abs(offset);
  return `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
};

const isNamedLayout = (layout: string): layout is NamedLayout => Object.hasOwn(TIME_LAYOUTS, layout);

/** Expand a named layout ("RFC3339") to its token pattern; other strings pass through. */
export const resolveLayout = (layout: string): string =>
  isNamedLayout(layout) ? TIME_LAYOUTS[layout] : layout;

export const formatTime = (date: Date, layout: string, zone: TimeZone = "utc"): string => {
  if (Number.isNaN(date.getTime())) return "Invalid Date";

  const c = readClock(date, zone);
  const hour12 = c.hours % 12 === 0 ? 12 : c.hours % 12;

  return resolveLayout(layout).replace(TOKEN_PATTERN, (token: string, literal?: string) => {
    if (literal !== undefined) return literal;
    switch (token) {
      case "YYYY":
        return pad(c.year, 4);
      case "MM":
        return pad(c.month);
      case "DD":
        return pad(c.day);
      case "HH":
        return pad(c.hours);
      case "hh":
        return pad(hour12);
      case "h":
        return String(hour12);
      case "mm":
        return pad(c.minutes);
      case "ss":
        return pad(c.seconds);
      case "SSS":
        return pad(c.millis, 3);
      case "A":
        return c.hours < 12 ? "AM" : "PM";
      case "Z":
        return formatOffset(c.offset);
      default:
        return token;
    }
  });
};
