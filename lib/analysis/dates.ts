import { differenceInCalendarDays, format, parseISO, subDays } from "date-fns";
import type { IsoDate } from "../types";

export function toIsoDate(date: Date): IsoDate {
  return format(date, "yyyy-MM-dd");
}

/**
 * Whole calendar days between two ISO dates, ignoring order
 */
export function daysBetween(a: IsoDate, b: IsoDate): number {
  return Math.abs(differenceInCalendarDays(parseISO(a), parseISO(b)));
}

/**
 * Inclusive [start, end] window ending on `today`
 */
export function trailingWindow(today: Date, days: number): { start: IsoDate; end: IsoDate } {
  return {
    start: toIsoDate(subDays(today, days)),
    end: toIsoDate(today),
  };
}
