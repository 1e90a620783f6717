import { DateTime } from 'luxon';
import type { ScheduledWindow, Task } from '../model.js';
import { DEFAULT_DURATION, parseDuration } from './duration.js';

export interface ResolveOptions {
  /** Hour (local) the default slot starts at. Default: 9. */
  defaultDayStartHour?: number;
  /** From this hour on, the default slot moves to the next day. Default: 17. */
  eveningCutoffHour?: number;
}

export type ResolutionRule =
  | 'explicit-datetime'
  | 'explicit-date-with-time'
  | 'explicit-date-all-day'
  | 'suggested-datetime'
  | 'default-slot';

/** Why a less specific rule was used even though the task carried a hint. */
export type ResolutionFallback = 'malformed-suggested-datetime';

export interface Resolution {
  window: ScheduledWindow;
  rule: ResolutionRule;
  fallback?: ResolutionFallback;
}

const LEADING_DATE = /^\d{4}-\d{2}-\d{2}/;

/**
 * Reads an ISO-8601 timestamp the way a lenient parser would: `T` or space
 * separated, date-only, with or without offset. Strings without an offset are
 * read in `zone`; with one, the written wall-clock time is kept. A calendar
 * date must lead: time-only strings would pick up today's date from the
 * system clock.
 */
export function parseIsoTimestamp(text: string, zone: string): DateTime | undefined {
  const trimmed = text.trim();
  if (!LEADING_DATE.test(trimmed)) return undefined;

  const opts = { zone, setZone: true };
  const iso = DateTime.fromISO(trimmed, opts);
  if (iso.isValid) return iso;

  const sql = DateTime.fromSQL(trimmed, opts);
  return sql.isValid ? sql : undefined;
}

function timed(start: DateTime, task: Task): ScheduledWindow {
  const end = start.plus(parseDuration(task.suggestedDuration));
  // a span past luxon's range yields an invalid end
  return { start, end: end.isValid ? end : start.plus(DEFAULT_DURATION), isAllDay: false };
}

function allDay(date: DateTime): ScheduledWindow {
  const start = date.startOf('day');
  return { start, end: start.plus({ days: 1 }), isAllDay: true };
}

function defaultSlot(now: DateTime, startHour: number, cutoffHour: number): ScheduledWindow {
  const day = now.hour < cutoffHour ? now.startOf('day') : now.startOf('day').plus({ days: 1 });
  const start = day.set({ hour: startHour, minute: 0, second: 0, millisecond: 0 });
  return { start, end: start.plus({ hours: 1 }), isAllDay: false };
}

/**
 * Turns a task's date/time hints into one window. First matching rule wins:
 *
 * 1. explicit date+time → that instant, parsed duration
 * 2. explicit date + valid suggested timestamp → date with the suggested time of day
 * 3. explicit date otherwise → all-day
 * 4. no explicit date, valid suggested timestamp → that instant, parsed duration
 * 5. nothing usable → `defaultDayStartHour` today (tomorrow from `eveningCutoffHour`), one hour
 *
 * Pure in its inputs; `now` also fixes the zone suggested timestamps are read in.
 */
export function resolveWindow(task: Task, now: DateTime, opts: ResolveOptions = {}): Resolution {
  const startHour = opts.defaultDayStartHour ?? 9;
  const cutoffHour = opts.eveningCutoffHour ?? 17;
  const zone = now.zoneName ?? 'UTC';

  const hint = task.suggestedDateTime;
  const suggested = hint === undefined ? undefined : parseIsoTimestamp(hint, zone);
  const fallback: ResolutionFallback | undefined =
    hint !== undefined && suggested === undefined ? 'malformed-suggested-datetime' : undefined;

  const due = task.explicitDue;
  switch (due.kind) {
    case 'atDateTime':
      return { window: timed(due.at, task), rule: 'explicit-datetime' };

    case 'onDate': {
      if (suggested) {
        const start = due.date.startOf('day').set({
          hour: suggested.hour,
          minute: suggested.minute,
          second: suggested.second,
          millisecond: suggested.millisecond,
        });
        return { window: timed(start, task), rule: 'explicit-date-with-time' };
      }
      return { window: allDay(due.date), rule: 'explicit-date-all-day', ...(fallback ? { fallback } : {}) };
    }

    case 'absent': {
      if (suggested) {
        return { window: timed(suggested.setZone(zone), task), rule: 'suggested-datetime' };
      }
      return {
        window: defaultSlot(now, startHour, cutoffHour),
        rule: 'default-slot',
        ...(fallback ? { fallback } : {}),
      };
    }
  }
}

/** Window only; see {@link resolveWindow}. */
export function resolve(task: Task, now: DateTime, defaultDayStartHour = 9, eveningCutoffHour = 17): ScheduledWindow {
  return resolveWindow(task, now, { defaultDayStartHour, eveningCutoffHour }).window;
}
