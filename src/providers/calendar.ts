import type { DateTime } from 'luxon';
import type { Logger } from '../log.js';
import type { ScheduledWindow } from '../model.js';
import type { EventMaterializer } from './provider.js';
import type { GoogleAuth } from './googleAuth.js';

const BASE = 'https://www.googleapis.com/calendar/v3';

type EventTime = { date: string } | { dateTime: string; timeZone: string };

export interface GoogleEventPayload {
  summary: string;
  description: string;
  start: EventTime;
  end: EventTime;
}

interface GoogleEvent {
  id: string;
  htmlLink?: string;
}

interface FreeBusyResponse {
  calendars?: Record<string, { busy?: Array<{ start: string; end: string }>; errors?: unknown[] }>;
}

export interface BusyInterval {
  start: string;
  end: string;
}

function iso(value: string | null, what: string): string {
  if (value === null) throw new Error(`Invalid ${what} in scheduled window`);
  return value;
}

/** Calendar API body for a window: `date` for all-day, wall-clock `dateTime` + zone otherwise. */
export function toEventPayload(summary: string, description: string, window: ScheduledWindow, timezone: string): GoogleEventPayload {
  if (window.isAllDay) {
    return {
      summary,
      description,
      start: { date: iso(window.start.toISODate(), 'start') },
      end: { date: iso(window.end.toISODate(), 'end') },
    };
  }
  const local = (dt: DateTime, what: string) => ({
    dateTime: iso(dt.setZone(timezone).toISO({ includeOffset: false, suppressMilliseconds: true }), what),
    timeZone: timezone,
  });
  return { summary, description, start: local(window.start, 'start'), end: local(window.end, 'end') };
}

export interface GoogleCalendarSinkOptions {
  auth: GoogleAuth;
  logger: Logger;
  /** Defaults to 'primary'. */
  calendarId?: string;
}

export class GoogleCalendarSink implements EventMaterializer {
  constructor(private opts: GoogleCalendarSinkOptions) {}

  private get calendarId() {
    return this.opts.calendarId ?? 'primary';
  }

  async createEvent(summary: string, description: string, window: ScheduledWindow, timezone: string): Promise<boolean> {
    const payload = toEventPayload(summary, description, window, timezone);
    try {
      const created = await this.opts.auth.api<GoogleEvent>(BASE, `/calendars/${encodeURIComponent(this.calendarId)}/events`, {
        method: 'POST',
        body: payload,
      });
      this.opts.logger.debug('event created', { summary, id: created?.id, link: created?.htmlLink });
      return true;
    } catch (e) {
      this.opts.logger.warn(`could not create event "${summary}"`, e);
      return false;
    }
  }

  /** Busy intervals of the calendar in [from, to). */
  async listBusy(from: DateTime, to: DateTime): Promise<BusyInterval[]> {
    const res = await this.opts.auth.api<FreeBusyResponse>(BASE, '/freeBusy', {
      method: 'POST',
      body: {
        timeMin: iso(from.toUTC().toISO(), 'timeMin'),
        timeMax: iso(to.toUTC().toISO(), 'timeMax'),
        items: [{ id: this.calendarId }],
      },
    });
    return res?.calendars?.[this.calendarId]?.busy ?? [];
  }
}
