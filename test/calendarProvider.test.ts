import { describe, expect, it } from 'vitest';
import { DateTime } from 'luxon';
import { createMemoryLogger } from '../src/log.js';
import { GoogleCalendarSink, toEventPayload } from '../src/providers/calendar.js';
import { GoogleAuth } from '../src/providers/googleAuth.js';

function jsonResponse(obj: unknown, status = 200) {
  return new Response(JSON.stringify(obj), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

const timed = {
  start: DateTime.fromISO('2026-07-01T13:00:00Z', { zone: 'UTC' }),
  end: DateTime.fromISO('2026-07-01T13:30:00Z', { zone: 'UTC' }),
  isAllDay: false,
};

function sink(handler: (method: string, url: string, body: string) => Response, calendarId?: string) {
  const fetcher: typeof fetch = async (input, init) => {
    const u = String(input);
    if (u.startsWith('https://oauth2.googleapis.com/token')) {
      return jsonResponse({ access_token: 'atok', expires_in: 3600, token_type: 'Bearer' });
    }
    return handler(init?.method ?? 'GET', u, String(init?.body ?? ''));
  };
  const { logger, lines } = createMemoryLogger();
  const auth = new GoogleAuth({ clientId: 'cid', clientSecret: 'test-secret', refreshToken: 'rtok', fetcher });
  return { calendar: new GoogleCalendarSink({ auth, logger, calendarId }), lines };
}

describe('toEventPayload', () => {
  it('writes timed windows as wall-clock time in the calendar zone', () => {
    expect(toEventPayload('Call plumber', 'd', timed, 'Europe/Dublin')).toEqual({
      summary: 'Call plumber',
      description: 'd',
      start: { dateTime: '2026-07-01T14:00:00', timeZone: 'Europe/Dublin' },
      end: { dateTime: '2026-07-01T14:30:00', timeZone: 'Europe/Dublin' },
    });
  });

  it('writes all-day windows as dates with an exclusive end', () => {
    const window = {
      start: DateTime.fromISO('2026-03-12', { zone: 'UTC' }),
      end: DateTime.fromISO('2026-03-13', { zone: 'UTC' }),
      isAllDay: true,
    };
    expect(toEventPayload('Renew passport', 'd', window, 'UTC')).toEqual({
      summary: 'Renew passport',
      description: 'd',
      start: { date: '2026-03-12' },
      end: { date: '2026-03-13' },
    });
  });
});

describe('GoogleCalendarSink', () => {
  it('creates an event on the configured calendar', async () => {
    const posts: Array<{ url: string; body: unknown }> = [];
    const { calendar } = sink((method, url, body) => {
      if (method === 'POST') posts.push({ url, body: JSON.parse(body) });
      return jsonResponse({ id: 'ev1', htmlLink: 'https://calendar.example/ev1' });
    }, 'team@example.com');

    expect(await calendar.createEvent('Call plumber', 'desc', timed, 'UTC')).toBe(true);
    expect(posts).toEqual([
      {
        url: 'https://www.googleapis.com/calendar/v3/calendars/team%40example.com/events',
        body: {
          summary: 'Call plumber',
          description: 'desc',
          start: { dateTime: '2026-07-01T13:00:00', timeZone: 'UTC' },
          end: { dateTime: '2026-07-01T13:30:00', timeZone: 'UTC' },
        },
      },
    ]);
  });

  it('reports false and warns when the API rejects the event', async () => {
    const { calendar, lines } = sink(() => new Response('bad request', { status: 400 }));

    expect(await calendar.createEvent('Call plumber', 'desc', timed, 'UTC')).toBe(false);
    expect(lines.filter((l) => l.level === 'warn')).toHaveLength(1);
  });

  it('lists busy intervals of the primary calendar', async () => {
    let requested: unknown;
    const { calendar } = sink((_m, url, body) => {
      expect(url).toBe('https://www.googleapis.com/calendar/v3/freeBusy');
      requested = JSON.parse(body);
      return jsonResponse({
        calendars: { primary: { busy: [{ start: '2026-03-11T09:00:00Z', end: '2026-03-11T10:00:00Z' }] } },
      });
    });

    const from = DateTime.fromISO('2026-03-10T16:30:00', { zone: 'UTC' });
    const busy = await calendar.listBusy(from, from.plus({ days: 7 }));

    expect(busy).toEqual([{ start: '2026-03-11T09:00:00Z', end: '2026-03-11T10:00:00Z' }]);
    expect(requested).toEqual({
      timeMin: '2026-03-10T16:30:00.000Z',
      timeMax: '2026-03-17T16:30:00.000Z',
      items: [{ id: 'primary' }],
    });
  });
});
