import { describe, expect, it, vi } from 'vitest';
import { DateTime } from 'luxon';
import { createMemoryLogger } from '../src/log.js';
import { OpenAITaskParser, toExplicitDue, type ChatCompletionClient } from '../src/providers/openai.js';

type CreateBody = Parameters<ChatCompletionClient['chat']['completions']['create']>[0];

const clock = () => DateTime.fromISO('2026-03-10T16:30:00', { zone: 'UTC' });

function fakeClient(content: string | null) {
  const create = vi.fn(async (_body: CreateBody) => ({ choices: [{ message: { content } }] }));
  return { client: { chat: { completions: { create } } }, create };
}

function parser(content: string | null, extra: Partial<ConstructorParameters<typeof OpenAITaskParser>[0]> = {}) {
  const { client, create } = fakeClient(content);
  const { logger, lines } = createMemoryLogger();
  return { parser: new OpenAITaskParser({ client, logger, timezone: 'UTC', clock, ...extra }), create, lines };
}

describe('toExplicitDue', () => {
  it('maps missing, date-only, date-time and unreadable values', () => {
    expect(toExplicitDue(undefined, 'UTC')).toEqual({ kind: 'absent' });

    const onDate = toExplicitDue('2026-03-12', 'UTC');
    expect(onDate?.kind).toBe('onDate');
    expect(onDate?.kind === 'onDate' && onDate.date.toISO()).toBe('2026-03-12T00:00:00.000Z');

    const at = toExplicitDue('2026-03-15T09:00', 'Europe/Dublin');
    expect(at?.kind === 'atDateTime' && at.at.toISO()).toBe('2026-03-15T09:00:00.000+00:00');

    expect(toExplicitDue('2026-02-30', 'UTC')).toBeUndefined();
    expect(toExplicitDue('next week', 'UTC')).toBeUndefined();
  });
});

describe('OpenAITaskParser', () => {
  it('turns the model reply into tasks', async () => {
    const reply = {
      tasks: [
        {
          task: 'Call plumber',
          priority: 'high',
          dueDate: '2026-03-12',
          suggestedDateTime: '2026-03-12T10:00:00',
          suggestedDuration: '30 minutes',
          sourceLine: 'call plumber thu',
          lineNumber: 2,
        },
        { task: 'Pay rent', dueDate: '2026-03-15T09:00', sourceLine: null, lineNumber: null },
      ],
    };
    const { parser: p } = parser(JSON.stringify(reply));

    const tasks = await p.parseTasks('call plumber thu\npay rent');

    expect(tasks).toHaveLength(2);
    expect(tasks[0]).toMatchObject({
      summary: 'Call plumber',
      priority: 'high',
      suggestedDateTime: '2026-03-12T10:00:00',
      suggestedDuration: '30 minutes',
      sourceLine: 'call plumber thu',
      lineNumber: 2,
    });
    expect(tasks[0]?.explicitDue.kind).toBe('onDate');
    expect(tasks[1]).toMatchObject({ summary: 'Pay rent', priority: 'medium', sourceLine: 'Pay rent', lineNumber: undefined });
    expect(tasks[1]?.explicitDue.kind).toBe('atDateTime');
  });

  it('sends the current local time and the note text', async () => {
    const { parser: p, create } = parser('{"tasks": []}');

    await p.parseTasks('buy milk');

    const body = create.mock.calls[0]?.[0];
    expect(body?.model).toBe('gpt-4o-mini');
    expect(body?.temperature).toBe(0.2);
    expect(body?.response_format).toEqual({ type: 'json_object' });
    expect(body?.messages[0]?.content).toContain('Current local time: 2026-03-10T16:30:00Z (UTC).');
    expect(body?.messages[1]).toEqual({ role: 'user', content: 'buy milk' });
  });

  it('offers busy intervals for the coming week to the model', async () => {
    const availability = vi.fn(async (_from: DateTime, _to: DateTime) => [
      { start: '2026-03-11T09:00:00Z', end: '2026-03-11T10:00:00Z' },
    ]);
    const { parser: p, create } = parser('{"tasks": []}', { availability });

    await p.parseTasks('buy milk');

    const [from, to] = availability.mock.calls[0] ?? [];
    expect(from?.toISO()).toBe('2026-03-10T16:30:00.000Z');
    expect(to?.toISO()).toBe('2026-03-17T16:30:00.000Z');
    expect(create.mock.calls[0]?.[0].messages[0]?.content).toContain('- 2026-03-11T09:00:00Z to 2026-03-11T10:00:00Z');
  });

  it('parses without availability when the lookup fails', async () => {
    const availability = vi.fn(async () => {
      throw new Error('freeBusy down');
    });
    const { parser: p, lines } = parser('{"tasks": [{"task": "Buy milk"}]}', { availability });

    expect(await p.parseTasks('buy milk')).toHaveLength(1);
    expect(lines.filter((l) => l.level === 'warn')).toHaveLength(1);
  });

  it('drops malformed tasks and treats an unreadable due date as absent', async () => {
    const { parser: p, lines } = parser(
      JSON.stringify({ tasks: [{ task: '' }, 'nonsense', { task: 'Buy milk', dueDate: 'someday' }] }),
    );

    const tasks = await p.parseTasks('buy milk someday');

    expect(tasks.map((t) => [t.summary, t.explicitDue.kind])).toEqual([['Buy milk', 'absent']]);
    expect(lines.filter((l) => l.level === 'warn')).toHaveLength(3);
  });

  it('rejects an empty or non-JSON reply', async () => {
    await expect(parser(null).parser.parseTasks('x')).rejects.toThrow('Task parser returned an empty reply');
    await expect(parser('tasks: none').parser.parseTasks('x')).rejects.toThrow('Task parser reply is not JSON');
    await expect(parser('{"items": []}').parser.parseTasks('x')).rejects.toThrow();
  });
});
