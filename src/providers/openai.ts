import { DateTime } from 'luxon';
import { z } from 'zod';
import type { Logger } from '../log.js';
import { ABSENT, type ExplicitDue, type Task } from '../model.js';
import { parseIsoTimestamp } from '../schedule/resolver.js';
import type { BusyInterval } from './calendar.js';
import type { TaskParser } from './provider.js';

/** The slice of the OpenAI client this parser calls. `new OpenAI()` satisfies it. */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(body: {
        model: string;
        messages: Array<{ role: 'system' | 'user'; content: string }>;
        temperature?: number;
        response_format?: { type: 'json_object' };
      }): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

const optionalText = z
  .string()
  .nullish()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

export const ParsedTaskSchema = z.object({
  task: z.string().trim().min(1),
  priority: z.string().trim().min(1).catch('medium'),
  dueDate: optionalText,
  suggestedDateTime: optionalText,
  suggestedDuration: optionalText,
  sourceLine: z.string().catch(''),
  lineNumber: z.number().int().positive().nullish().catch(undefined),
});

const ReplySchema = z.object({ tasks: z.array(z.unknown()) });

export type ParsedTask = z.infer<typeof ParsedTaskSchema>;

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/** Explicit due text from the model → tagged variant. `undefined` when present but unreadable. */
export function toExplicitDue(dueDate: string | undefined, zone: string): ExplicitDue | undefined {
  if (!dueDate) return ABSENT;
  if (DATE_ONLY.test(dueDate)) {
    const date = DateTime.fromISO(dueDate, { zone });
    return date.isValid ? { kind: 'onDate', date: date.startOf('day') } : undefined;
  }
  const at = parseIsoTimestamp(dueDate, zone);
  return at ? { kind: 'atDateTime', at } : undefined;
}

export interface OpenAITaskParserOptions {
  client: ChatCompletionClient;
  logger: Logger;
  timezone: string;
  model?: string;
  clock?: () => DateTime;
  /** Calendar busy intervals, offered to the model when choosing suggested times. */
  availability?: (from: DateTime, to: DateTime) => Promise<BusyInterval[]>;
  /** Days ahead the availability lookup covers (default: 7). */
  availabilityDays?: number;
}

function systemPrompt(now: DateTime, timezone: string, busy: BusyInterval[]) {
  const lines = [
    'You extract actionable tasks from notes (OCR of handwritten pages or email bodies).',
    `Current local time: ${now.toISO({ suppressMilliseconds: true })} (${timezone}).`,
    'Reply with a JSON object {"tasks": [...]} where each task has:',
    '- "task": short imperative summary',
    '- "priority": "high", "medium" or "low"',
    '- "dueDate": the date (YYYY-MM-DD) or date and time (YYYY-MM-DDTHH:mm) ONLY if written explicitly in the note, else null',
    '- "suggestedDateTime": an ISO-8601 local date-time you propose for doing the task, or null',
    '- "suggestedDuration": e.g. "30 minutes", "2 hours" or "flexible", or null',
    '- "sourceLine": the note line the task came from',
    '- "lineNumber": 1-based line number of that line, or null',
    'Ignore lines that are not tasks. Return {"tasks": []} when there are none.',
  ];
  if (busy.length) {
    lines.push('Avoid these busy intervals when suggesting times:');
    for (const b of busy) lines.push(`- ${b.start} to ${b.end}`);
  }
  return lines.join('\n');
}

export class OpenAITaskParser implements TaskParser {
  constructor(private opts: OpenAITaskParserOptions) {}

  private now() {
    return (this.opts.clock ?? (() => DateTime.now()))().setZone(this.opts.timezone);
  }

  private async busy(now: DateTime): Promise<BusyInterval[]> {
    if (!this.opts.availability) return [];
    try {
      return await this.opts.availability(now, now.plus({ days: this.opts.availabilityDays ?? 7 }));
    } catch (e) {
      this.opts.logger.warn('calendar availability lookup failed; parsing without it', e);
      return [];
    }
  }

  async parseTasks(text: string): Promise<Task[]> {
    const now = this.now();
    const completion = await this.opts.client.chat.completions.create({
      model: this.opts.model ?? 'gpt-4o-mini',
      messages: [
        { role: 'system', content: systemPrompt(now, this.opts.timezone, await this.busy(now)) },
        { role: 'user', content: text },
      ],
      temperature: 0.2,
      response_format: { type: 'json_object' },
    });

    const content = completion.choices[0]?.message.content;
    if (!content) throw new Error('Task parser returned an empty reply');

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (e) {
      throw new Error('Task parser reply is not JSON', { cause: e });
    }
    const reply = ReplySchema.parse(json);

    const tasks: Task[] = [];
    for (const raw of reply.tasks) {
      const parsed = ParsedTaskSchema.safeParse(raw);
      if (!parsed.success) {
        this.opts.logger.warn('dropping malformed task from parser reply', parsed.error.issues[0]?.message);
        continue;
      }
      tasks.push(this.toTask(parsed.data));
    }
    return tasks;
  }

  private toTask(p: ParsedTask): Task {
    let explicitDue = toExplicitDue(p.dueDate, this.opts.timezone);
    if (!explicitDue) {
      this.opts.logger.warn(`unreadable dueDate "${p.dueDate}" for task "${p.task}"; treating as absent`);
      explicitDue = ABSENT;
    }
    return {
      summary: p.task,
      priority: p.priority,
      explicitDue,
      suggestedDateTime: p.suggestedDateTime,
      suggestedDuration: p.suggestedDuration,
      sourceLine: p.sourceLine || p.task,
      lineNumber: p.lineNumber ?? undefined,
    };
  }
}
