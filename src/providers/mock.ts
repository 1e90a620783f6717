import type { DateTime } from 'luxon';
import { ABSENT, type Attachment, type ScheduledWindow, type SourceItem, type Task } from '../model.js';
import type { CandidateFilter, EventMaterializer, SourceRetriever, TaskParser, TextExtractor } from './provider.js';
import { toExplicitDue } from './openai.js';

export interface MockNote {
  id: string;
  attachments?: Attachment[];
  body?: string;
}

/**
 * In-memory collaborators for local dev/tests.
 *
 * - Notes stay listed after being consumed, like a mailbox that ignores
 *   mark-as-read, so the ledger alone has to prevent reprocessing.
 */
export class MockSource implements SourceRetriever {
  readonly consumed = new Set<string>();
  private notes = new Map<string, MockNote>();

  constructor(notes: MockNote[] = [], private opts: { failMarkConsumed?: boolean } = {}) {
    for (const n of notes) this.notes.set(n.id, n);
  }

  async listCandidateItems(_filter: CandidateFilter): Promise<SourceItem[]> {
    return [...this.notes.keys()].map((id) => ({ id }));
  }

  private note(id: string): MockNote {
    const n = this.notes.get(id);
    if (!n) throw new Error(`Unknown note ${id}`);
    return n;
  }

  async fetchAttachments(item: SourceItem): Promise<Attachment[]> {
    return this.note(item.id).attachments ?? [];
  }

  async getInlineBody(item: SourceItem): Promise<string | undefined> {
    return this.note(item.id).body;
  }

  async markConsumed(itemId: string): Promise<boolean> {
    if (this.opts.failMarkConsumed) return false;
    this.consumed.add(itemId);
    return true;
  }
}

/** UTF-8 decode of every attachment. */
export class MockExtractor implements TextExtractor {
  async extractText(bytes: Uint8Array, _mediaKindHint: string): Promise<string | undefined> {
    const text = Buffer.from(bytes).toString('utf8').trim();
    return text || undefined;
  }
}

/**
 * One task per non-blank line. Optional trailing fields, separated by `|`:
 * `summary | due | suggested | duration`.
 */
export class MockParser implements TaskParser {
  constructor(private zone = 'UTC') {}

  async parseTasks(text: string): Promise<Task[]> {
    const tasks: Task[] = [];
    text.split('\n').forEach((line, idx) => {
      const [summary = '', due, suggested, duration] = line.split('|').map((s) => s.trim());
      if (!summary) return;
      tasks.push({
        summary,
        priority: 'medium',
        explicitDue: toExplicitDue(due || undefined, this.zone) ?? ABSENT,
        suggestedDateTime: suggested || undefined,
        suggestedDuration: duration || undefined,
        sourceLine: line.trim(),
        lineNumber: idx + 1,
      });
    });
    return tasks;
  }
}

export interface MockEvent {
  summary: string;
  description: string;
  start: DateTime;
  end: DateTime;
  isAllDay: boolean;
  timezone: string;
}

export class MockCalendar implements EventMaterializer {
  readonly events: MockEvent[] = [];

  /** `fail` decides per summary whether creation reports failure. */
  constructor(private fail: (summary: string) => boolean = () => false) {}

  async createEvent(summary: string, description: string, window: ScheduledWindow, timezone: string): Promise<boolean> {
    if (this.fail(summary)) return false;
    this.events.push({ summary, description, ...window, timezone });
    return true;
  }
}
