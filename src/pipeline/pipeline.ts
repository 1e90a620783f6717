import path from 'node:path';
import { DateTime } from 'luxon';
import type { Logger } from '../log.js';
import type { ScheduledWindow, SourceItem, Task } from '../model.js';
import type { CandidateFilter, EventMaterializer, SourceRetriever, TaskParser, TextExtractor } from '../providers/provider.js';
import { resolveWindow, type ResolveOptions } from '../schedule/resolver.js';
import { LedgerError, type ProcessedItemLedger } from '../store/ledger.js';
import { acquireLock } from '../store/lock.js';

export type ItemStage = 'extract' | 'parse' | 'materialize';

export type ItemStatus = 'processed' | 'failed' | 'skipped' | 'planned';

export interface ItemOutcome {
  id: string;
  status: ItemStatus;
  /** Stage that failed. */
  stage?: ItemStage;
  error?: string;
  tasks: number;
  /** Events created for this item (also on partial failure). */
  events: number;
  warnings: string[];
  /** Dry runs only. */
  plan?: Array<{ summary: string; start: string; end: string; isAllDay: boolean }>;
}

export interface RunReport {
  dryRun: boolean;
  startedAt: string;
  durationMs: number;
  candidates: number;
  counts: Record<ItemStatus, number>;
  items: ItemOutcome[];
  errors: Array<{ stage: 'list'; error: string }>;
}

export interface PipelineCollaborators {
  source: SourceRetriever;
  extractor: TextExtractor;
  parser: TaskParser;
  calendar: EventMaterializer;
  ledger: ProcessedItemLedger;
}

export interface PipelineOptions extends ResolveOptions {
  /** IANA zone events are created in and "now" is read in. */
  timezone: string;
  filter: CandidateFilter;
  logger: Logger;
  /** Items processed at once (default: 1, sequential). */
  concurrency?: number;
  /** Resolve only: nothing is created, committed or marked. */
  dryRun?: boolean;
  clock?: () => DateTime;
}

/** A collaborator failure inside one item, tagged with the stage it happened in. */
export class ItemStageError extends Error {
  constructor(
    public readonly stage: ItemStage,
    public readonly itemId: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ItemStageError';
  }
}

function errMsg(e: unknown) {
  return e instanceof Error ? e.message : String(e);
}

async function atStage<T>(stage: ItemStage, itemId: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (e) {
    if (e instanceof ItemStageError || e instanceof LedgerError) throw e;
    throw new ItemStageError(stage, itemId, errMsg(e), { cause: e });
  }
}

/**
 * Runs `fn` over `items` with at most `limit` in flight. The first rejection
 * stops new work; in-flight calls finish before it is rethrown.
 */
async function mapPool<T, R>(items: T[], limit: number, fn: (item: T) => Promise<R>): Promise<R[]> {
  const results: R[] = [];
  let next = 0;
  let failure: { error: unknown } | undefined;

  const worker = async () => {
    while (!failure && next < items.length) {
      const i = next++;
      try {
        results[i] = await fn(items[i]);
      } catch (error) {
        failure ??= { error };
      }
    }
  };

  const width = Number.isFinite(limit) && limit >= 1 ? Math.floor(limit) : 1;
  await Promise.all(Array.from({ length: Math.max(1, Math.min(width, items.length)) }, worker));
  if (failure) throw failure.error;
  return results;
}

export function describeTask(task: Task, processedOn: string): string {
  return [
    `Priority: ${task.priority}`,
    `Source: '${task.sourceLine}'`,
    ...(task.lineNumber !== undefined ? [`(Line ${task.lineNumber})`] : []),
    `Processed by note-scheduler on ${processedOn}`,
  ].join('\n');
}

function attachmentKind(filename: string) {
  return path.extname(filename).slice(1).toLowerCase();
}

/**
 * fetch candidates → drop ids already in the ledger → per item: extract →
 * parse → resolve → materialize → commit.
 *
 * Items are isolated: a failing item is reported and left uncommitted, the
 * run moves on. An item is committed only when every one of its tasks became
 * an event; zero tasks counts as a failure so the note is retried later.
 * Ledger errors abort the run.
 */
export class IngestionPipeline {
  private log: Logger;

  constructor(
    private deps: PipelineCollaborators,
    private opts: PipelineOptions,
  ) {
    this.log = opts.logger.child('pipeline');
  }

  private now(): DateTime {
    return (this.opts.clock ?? (() => DateTime.now()))().setZone(this.opts.timezone);
  }

  async run(): Promise<RunReport> {
    const started = Date.now();
    const now = this.now();
    const dryRun = !!this.opts.dryRun;
    const { ledger, source } = this.deps;

    const counts: RunReport['counts'] = { processed: 0, failed: 0, skipped: 0, planned: 0 };
    const items: ItemOutcome[] = [];
    const errors: RunReport['errors'] = [];
    let candidates: SourceItem[] = [];

    const lock = await acquireLock(ledger.getDir());
    try {
      await ledger.open();
      const done = await ledger.snapshot();
      this.log.info(`run start (dryRun=${dryRun})`, { alreadyProcessed: done.size });

      try {
        candidates = await source.listCandidateItems(this.opts.filter);
      } catch (e) {
        this.log.error('listing candidate items failed', e);
        errors.push({ stage: 'list', error: errMsg(e) });
      }

      const fresh: SourceItem[] = [];
      const seen = new Set<string>();
      for (const item of candidates) {
        if (seen.has(item.id)) continue;
        seen.add(item.id);
        if (done.has(item.id)) {
          items.push({ id: item.id, status: 'skipped', tasks: 0, events: 0, warnings: [] });
        } else {
          fresh.push(item);
        }
      }
      this.log.info(`${fresh.length} new item(s), ${items.length} already processed`);

      const outcomes = await mapPool(fresh, this.opts.concurrency ?? 1, (item) => this.processItem(item, now, dryRun));
      items.push(...outcomes);
    } finally {
      await lock.release();
    }

    for (const o of items) counts[o.status]++;
    const report: RunReport = {
      dryRun,
      startedAt: now.toISO() ?? new Date(started).toISOString(),
      durationMs: Date.now() - started,
      candidates: candidates.length,
      counts,
      items,
      errors,
    };
    this.log.info('run complete', counts);
    return report;
  }

  private async extract(item: SourceItem, log: Logger): Promise<string[]> {
    const { source, extractor } = this.deps;
    const attachments = await source.fetchAttachments(item);

    if (attachments.length === 0) {
      log.debug('no attachments; using the message body');
      const body = await source.getInlineBody(item);
      return body && body.trim() ? [body] : [];
    }

    const texts: string[] = [];
    for (const att of attachments) {
      const text = await extractor.extractText(att.bytes, attachmentKind(att.filename));
      if (text && text.trim()) texts.push(text);
      else log.info(`no text in attachment ${att.filename}`);
    }
    return texts;
  }

  private resolveAll(tasks: Task[], now: DateTime, log: Logger, warnings: string[]) {
    return tasks.map((task) => {
      const r = resolveWindow(task, now, this.opts);
      if (r.fallback === 'malformed-suggested-datetime') {
        const msg = `suggestedDateTime "${task.suggestedDateTime}" for "${task.summary}" is not ISO-8601; used ${r.rule}`;
        log.warn(msg);
        warnings.push(msg);
      } else if (r.rule === 'default-slot') {
        log.debug(`"${task.summary}" has no date hints; default slot`);
      }
      return { task, window: r.window, rule: r.rule };
    });
  }

  private async processItem(item: SourceItem, now: DateTime, dryRun: boolean): Promise<ItemOutcome> {
    const log = this.log.child(item.id);
    const { parser, calendar, ledger, source } = this.deps;
    const warnings: string[] = [];
    const outcome = (status: ItemStatus, extra: Partial<ItemOutcome> = {}): ItemOutcome => ({
      id: item.id,
      status,
      tasks: 0,
      events: 0,
      warnings,
      ...extra,
    });

    let taskCount = 0;
    let created = 0;
    try {
      const texts = await atStage('extract', item.id, () => this.extract(item, log));

      const tasks: Task[] = [];
      for (const text of texts) {
        tasks.push(...(await atStage('parse', item.id, () => parser.parseTasks(text))));
      }
      if (tasks.length === 0) {
        log.warn('no tasks found; leaving the item for a later run');
        return outcome('failed', { stage: 'parse', error: 'no tasks extracted' });
      }

      taskCount = tasks.length;
      const planned: Array<{ task: Task; window: ScheduledWindow }> = this.resolveAll(tasks, now, log, warnings);

      if (dryRun) {
        return outcome('planned', {
          tasks: tasks.length,
          plan: planned.map(({ task, window }) => ({
            summary: task.summary,
            start: window.start.toISO() ?? '',
            end: window.end.toISO() ?? '',
            isAllDay: window.isAllDay,
          })),
        });
      }

      const processedOn = now.toISODate() ?? '';
      const notCreated: string[] = [];
      for (const { task, window } of planned) {
        const ok = await calendar
          .createEvent(task.summary, describeTask(task, processedOn), window, this.opts.timezone)
          .catch((e: unknown) => {
            log.error(`createEvent threw for "${task.summary}"`, e);
            return false;
          });
        if (ok) created++;
        else notCreated.push(task.summary);
      }
      if (notCreated.length) {
        throw new ItemStageError(
          'materialize',
          item.id,
          `${notCreated.length} of ${planned.length} event(s) not created: ${notCreated.join(', ')}`,
        );
      }
    } catch (e) {
      if (!(e instanceof ItemStageError)) throw e;
      log.error(`failed at ${e.stage}: ${e.message}`);
      return outcome('failed', { stage: e.stage, error: e.message, tasks: taskCount, events: created });
    }

    await ledger.commit(item.id);
    if (!(await source.markConsumed(item.id))) {
      const msg = 'could not mark the item consumed at the source; the ledger still prevents reprocessing';
      log.warn(msg);
      warnings.push(msg);
    }
    log.info(`processed: ${created} event(s)`);
    return outcome('processed', { tasks: taskCount, events: created });
  }
}
