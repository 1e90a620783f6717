#!/usr/bin/env node
import { mkdtemp } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { Command } from 'commander';
import { DateTime } from 'luxon';
import OpenAI from 'openai';
import { doctorReport, parsePositiveInt, readEnv, requireCredentials, type EnvConfig } from './config.js';
import { loadEnvFiles } from './env.js';
import { createLogger, type Logger } from './log.js';
import type { Task } from './model.js';
import { IngestionPipeline, type RunReport } from './pipeline/pipeline.js';
import { GoogleCalendarSink } from './providers/calendar.js';
import { CommandTextExtractor } from './providers/extractor.js';
import { GmailSource } from './providers/gmail.js';
import { GoogleAuth } from './providers/googleAuth.js';
import { MockCalendar, MockExtractor, MockParser, MockSource } from './providers/mock.js';
import { OpenAITaskParser, toExplicitDue } from './providers/openai.js';
import { parseIsoTimestamp, resolveWindow } from './schedule/resolver.js';
import { ProcessedItemLedger } from './store/ledger.js';

loadEnvFiles();

const program = new Command();

program
  .name('note-scheduler')
  .description('Turn handwritten-note emails into calendar events, at most once per note')
  .version('0.1.0');

function stateDir(env: EnvConfig, override?: string) {
  return override ?? env.NOTE_SCHEDULER_STATE_DIR ?? path.join(process.cwd(), '.note-scheduler');
}

function printReport(report: RunReport, format: string) {
  if (format === 'json') {
    console.log(JSON.stringify(report, null, 2));
    return;
  }

  console.log('note-scheduler report');
  console.log(`startedAt: ${report.startedAt}`);
  console.log(`dryRun: ${report.dryRun}`);
  console.log(`durationMs: ${report.durationMs}`);
  console.log(`candidates: ${report.candidates}`);

  console.log('\ncounts:');
  for (const k of Object.keys(report.counts) as Array<keyof typeof report.counts>) {
    console.log(`- ${k}: ${report.counts[k]}`);
  }

  if (report.errors.length) {
    console.log('\nerrors:');
    for (const e of report.errors) console.log(`- (${e.stage}): ${e.error}`);
  }

  console.log('\nitems:');
  for (const i of report.items) {
    const detail = i.status === 'failed' ? ` [${i.stage}] ${i.error}` : ` tasks=${i.tasks} events=${i.events}`;
    console.log(`- ${i.id} ${i.status}${detail}`);
    for (const p of i.plan ?? []) {
      const when = p.isAllDay ? `all-day ${p.start.slice(0, 10)}` : `${p.start} -> ${p.end}`;
      console.log(`    ${when} "${p.summary}"`);
    }
    for (const w of i.warnings) console.log(`    ! ${w}`);
  }
}

function sleep(ms: number) {
  return new Promise((r) => setTimeout(r, ms));
}

program
  .command('doctor')
  .description('Check environment/config and print what is missing')
  .action(() => {
    const report = doctorReport();
    console.log('note-scheduler doctor');
    if (report.missing.length) {
      console.log('\nMissing env vars:');
      for (const k of report.missing) console.log(`- ${k}`);
      process.exitCode = 2;
    } else {
      console.log('\nNo missing env vars detected.');
    }

    console.log('\nNotes:');
    for (const n of report.notes) console.log(`- ${n}`);
  });

program
  .command('run')
  .description('Fetch new note emails and create calendar events for their tasks')
  .option('--dry-run', 'Resolve windows only; create no events and record nothing')
  .option('--state-dir <dir>', 'Override state dir (default: .note-scheduler or NOTE_SCHEDULER_STATE_DIR)')
  .option('--format <format>', 'Output format: pretty|json', 'pretty')
  .option(
    '--poll <minutes>',
    'Polling mode: run every N minutes (or use NOTE_SCHEDULER_POLL_INTERVAL_MINUTES)',
    parsePositiveInt,
  )
  .option('--concurrency <n>', 'Items processed at once (or use NOTE_SCHEDULER_CONCURRENCY)', parsePositiveInt)
  .action(async (opts: { dryRun?: boolean; stateDir?: string; format: string; poll?: number; concurrency?: number }) => {
    const env = readEnv();
    const logger = createLogger(env.NOTE_SCHEDULER_LOG_LEVEL);

    const creds = requireCredentials(env);
    if (!creds.ok) {
      console.error(`Configuration incomplete (${creds.missing.join(', ')}). Run: note-scheduler doctor`);
      process.exitCode = 2;
      return;
    }

    const timezone = env.NOTE_SCHEDULER_TIMEZONE;
    const auth = new GoogleAuth({ ...creds.google, rps: env.NOTE_SCHEDULER_HTTP_RPS });
    const calendar = new GoogleCalendarSink({
      auth,
      logger: logger.child('calendar'),
      calendarId: env.NOTE_SCHEDULER_CALENDAR_ID,
    });

    const pipeline = new IngestionPipeline(
      {
        source: new GmailSource({ auth, logger: logger.child('gmail') }),
        extractor: new CommandTextExtractor({
          ocrCommand: env.NOTE_SCHEDULER_OCR_COMMAND,
          pdfCommand: env.NOTE_SCHEDULER_PDF_TEXT_COMMAND,
        }),
        parser: new OpenAITaskParser({
          client: new OpenAI({ apiKey: creds.openaiApiKey }),
          model: env.NOTE_SCHEDULER_OPENAI_MODEL,
          logger: logger.child('parser'),
          timezone,
          availability: (from, to) => calendar.listBusy(from, to),
        }),
        calendar,
        ledger: new ProcessedItemLedger(stateDir(env, opts.stateDir)),
      },
      {
        timezone,
        filter: { sender: env.NOTE_SCHEDULER_SENDER, subjectKeyword: env.NOTE_SCHEDULER_SUBJECT_KEYWORD },
        defaultDayStartHour: env.NOTE_SCHEDULER_DAY_START_HOUR,
        eveningCutoffHour: env.NOTE_SCHEDULER_EVENING_CUTOFF_HOUR,
        concurrency: opts.concurrency ?? env.NOTE_SCHEDULER_CONCURRENCY,
        dryRun: !!opts.dryRun,
        logger,
      },
    );

    const pollMinutes = opts.poll ?? env.NOTE_SCHEDULER_POLL_INTERVAL_MINUTES;

    while (true) {
      const report = await pipeline.run();
      printReport(report, opts.format);
      if (report.counts.failed > 0 || report.errors.length > 0) process.exitCode = 3;

      if (pollMinutes === undefined) break;
      logger.info(`poll sleep ${pollMinutes}m`);
      await sleep(pollMinutes * 60_000);
    }
  });

program
  .command('resolve')
  .description('Show the calendar window a task with the given hints would get')
  .requiredOption('--summary <text>', 'Task summary')
  .option('--due <date>', 'Explicit due date (YYYY-MM-DD) or date-time')
  .option('--suggested <iso>', 'Suggested ISO-8601 date-time')
  .option('--duration <text>', 'Suggested duration, e.g. "45 minutes"')
  .option('--now <iso>', 'Pretend the current time is this')
  .action((opts: { summary: string; due?: string; suggested?: string; duration?: string; now?: string }) => {
    const env = readEnv();
    const zone = env.NOTE_SCHEDULER_TIMEZONE;

    const now = opts.now ? parseIsoTimestamp(opts.now, zone)?.setZone(zone) : DateTime.now().setZone(zone);
    if (!now) throw new Error(`--now is not an ISO-8601 timestamp: ${opts.now}`);
    const explicitDue = toExplicitDue(opts.due, zone);
    if (!explicitDue) throw new Error(`--due is not a date or date-time: ${opts.due}`);

    const task: Task = {
      summary: opts.summary,
      priority: 'medium',
      explicitDue,
      suggestedDateTime: opts.suggested,
      suggestedDuration: opts.duration,
      sourceLine: opts.summary,
    };
    const r = resolveWindow(task, now, {
      defaultDayStartHour: env.NOTE_SCHEDULER_DAY_START_HOUR,
      eveningCutoffHour: env.NOTE_SCHEDULER_EVENING_CUTOFF_HOUR,
    });

    console.log(`rule: ${r.rule}${r.fallback ? ` (fallback: ${r.fallback})` : ''}`);
    console.log(`start: ${r.window.start.toISO()}`);
    console.log(`end: ${r.window.end.toISO()}`);
    console.log(`allDay: ${r.window.isAllDay}`);
  });

program
  .command('ledger')
  .description('Print how many items are recorded as processed')
  .option('--state-dir <dir>', 'Override state dir')
  .action(async (opts: { stateDir?: string }) => {
    const ledger = new ProcessedItemLedger(stateDir(readEnv(), opts.stateDir));
    const ids = await ledger.snapshot();
    console.log(`${ledger.filePath()}: ${ids.size} processed item(s)`);
  });

program
  .command('mock')
  .description('Run the pipeline once against in-memory collaborators (for demos/tests)')
  .option('--format <format>', 'Output format: pretty|json', 'pretty')
  .action(async (opts: { format: string }) => {
    const logger: Logger = createLogger('info');
    const zone = 'UTC';
    const dir = await mkdtemp(path.join(os.tmpdir(), 'note-scheduler-'));

    const source = new MockSource([
      {
        id: 'note-1',
        body: ['Call the plumber | 2030-01-15T10:30 | | 30 minutes', 'Renew passport | 2030-01-20 | not-a-date', 'Buy stamps'].join('\n'),
      },
      { id: 'note-2', body: '   ' },
    ]);

    const pipeline = new IngestionPipeline(
      {
        source,
        extractor: new MockExtractor(),
        parser: new MockParser(zone),
        calendar: new MockCalendar(),
        ledger: new ProcessedItemLedger(dir),
      },
      { timezone: zone, filter: { sender: 'notes@example.com', subjectKeyword: 'Note' }, logger },
    );

    logger.info('mock run start', { stateDir: dir });
    printReport(await pipeline.run(), opts.format);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
