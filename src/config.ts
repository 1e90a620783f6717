import { InvalidArgumentError } from 'commander';
import { z } from 'zod';
import { IANAZone } from 'luxon';

const str = z.string().min(1);
const hour = z.coerce.number().int().min(0).max(23);

export const EnvSchema = z.object({
  // behavior
  NOTE_SCHEDULER_LOG_LEVEL: z.enum(['silent', 'error', 'warn', 'info', 'debug']).default('info'),
  NOTE_SCHEDULER_STATE_DIR: str.optional(),
  NOTE_SCHEDULER_TIMEZONE: str
    .refine((tz) => IANAZone.isValidZone(tz), { message: 'not a valid IANA time zone' })
    .default('Europe/Dublin'),
  NOTE_SCHEDULER_DAY_START_HOUR: hour.default(9),
  NOTE_SCHEDULER_EVENING_CUTOFF_HOUR: hour.default(17),
  NOTE_SCHEDULER_CONCURRENCY: z.coerce.number().int().positive().default(1),
  NOTE_SCHEDULER_POLL_INTERVAL_MINUTES: z.coerce.number().int().positive().optional(),
  NOTE_SCHEDULER_HTTP_RPS: z.coerce.number().positive().optional(),

  // which mails count as notes
  NOTE_SCHEDULER_SENDER: str.default('noreply@remarkable.com'),
  NOTE_SCHEDULER_SUBJECT_KEYWORD: str.default('reMarkable Note'),

  // Google (Gmail + Calendar share one OAuth client)
  NOTE_SCHEDULER_GOOGLE_CLIENT_ID: str.optional(),
  NOTE_SCHEDULER_GOOGLE_CLIENT_SECRET: str.optional(),
  NOTE_SCHEDULER_GOOGLE_REFRESH_TOKEN: str.optional(),
  NOTE_SCHEDULER_CALENDAR_ID: str.default('primary'),

  // task parsing
  NOTE_SCHEDULER_OPENAI_API_KEY: str.optional(),
  NOTE_SCHEDULER_OPENAI_MODEL: str.default('gpt-4o-mini'),

  // text extraction
  NOTE_SCHEDULER_OCR_COMMAND: str.default('tesseract'),
  NOTE_SCHEDULER_PDF_TEXT_COMMAND: str.default('pdftotext'),
});

const positiveInt = z.coerce.number().int().positive();

/** commander argParser for count-like flags; same rule as the env schema. */
export function parsePositiveInt(value: string): number {
  const parsed = positiveInt.safeParse(value);
  if (!parsed.success) throw new InvalidArgumentError(`Expected a positive integer, got "${value}".`);
  return parsed.data;
}

export type EnvConfig = z.infer<typeof EnvSchema>;

export function readEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return EnvSchema.parse(env);
}

const REQUIRED = [
  'NOTE_SCHEDULER_GOOGLE_CLIENT_ID',
  'NOTE_SCHEDULER_GOOGLE_CLIENT_SECRET',
  'NOTE_SCHEDULER_GOOGLE_REFRESH_TOKEN',
  'NOTE_SCHEDULER_OPENAI_API_KEY',
] as const satisfies ReadonlyArray<keyof EnvConfig>;

export function doctorReport(env = readEnv()) {
  const missing = REQUIRED.filter((k) => !env[k]);
  const notes: string[] = [
    `Timezone: ${env.NOTE_SCHEDULER_TIMEZONE} (default slot ${env.NOTE_SCHEDULER_DAY_START_HOUR}:00, cutoff ${env.NOTE_SCHEDULER_EVENING_CUTOFF_HOUR}:00).`,
    `Mail filter: from ${env.NOTE_SCHEDULER_SENDER}, subject "${env.NOTE_SCHEDULER_SUBJECT_KEYWORD}".`,
  ];

  if (env.NOTE_SCHEDULER_EVENING_CUTOFF_HOUR <= env.NOTE_SCHEDULER_DAY_START_HOUR) {
    notes.push('Evening cutoff is not after the day start hour; same-day default slots will start in the past.');
  }
  notes.push('Google refresh token needs the gmail.modify and calendar.events scopes.');

  return { missing: [...missing], notes };
}

/** Narrows the env to the credentials a live run needs, or lists what is absent. */
export function requireCredentials(env: EnvConfig):
  | {
      ok: true;
      google: { clientId: string; clientSecret: string; refreshToken: string };
      openaiApiKey: string;
    }
  | { ok: false; missing: string[] } {
  const {
    NOTE_SCHEDULER_GOOGLE_CLIENT_ID: clientId,
    NOTE_SCHEDULER_GOOGLE_CLIENT_SECRET: clientSecret,
    NOTE_SCHEDULER_GOOGLE_REFRESH_TOKEN: refreshToken,
    NOTE_SCHEDULER_OPENAI_API_KEY: openaiApiKey,
  } = env;
  if (clientId && clientSecret && refreshToken && openaiApiKey) {
    return { ok: true, google: { clientId, clientSecret, refreshToken }, openaiApiKey };
  }
  return { ok: false, missing: doctorReport(env).missing };
}
