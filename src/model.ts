import type { DateTime } from 'luxon';

/** Priority label as produced by the parser ("high", "P1", ...). Opaque to the core. */
export type Priority = string;

/**
 * A date or date-time written explicitly in the source text.
 * `onDate` carries a midnight-aligned DateTime in the calendar zone.
 */
export type ExplicitDue =
  | { kind: 'absent' }
  | { kind: 'onDate'; date: DateTime }
  | { kind: 'atDateTime'; at: DateTime };

export interface Task {
  summary: string;
  priority: Priority;
  explicitDue: ExplicitDue;
  /** ISO-8601 timestamp inferred by the parser. Free-form model output, may be malformed. */
  suggestedDateTime?: string;
  /** e.g. "30 minutes", "2h", "flexible" */
  suggestedDuration?: string;
  sourceLine: string;
  lineNumber?: number;
}

/** [start, end). All-day windows are midnight-aligned and one calendar day long. */
export interface ScheduledWindow {
  start: DateTime;
  end: DateTime;
  isAllDay: boolean;
}

export interface SourceItem {
  /** Stable provider id (Gmail message id). */
  id: string;
  subject?: string;
  /** ISO */
  receivedAt?: string;
}

export interface Attachment {
  filename: string;
  bytes: Uint8Array;
}

export const ABSENT: ExplicitDue = { kind: 'absent' };
