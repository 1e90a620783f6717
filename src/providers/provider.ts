import type { Attachment, ScheduledWindow, SourceItem, Task } from '../model.js';

export interface CandidateFilter {
  /** Sender address the notes arrive from. */
  sender: string;
  /** Text the subject must contain. */
  subjectKeyword: string;
}

/** Where notes come from (a mailbox). */
export interface SourceRetriever {
  listCandidateItems(filter: CandidateFilter): Promise<SourceItem[]>;
  fetchAttachments(item: SourceItem): Promise<Attachment[]>;
  getInlineBody(item: SourceItem): Promise<string | undefined>;
  /** Idempotent. Never rejects; `false` when the item could not be marked. */
  markConsumed(itemId: string): Promise<boolean>;
}

export interface TextExtractor {
  /** `mediaKindHint` is the lower-case file extension without dot ("pdf", "png"). */
  extractText(bytes: Uint8Array, mediaKindHint: string): Promise<string | undefined>;
}

export interface TaskParser {
  parseTasks(text: string): Promise<Task[]>;
}

export interface EventMaterializer {
  /** `false` (or a rejection) means the event was not created. */
  createEvent(summary: string, description: string, window: ScheduledWindow, timezone: string): Promise<boolean>;
}
