import type { Attachment, SourceItem } from '../model.js';
import type { Logger } from '../log.js';
import type { JsonRequestOptions } from '../http.js';
import type { CandidateFilter, SourceRetriever } from './provider.js';
import type { GoogleAuth } from './googleAuth.js';

const BASE = 'https://gmail.googleapis.com/gmail/v1/users/me';

interface GmailMessageRef {
  id: string;
  threadId?: string;
}

interface GmailListResponse {
  messages?: GmailMessageRef[];
  nextPageToken?: string;
}

interface GmailPart {
  partId?: string;
  mimeType?: string;
  filename?: string;
  headers?: Array<{ name: string; value: string }>;
  body?: { attachmentId?: string; data?: string; size?: number };
  parts?: GmailPart[];
}

interface GmailMessage {
  id: string;
  internalDate?: string;
  payload?: GmailPart;
}

interface GmailAttachmentResponse {
  data?: string;
  size?: number;
}

export function buildNotesQuery(filter: CandidateFilter): string {
  const base = `from:${filter.sender} is:unread subject:"${filter.subjectKeyword}"`;
  return `(${base} has:attachment) OR (${base} -has:attachment)`;
}

/** Every part of a MIME tree, depth first, the root included. */
export function flattenParts(root: GmailPart | undefined): GmailPart[] {
  if (!root) return [];
  const out: GmailPart[] = [root];
  for (const p of root.parts ?? []) out.push(...flattenParts(p));
  return out;
}

function decodeBase64Url(data: string): Buffer {
  return Buffer.from(data, 'base64url');
}

function stripHtml(html: string): string {
  return html
    .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, '')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/(p|div|li|tr|h[1-6])>/gi, '\n')
    .replace(/<[^>]+>/g, '')
    .replace(/&nbsp;/g, ' ')
    .replace(/&amp;/g, '&')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export interface GmailSourceOptions {
  auth: GoogleAuth;
  logger: Logger;
  /** Messages requested per list page (default: 100). */
  pageSize?: number;
}

export class GmailSource implements SourceRetriever {
  private messages = new Map<string, Promise<GmailMessage>>();

  constructor(private opts: GmailSourceOptions) {}

  private async required<T>(path: string, init?: JsonRequestOptions): Promise<T> {
    const res = await this.opts.auth.api<T>(BASE, path, init);
    if (res === undefined) throw new Error(`Gmail returned an empty body for ${path}`);
    return res;
  }

  async listCandidateItems(filter: CandidateFilter): Promise<SourceItem[]> {
    const q = buildNotesQuery(filter);
    this.opts.logger.debug('gmail search', { q });

    const out: SourceItem[] = [];
    const seen = new Set<string>();
    let pageToken: string | undefined;
    do {
      const res = await this.required<GmailListResponse>('/messages', {
        query: { q, maxResults: this.opts.pageSize ?? 100, pageToken },
      });
      for (const m of res.messages ?? []) {
        if (seen.has(m.id)) continue;
        seen.add(m.id);
        out.push({ id: m.id });
      }
      pageToken = res.nextPageToken;
    } while (pageToken);

    return out;
  }

  private message(id: string): Promise<GmailMessage> {
    let pending = this.messages.get(id);
    if (!pending) {
      pending = this.required<GmailMessage>(`/messages/${encodeURIComponent(id)}`, { query: { format: 'full' } });
      // a failed fetch is not cached, so a later call retries
      void pending.catch(() => this.messages.delete(id));
      this.messages.set(id, pending);
    }
    return pending;
  }

  async fetchAttachments(item: SourceItem): Promise<Attachment[]> {
    const msg = await this.message(item.id);
    const out: Attachment[] = [];

    for (const part of flattenParts(msg.payload)) {
      const filename = part.filename;
      if (!filename) continue;

      if (part.body?.attachmentId) {
        const att = await this.required<GmailAttachmentResponse>(
          `/messages/${encodeURIComponent(item.id)}/attachments/${encodeURIComponent(part.body.attachmentId)}`,
        );
        if (!att.data) {
          this.opts.logger.warn('attachment without data', { item: item.id, filename });
          continue;
        }
        out.push({ filename, bytes: decodeBase64Url(att.data) });
      } else if (part.body?.data) {
        out.push({ filename, bytes: decodeBase64Url(part.body.data) });
      }
    }

    return out;
  }

  async getInlineBody(item: SourceItem): Promise<string | undefined> {
    const parts = flattenParts((await this.message(item.id)).payload).filter((p) => !p.filename && p.body?.data);

    const plain = parts.find((p) => p.mimeType === 'text/plain');
    if (plain?.body?.data) return decodeBase64Url(plain.body.data).toString('utf8');

    const html = parts.find((p) => p.mimeType === 'text/html');
    if (html?.body?.data) return stripHtml(decodeBase64Url(html.body.data).toString('utf8'));

    return undefined;
  }

  async markConsumed(itemId: string): Promise<boolean> {
    try {
      await this.opts.auth.api<GmailMessage>(BASE, `/messages/${encodeURIComponent(itemId)}/modify`, {
        method: 'POST',
        body: { removeLabelIds: ['UNREAD'] },
      });
      return true;
    } catch (e) {
      this.opts.logger.warn(`could not mark ${itemId} as read`, e);
      return false;
    }
  }
}
