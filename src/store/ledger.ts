import { mkdir, open, readFile } from 'node:fs/promises';
import path from 'node:path';

export class LedgerError extends Error {
  constructor(
    message: string,
    public readonly ledgerPath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'LedgerError';
  }
}

function errnoCode(e: unknown): string | undefined {
  if (e instanceof Error && 'code' in e && typeof e.code === 'string') return e.code;
  return undefined;
}

const decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Append-only record of fully processed source item ids: one id per line,
 * UTF-8, newline-terminated. Ids are never removed.
 *
 * A missing file is an empty ledger (first run). Anything else that stops us
 * from reading every id back exactly (I/O error, invalid UTF-8, a last line
 * without its newline) throws {@link LedgerError}.
 */
export class ProcessedItemLedger {
  private known = new Set<string>();
  private opened = false;
  private queue: Promise<void> = Promise.resolve();

  constructor(private dir = path.join(process.cwd(), '.note-scheduler')) {}

  getDir() {
    return this.dir;
  }

  filePath() {
    return path.join(this.dir, 'processed_items.log');
  }

  get size() {
    return this.known.size;
  }

  has(id: string) {
    return this.known.has(id);
  }

  async open(): Promise<this> {
    this.known = await this.readPersisted();
    this.opened = true;
    return this;
  }

  /** Ids persisted on disk right now. */
  async snapshot(): Promise<Set<string>> {
    return this.readPersisted();
  }

  /**
   * Records `id` durably (fsync before resolving). Re-committing a known id is
   * a no-op. Calls are applied one at a time, in call order.
   */
  commit(id: string): Promise<void> {
    if (!id || /[\r\n]/.test(id)) {
      return Promise.reject(new LedgerError(`Refusing to record id ${JSON.stringify(id)}`, this.filePath()));
    }
    const next = this.queue.then(() => this.append(id));
    // keep the chain alive after a failed append; the caller still sees the rejection
    this.queue = next.catch(() => undefined);
    return next;
  }

  private async append(id: string): Promise<void> {
    if (!this.opened) await this.open();
    if (this.known.has(id)) return;

    try {
      await mkdir(this.dir, { recursive: true });
      const fh = await open(this.filePath(), 'a');
      try {
        await fh.appendFile(`${id}\n`, 'utf8');
        await fh.sync();
      } finally {
        await fh.close();
      }
    } catch (e) {
      throw new LedgerError(`Could not append to ledger: ${e instanceof Error ? e.message : String(e)}`, this.filePath(), {
        cause: e,
      });
    }
    this.known.add(id);
  }

  private async readPersisted(): Promise<Set<string>> {
    let raw: Buffer;
    try {
      raw = await readFile(this.filePath());
    } catch (e) {
      if (errnoCode(e) === 'ENOENT') return new Set();
      throw new LedgerError(`Could not read ledger: ${e instanceof Error ? e.message : String(e)}`, this.filePath(), {
        cause: e,
      });
    }

    let text: string;
    try {
      text = decoder.decode(raw);
    } catch (e) {
      throw new LedgerError('Ledger is not valid UTF-8', this.filePath(), { cause: e });
    }

    if (text.length > 0 && !text.endsWith('\n')) {
      throw new LedgerError('Ledger ends with an unterminated line (interrupted write?)', this.filePath());
    }

    const ids = new Set<string>();
    // ids are opaque: kept byte for byte, only a CRLF ending is undone
    for (const line of text.split('\n')) {
      const id = line.endsWith('\r') ? line.slice(0, -1) : line;
      if (id) ids.add(id);
    }
    return ids;
  }
}
