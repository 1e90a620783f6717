import { spawn } from 'node:child_process';
import type { TextExtractor } from './provider.js';

/** Runs `command args...` with `input` on stdin and resolves with stdout. */
export type CommandRunner = (command: string, args: string[], input: Uint8Array) => Promise<string>;

export const runCommand: CommandRunner = (command, args, input) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'] });
    const out: Buffer[] = [];
    const err: Buffer[] = [];
    child.stdout.on('data', (c: Buffer) => out.push(c));
    child.stderr.on('data', (c: Buffer) => err.push(c));
    child.on('error', reject);
    child.on('close', (code) => {
      if (code === 0) resolve(Buffer.concat(out).toString('utf8'));
      else reject(new Error(`${command} exited with ${code}: ${Buffer.concat(err).toString('utf8').trim()}`));
    });
    child.stdin.on('error', reject);
    child.stdin.end(input);
  });

const IMAGE_KINDS = new Set(['png', 'jpg', 'jpeg', 'gif', 'bmp', 'tif', 'tiff', 'webp']);
const TEXT_KINDS = new Set(['txt', 'text', 'md']);

export interface CommandTextExtractorOptions {
  /** OCR binary reading an image on stdin (default: tesseract). */
  ocrCommand?: string;
  /** PDF text binary reading stdin (default: pdftotext). */
  pdfCommand?: string;
  runner?: CommandRunner;
}

/**
 * Text from attachments through local tools: OCR for images, pdftotext for
 * PDFs, plain decoding for text files. Other kinds yield no text.
 */
export class CommandTextExtractor implements TextExtractor {
  private runner: CommandRunner;

  constructor(private opts: CommandTextExtractorOptions = {}) {
    this.runner = opts.runner ?? runCommand;
  }

  async extractText(bytes: Uint8Array, mediaKindHint: string): Promise<string | undefined> {
    const kind = mediaKindHint.toLowerCase().replace(/^\./, '');

    let text: string;
    if (TEXT_KINDS.has(kind)) {
      text = Buffer.from(bytes).toString('utf8');
    } else if (kind === 'pdf') {
      text = await this.runner(this.opts.pdfCommand ?? 'pdftotext', ['-layout', '-', '-'], bytes);
    } else if (IMAGE_KINDS.has(kind)) {
      text = await this.runner(this.opts.ocrCommand ?? 'tesseract', ['stdin', 'stdout'], bytes);
    } else {
      return undefined;
    }

    const trimmed = text.trim();
    return trimmed ? trimmed : undefined;
  }
}
