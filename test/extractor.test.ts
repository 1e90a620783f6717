import { describe, expect, it, vi } from 'vitest';
import { CommandTextExtractor } from '../src/providers/extractor.js';

const bytes = Buffer.from('raw');

function extractor(output = '  Call plumber\n\n', opts: { ocrCommand?: string; pdfCommand?: string } = {}) {
  const runner = vi.fn(async (_command: string, _args: string[], _input: Uint8Array) => output);
  return { extractor: new CommandTextExtractor({ ...opts, runner }), runner };
}

describe('CommandTextExtractor', () => {
  it('decodes text files without running a command', async () => {
    const { extractor: x, runner } = extractor();
    expect(await x.extractText(Buffer.from(' Buy stamps \n'), 'txt')).toBe('Buy stamps');
    expect(runner).not.toHaveBeenCalled();
  });

  it('runs OCR on images and trims the output', async () => {
    const { extractor: x, runner } = extractor();
    expect(await x.extractText(bytes, 'png')).toBe('Call plumber');
    expect(runner).toHaveBeenCalledWith('tesseract', ['stdin', 'stdout'], bytes);
  });

  it('runs the configured pdf command and accepts an upper-case hint with a dot', async () => {
    const { extractor: x, runner } = extractor('text', { pdfCommand: '/opt/bin/pdftotext' });
    expect(await x.extractText(bytes, '.PDF')).toBe('text');
    expect(runner).toHaveBeenCalledWith('/opt/bin/pdftotext', ['-layout', '-', '-'], bytes);
  });

  it('yields no text for unknown kinds or blank output', async () => {
    const { extractor: x, runner } = extractor(' \n ');
    expect(await x.extractText(bytes, 'docx')).toBeUndefined();
    expect(runner).not.toHaveBeenCalled();
    expect(await x.extractText(bytes, 'jpg')).toBeUndefined();
  });

  it('propagates command failures', async () => {
    const runner = vi.fn(async () => {
      throw new Error('tesseract exited with 1: bad image');
    });
    const x = new CommandTextExtractor({ runner });
    await expect(x.extractText(bytes, 'png')).rejects.toThrow('tesseract exited with 1: bad image');
  });
});
