import { describe, expect, it } from 'vitest';
import { parseDuration } from '../src/schedule/duration.js';

const minutes = (text?: string) => parseDuration(text).as('minutes');

describe('parseDuration', () => {
  it('defaults to one hour when absent or empty', () => {
    expect(minutes(undefined)).toBe(60);
    expect(minutes('')).toBe(60);
  });

  it('reads minutes and hours in their spelled and short forms', () => {
    expect(minutes('45 minutes')).toBe(45);
    expect(minutes('2 hours')).toBe(120);
    expect(minutes('30min')).toBe(30);
    expect(minutes('90 Mins')).toBe(90);
    expect(minutes('1 minute')).toBe(1);
    expect(minutes('2h')).toBe(120);
    expect(minutes('3 HRS')).toBe(180);
    expect(minutes('1 hr 30 min')).toBe(60);
  });

  it('falls back to one hour for flexible and unreadable hints', () => {
    expect(minutes('flexible')).toBe(60);
    expect(minutes('Flexible, whenever')).toBe(60);
    expect(minutes('gibberish')).toBe(60);
    expect(minutes('about 30 minutes')).toBe(60);
    expect(minutes('5 hamburgers')).toBe(60);
  });

  it('never returns a zero-length span', () => {
    expect(minutes('0 minutes')).toBe(60);
  });
});
