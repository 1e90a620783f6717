import { Duration } from 'luxon';

export const DEFAULT_DURATION = Duration.fromObject({ hours: 1 });

const QUANTITY = /^\s*(\d+)\s*(minutes|minute|mins|min|hours|hour|hrs|hr|h)\b/i;

/**
 * Free-text duration hint to a fixed span. Total: anything it cannot read
 * ("flexible", "", "gibberish", "0 min") becomes one hour.
 */
export function parseDuration(text?: string): Duration {
  if (!text) return DEFAULT_DURATION;

  const m = QUANTITY.exec(text);
  if (!m) return DEFAULT_DURATION;

  const value = Number(m[1]);
  if (!Number.isSafeInteger(value) || value <= 0) return DEFAULT_DURATION;

  const unit = (m[2] ?? '').toLowerCase();
  return unit.startsWith('m') ? Duration.fromObject({ minutes: value }) : Duration.fromObject({ hours: value });
}
