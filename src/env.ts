import { readFileSync, existsSync } from 'node:fs';
import path from 'node:path';

function unquote(value: string) {
  if (
    value.length >= 2 &&
    ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'")))
  ) {
    return value.slice(1, -1);
  }
  // unquoted values may carry a trailing ` # comment`
  const hash = value.indexOf(' #');
  return hash === -1 ? value : value.slice(0, hash).trimEnd();
}

/** Parses `KEY=VALUE` lines (optionally prefixed with `export `). */
export function parseEnvText(raw: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const line of raw.split(/\r?\n/)) {
    let trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    if (trimmed.startsWith('export ')) trimmed = trimmed.slice('export '.length).trimStart();

    const eq = trimmed.indexOf('=');
    if (eq <= 0) continue;
    const key = trimmed.slice(0, eq).trim();
    if (!key) continue;
    out[key] = unquote(trimmed.slice(eq + 1).trim());
  }
  return out;
}

/**
 * Loads .env files from `cwd` into `target`. Keys already set are left alone,
 * so the real environment always wins over the files.
 */
export function loadEnvFiles(
  filenames: string[] = ['.env', '.env.local'],
  cwd: string = process.cwd(),
  target: NodeJS.ProcessEnv = process.env,
): { loaded: string[] } {
  const loaded: string[] = [];

  for (const name of filenames) {
    const filePath = path.join(cwd, name);
    if (!existsSync(filePath)) continue;

    for (const [key, value] of Object.entries(parseEnvText(readFileSync(filePath, 'utf8')))) {
      if (target[key] === undefined) target[key] = value;
    }
    loaded.push(name);
  }

  return { loaded };
}
