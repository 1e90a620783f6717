export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

type Level = Exclude<LogLevel, 'silent'>;

const ORDER: Record<Level, number> = {
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export interface Logger {
  error(msg: string, meta?: unknown): void;
  warn(msg: string, meta?: unknown): void;
  info(msg: string, meta?: unknown): void;
  debug(msg: string, meta?: unknown): void;
  /** Same sink and threshold, messages prefixed with `[scope]`. */
  child(scope: string): Logger;
}

export type LogSink = (level: Level, line: string) => void;

function fmtMeta(meta: unknown) {
  if (meta === undefined) return '';
  if (typeof meta === 'string') return ` ${meta}`;
  if (meta instanceof Error) return ` ${meta.message}`;
  try {
    return ` ${JSON.stringify(meta)}`;
  } catch {
    return ' [meta-unserializable]';
  }
}

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
};

export function createLogger(level: LogLevel = 'info', sink: LogSink = consoleSink, scope?: string): Logger {
  const threshold = level === 'silent' ? 0 : ORDER[level];
  const tag = scope ? `[${scope}] ` : '';

  const emit = (lvl: Level) => (msg: string, meta?: unknown) => {
    if (ORDER[lvl] > threshold) return;
    sink(lvl, `${new Date().toISOString()} ${lvl.toUpperCase()} ${tag}${msg}${fmtMeta(meta)}`);
  };

  return {
    error: emit('error'),
    warn: emit('warn'),
    info: emit('info'),
    debug: emit('debug'),
    child: (name) => createLogger(level, sink, scope ? `${scope}:${name}` : name),
  };
}

/** Collects lines in memory; used by tests to assert on warnings. */
export function createMemoryLogger(level: LogLevel = 'debug') {
  const lines: Array<{ level: Level; line: string }> = [];
  const logger = createLogger(level, (lvl, line) => {
    lines.push({ level: lvl, line });
  });
  return { logger, lines };
}
