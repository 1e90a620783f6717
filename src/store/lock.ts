import { mkdir, readFile, writeFile, unlink } from 'node:fs/promises';
import path from 'node:path';

export interface LockHandle {
  path: string;
  release(): Promise<void>;
}

export class LockError extends Error {
  constructor(
    message: string,
    public readonly pid: number,
  ) {
    super(message);
    this.name = 'LockError';
  }
}

type IsAlive = (pid: number) => boolean;

/** One run per state dir. A lock left behind by a dead process is taken over. */
export async function acquireLock(dir: string, filename = 'lock', isAlive: IsAlive = isProcessAlive): Promise<LockHandle> {
  await mkdir(dir, { recursive: true });
  const lockPath = path.join(dir, filename);
  const payload = JSON.stringify({ pid: process.pid, at: new Date().toISOString() }) + '\n';

  try {
    await writeFile(lockPath, payload, { flag: 'wx' });
  } catch {
    const holder = await readHolder(lockPath);
    if (holder !== undefined && holder !== process.pid && isAlive(holder)) {
      throw new LockError(`Another note-scheduler run holds ${lockPath} (pid=${holder}).`, holder);
    }
    await writeFile(lockPath, payload, { flag: 'w' });
  }

  return {
    path: lockPath,
    release: async () => {
      await unlink(lockPath).catch(() => undefined);
    },
  };
}

/** pid recorded in the lock file; undefined when unreadable or malformed (stale). */
async function readHolder(lockPath: string): Promise<number | undefined> {
  try {
    const parsed: unknown = JSON.parse(await readFile(lockPath, 'utf8'));
    if (typeof parsed === 'object' && parsed !== null && 'pid' in parsed && typeof parsed.pid === 'number') {
      return parsed.pid;
    }
    return undefined;
  } catch {
    return undefined;
  }
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}
