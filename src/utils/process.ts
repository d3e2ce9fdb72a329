import { execa } from 'execa';

/**
 * Best-effort liveness check. EPERM means the pid exists but belongs to
 * someone else, which still counts as alive.
 */
export function isProcessAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) return false;
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return err instanceof Error && 'code' in err && err.code === 'EPERM';
  }
}

export type ChildLister = (pid: number) => Promise<number[]>;

/** Direct children of a pid, from `pgrep -P`. Exit 1 means none. */
export async function childPids(pid: number): Promise<number[]> {
  const { stdout } = await execa('pgrep', ['-P', String(pid)], { reject: false });
  return stdout
    .split('\n')
    .map((line) => Number(line.trim()))
    .filter((child) => Number.isInteger(child) && child > 0);
}

/** Every descendant of a pid, breadth first. */
export async function descendantPids(pid: number, listChildren: ChildLister = childPids): Promise<number[]> {
  const seen = new Set<number>([pid]);
  const found: number[] = [];
  const queue = [pid];

  for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
    for (const child of await listChildren(next)) {
      if (seen.has(child)) continue;
      seen.add(child);
      found.push(child);
      queue.push(child);
    }
  }
  return found;
}

function signalPid(pid: number, signal: NodeJS.Signals): void {
  try {
    process.kill(pid, signal);
  } catch (err) {
    // ESRCH: already gone
    if (!(err instanceof Error && 'code' in err && err.code === 'ESRCH')) {
      throw err;
    }
  }
}

/**
 * Kill a process and every descendant. The tree is listed before anything is
 * signalled, so grandchildren orphaned by the kill are still reached.
 */
export async function killProcessTree(
  pid: number,
  signal: NodeJS.Signals = 'SIGKILL',
  listChildren: ChildLister = childPids,
): Promise<void> {
  const descendants = await descendantPids(pid, listChildren);
  for (const target of [pid, ...descendants]) {
    signalPid(target, signal);
  }
}

export async function waitForExit(
  pid: number,
  isAlive: (pid: number) => boolean = isProcessAlive,
  timeoutMs = 5000,
  intervalMs = 100,
): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  while (isAlive(pid)) {
    if (Date.now() >= deadline) return false;
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
  }
  return true;
}

export interface ProcessControl {
  isAlive(pid: number): boolean;
  killTree(pid: number): Promise<void>;
}

export const systemProcessControl: ProcessControl = {
  isAlive: isProcessAlive,
  killTree: (pid) => killProcessTree(pid),
};
