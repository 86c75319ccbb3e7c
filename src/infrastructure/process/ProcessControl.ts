import fs from 'fs/promises';
import { isErrnoException } from '../../utils/errors';

/**
 * Non-blocking liveness check. EPERM means the PID exists but belongs to
 * someone else, which still counts as alive.
 */
export function isProcessAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) {
    return false;
  }
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return isErrnoException(error) && error.code === 'EPERM';
  }
}

/**
 * Signal a whole process group (children are spawned as group leaders),
 * falling back to the single PID when the group is gone.
 * Returns false when nothing received the signal.
 */
export function signalProcessGroup(pid: number, signal: NodeJS.Signals): boolean {
  if (process.platform !== 'win32') {
    try {
      process.kill(-pid, signal);
      return true;
    } catch (error) {
      // ESRCH: no such group, try the leader alone
      if (!isErrnoException(error) || error.code !== 'ESRCH') {
        throw error;
      }
    }
  }

  try {
    process.kill(pid, signal);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ESRCH') {
      return false;
    }
    throw error;
  }
}

/**
 * SIGKILL whatever is left of a group whose leader has exited. Only the
 * group is targeted: a PID stays reserved while its group has members, the
 * bare PID does not.
 */
export function reclaimProcessGroup(pid: number): boolean {
  if (process.platform === 'win32') {
    return false;
  }
  try {
    process.kill(-pid, 'SIGKILL');
    return true;
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ESRCH' || error.code === 'EPERM')) {
      return false;
    }
    throw error;
  }
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Poll until `isAlive` reports false or the timeout elapses.
 * Resolves true when the process exited in time.
 */
export async function waitForExit(
  isAlive: () => boolean,
  timeoutMs: number,
  pollIntervalMs: number
): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  while (isAlive()) {
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      return false;
    }
    await sleep(Math.min(pollIntervalMs, remaining));
  }
  return true;
}

/**
 * Command line of a running process, or null where /proc is unavailable
 */
export async function readCommandLine(pid: number): Promise<string | null> {
  try {
    const raw = await fs.readFile(`/proc/${pid}/cmdline`);
    return raw.toString('utf-8').split('\0').filter(Boolean).join(' ');
  } catch {
    return null;
  }
}
