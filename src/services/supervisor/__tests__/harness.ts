import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { StreamStore } from '../../../infrastructure/storage/StreamStore';
import { ProcessLauncher } from '../../../infrastructure/process/ProcessLauncher';
import { EncodingSettings } from '../../../infrastructure/ffmpeg/TranscodeCommand';
import { StreamRegistry } from '../../registry/StreamRegistry';
import { StreamSupervisor, SupervisorOptions } from '../StreamSupervisor';
import { StreamReaper } from '../StreamReaper';

// Stand-ins for the transcoder: the shell stays the group leader (no exec) so
// its command line keeps the script name.
export const FAKE_TRANSCODER = '#!/bin/sh\necho "transcoder $*"\nsleep 30\n';
// Forks a helper into the same process group and logs its PID
export const FORKING_TRANSCODER = '#!/bin/sh\nsleep 30 &\necho "helper $!"\nwait\n';
export const STUBBORN_TRANSCODER = "#!/bin/sh\ntrap '' TERM\necho \"ignoring TERM\"\nwhile true; do sleep 1; done\n";

export const TEST_ENCODING: EncodingSettings = {
  outputFormat: 'flv',
  video: { codec: 'libx264', preset: 'veryfast', tune: 'zerolatency', bitrate: '2000k' },
  audio: { codec: 'aac', sampleRate: '44100', bitrate: '128k' },
};

export const DEFAULT_TEST_OPTIONS: SupervisorOptions = {
  stopTimeoutMs: 1000,
  killTimeoutMs: 2000,
  pollIntervalMs: 20,
  maxTailLines: 10000,
};

export interface Harness {
  store: StreamStore;
  registry: StreamRegistry;
  launcher: ProcessLauncher;
  supervisor: StreamSupervisor;
  reaper: StreamReaper;
}

export async function makeWorkspace(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'streamctl-test-'));
}

export async function writeScript(dir: string, name: string, body: string): Promise<string> {
  const scriptPath = path.join(dir, name);
  await fs.writeFile(scriptPath, body, { mode: 0o755 });
  await fs.chmod(scriptPath, 0o755);
  return scriptPath;
}

export async function createHarness(
  baseDir: string,
  executable: string,
  options: Partial<SupervisorOptions> = {}
): Promise<Harness> {
  const store = new StreamStore(baseDir);
  await store.ensureLayout();
  const registry = new StreamRegistry(store);
  const launcher = new ProcessLauncher(store, { executable, encoding: TEST_ENCODING });
  const supervisor = new StreamSupervisor(registry, launcher, { ...DEFAULT_TEST_OPTIONS, ...options });
  const reaper = new StreamReaper(registry, supervisor, { intervalMs: 0 });
  return { store, registry, launcher, supervisor, reaper };
}

export async function waitUntil(
  predicate: () => boolean | Promise<boolean>,
  timeoutMs = 5000,
  intervalMs = 25
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!(await predicate())) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
  }
}

export async function logContains(logPath: string, text: string): Promise<boolean> {
  try {
    return (await fs.readFile(logPath, 'utf8')).includes(text);
  } catch {
    return false;
  }
}

export async function readHelperPid(logPath: string): Promise<number> {
  await waitUntil(() => logContains(logPath, 'helper '));
  const match = /helper (\d+)/.exec(await fs.readFile(logPath, 'utf8'));
  if (!match) {
    throw new Error(`No helper PID in ${logPath}`);
  }
  return Number(match[1]);
}

/**
 * Whether a PID is a live, non-zombie process. Orphaned helpers may linger as
 * zombies until init reaps them.
 */
export async function isRunningProcess(pid: number): Promise<boolean> {
  let stat: string;
  try {
    stat = await fs.readFile(`/proc/${pid}/stat`, 'utf8');
  } catch {
    return false;
  }
  const state = stat.charAt(stat.lastIndexOf(')') + 2);
  return state !== 'Z' && state !== 'X';
}
