import fs from 'fs/promises';
import path from 'path';
import { ProcessState } from '../../../domain/stream/ManagedProcess';
import { StreamSpec } from '../../../domain/stream/StreamSpec';
import { isProcessAlive } from '../../../infrastructure/process/ProcessControl';
import { InvalidSpecError } from '../../../utils/errors';
import { StreamReaper } from '../StreamReaper';
import {
  FAKE_TRANSCODER,
  FORKING_TRANSCODER,
  Harness,
  createHarness,
  isRunningProcess,
  makeWorkspace,
  readHelperPid,
  waitUntil,
  writeScript,
} from './harness';

jest.mock('../../../utils/logger', () => ({
  createLogger: jest.fn().mockReturnValue({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

jest.setTimeout(20000);

const spec = (id: string): StreamSpec => ({
  id,
  source: 'http://origin.test/live/index.m3u8',
  destination: `rtmp://ingest.test/app/${id}`,
});

describe('StreamReaper', () => {
  let workspace: string;
  let h: Harness;

  beforeEach(async () => {
    workspace = await makeWorkspace();
    const executable = await writeScript(workspace, 'fake-transcoder', FAKE_TRANSCODER);
    h = await createHarness(path.join(workspace, 'state'), executable);
  });

  afterEach(async () => {
    h.reaper.stop();
    await h.reaper.cleanup({ killAllManaged: true });
    await fs.rm(workspace, { recursive: true, force: true });
  });

  const killExternally = async (id: string): Promise<number> => {
    const pid = h.supervisor.status(id).pid ?? 0;
    process.kill(-pid, 'SIGKILL');
    await waitUntil(() => !h.supervisor.status(id).alive);
    return pid;
  };

  describe('sweep', () => {
    it('should mark externally killed processes as crashed', async () => {
      await h.supervisor.start(spec('s1'));
      await h.supervisor.start(spec('s2'));
      await killExternally('s1');

      const result = await h.reaper.sweep();

      expect(result).toEqual({ crashed: ['s1'], stopped: [] });
      const crashed = h.supervisor.status('s1');
      expect(crashed.state).toBe(ProcessState.CRASHED);
      expect(crashed.pid).toBeUndefined();
      expect(crashed.exitSignal).toBe('SIGKILL');
      expect(h.supervisor.status('s2').state).toBe(ProcessState.RUNNING);
    });

    it('should remove the stale pid file', async () => {
      await h.supervisor.start(spec('s1'));
      await killExternally('s1');

      await h.reaper.sweep();

      expect(await h.store.readPid('s1')).toEqual({ kind: 'missing' });
      expect((await h.store.readRecord('s1'))?.state).toBe(ProcessState.CRASHED);
    });

    it('should kill helpers left behind when only the transcoder died', async () => {
      const executable = await writeScript(workspace, 'forking-transcoder', FORKING_TRANSCODER);
      const forking = await createHarness(path.join(workspace, 'forking'), executable);
      const started = await forking.supervisor.start(spec('s1'));
      const helperPid = await readHelperPid(started.logPath);

      if (started.pid === undefined) {
        throw new Error('Stream started without a PID');
      }

      // Leader only, not the group
      process.kill(started.pid, 'SIGKILL');
      await waitUntil(() => !forking.supervisor.status('s1').alive);
      expect(await isRunningProcess(helperPid)).toBe(true);

      expect(await forking.reaper.sweep()).toEqual({ crashed: ['s1'], stopped: [] });

      await waitUntil(async () => !(await isRunningProcess(helperPid)));
    });

    it('should leave live processes alone', async () => {
      await h.supervisor.start(spec('s1'));

      expect(await h.reaper.sweep()).toEqual({ crashed: [], stopped: [] });
      expect(h.supervisor.status('s1').state).toBe(ProcessState.RUNNING);
    });

    it('should share one pass between concurrent callers', async () => {
      const first = h.reaper.sweep();
      const second = h.reaper.sweep();

      expect(second).toBe(first);
      await first;
    });
  });

  describe('cleanup', () => {
    it('should leave nothing running with killAllManaged', async () => {
      const pids = [
        (await h.supervisor.start(spec('a'))).pid ?? 0,
        (await h.supervisor.start(spec('b'))).pid ?? 0,
      ];

      const result = await h.reaper.cleanup({ killAllManaged: true });

      expect(result.killed.map((k) => k.id)).toEqual(['a', 'b']);
      expect(result.removed).toEqual(['a', 'b']);
      expect(h.supervisor.listAll()).toEqual([]);
      expect(pids.filter((pid) => isProcessAlive(pid))).toEqual([]);
    });

    it('should skip running streams and unknown ids', async () => {
      await h.supervisor.start(spec('live'));
      await h.supervisor.start(spec('done'));
      await h.supervisor.stop('done');

      const result = await h.reaper.cleanup({ ids: ['live', 'done', 'ghost'] });

      expect(result.removed).toEqual(['done']);
      expect(result.skipped).toEqual([
        { id: 'live', reason: 'running' },
        { id: 'ghost', reason: 'not_found' },
      ]);
      expect(h.supervisor.status('live').state).toBe(ProcessState.RUNNING);
    });

    it('should keep logs unless asked to remove them', async () => {
      await h.supervisor.start(spec('k1'));
      await h.supervisor.stop('k1');
      await h.supervisor.start(spec('k2'));
      await h.supervisor.stop('k2');

      await h.reaper.cleanup({ ids: ['k1'] });
      await h.reaper.cleanup({ ids: ['k2'], removeLogs: true });

      await expect(fs.access(h.store.logFile('k1'))).resolves.toBeUndefined();
      await expect(fs.access(h.store.logFile('k2'))).rejects.toThrow();
      expect(await h.store.readRecord('k1')).toBeNull();
    });

    it('should remove crashed streams found by its own sweep', async () => {
      await h.supervisor.start(spec('s1'));
      await killExternally('s1');

      const result = await h.reaper.cleanup();

      expect(result.swept.crashed).toEqual(['s1']);
      expect(result.removed).toEqual(['s1']);
    });

    it('should reject unsafe ids', async () => {
      await expect(h.reaper.cleanup({ ids: ['../../etc/passwd'] })).rejects.toBeInstanceOf(InvalidSpecError);
    });
  });

  describe('periodic sweep', () => {
    it('should not schedule when the interval is 0', () => {
      h.reaper.start();

      expect(h.reaper.isScheduled()).toBe(false);
    });

    it('should reconcile on its own once started', async () => {
      const reaper = new StreamReaper(h.registry, h.supervisor, { intervalMs: 50 });
      await h.supervisor.start(spec('s1'));
      await killExternally('s1');

      reaper.start();
      try {
        expect(reaper.isScheduled()).toBe(true);
        await waitUntil(() => h.supervisor.status('s1').state === ProcessState.CRASHED);
      } finally {
        reaper.stop();
      }

      expect(reaper.isScheduled()).toBe(false);
    });
  });
});
