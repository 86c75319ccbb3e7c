import { ChildHandle, ManagedProcess, ProcessState } from '../ManagedProcess';

const exitedChild = (pid: number, signalCode: NodeJS.Signals | null, exitCode: number | null = null): ChildHandle => ({
  pid,
  hasExited: () => true,
  exitCode,
  signalCode,
});

const liveChild = (pid: number): ChildHandle => ({
  pid,
  hasExited: () => false,
  exitCode: null,
  signalCode: null,
});

describe('ManagedProcess State Machine', () => {
  const init = { id: 's1', logPath: '/tmp/logs/s1.log' };

  describe('State Transitions', () => {
    it('should start in STARTING state with a fresh run id', () => {
      const a = new ManagedProcess(init);
      const b = new ManagedProcess(init);

      expect(a.getState()).toBe(ProcessState.STARTING);
      expect(a.isActive()).toBe(false);
      expect(a.runId).not.toBe(b.runId);
    });

    it('should transition STARTING -> RUNNING when a child is attached', () => {
      const entry = new ManagedProcess(init);
      entry.markRunning(liveChild(1234));

      expect(entry.getState()).toBe(ProcessState.RUNNING);
      expect(entry.getPid()).toBe(1234);
      expect(entry.isRunning()).toBe(true);
      expect(entry.isActive()).toBe(true);
    });

    it('should transition RUNNING -> STOPPING -> STOPPED and clear the pid', () => {
      const entry = new ManagedProcess(init);
      entry.markRunning(liveChild(1234));

      entry.transitionTo(ProcessState.STOPPING);
      expect(entry.isActive()).toBe(true);

      entry.transitionTo(ProcessState.STOPPED);
      expect(entry.getPid()).toBeUndefined();
      expect(entry.getChild()).toBeUndefined();
      expect(entry.isTerminal()).toBe(true);
      expect(entry.toJSON().stoppedAt).toBeDefined();
    });

    it('should record exit details when the child has exited', () => {
      const entry = new ManagedProcess(init);
      entry.markRunning(exitedChild(1234, 'SIGKILL'));

      entry.transitionTo(ProcessState.CRASHED);

      const record = entry.toJSON();
      expect(record.exitSignal).toBe('SIGKILL');
      expect(record.exitCode).toBeUndefined();
      expect(record.pid).toBeUndefined();
    });

    it('should record a failure message on FAILED', () => {
      const entry = new ManagedProcess(init);
      entry.markFailed('spawn ENOENT');

      expect(entry.getState()).toBe(ProcessState.FAILED);
      expect(entry.toJSON().lastError).toBe('spawn ENOENT');
    });

    it('should reject invalid transitions', () => {
      const entry = new ManagedProcess(init);

      expect(() => entry.transitionTo(ProcessState.STOPPING)).toThrow('Invalid state transition');
      expect(() => entry.transitionTo(ProcessState.CRASHED)).toThrow('Invalid state transition');
    });

    it('should not leave terminal states', () => {
      const entry = new ManagedProcess({ ...init, state: ProcessState.STOPPED });

      for (const state of Object.values(ProcessState)) {
        expect(entry.canTransitionTo(state)).toBe(false);
      }
    });

    it('should allow RUNNING -> STOPPED for an already dead process', () => {
      const entry = new ManagedProcess({ ...init, state: ProcessState.RUNNING, pid: 99 });

      expect(entry.canTransitionTo(ProcessState.STOPPED)).toBe(true);
    });
  });

  describe('Serialization', () => {
    it('should round-trip through JSON', () => {
      const entry = new ManagedProcess({
        ...init,
        spec: { id: 's1', source: 'http://in.test/a.m3u8', destination: 'rtmp://out.test/a', extraArgs: ['-vf', 'scale=640:360'] },
        argv: ['/usr/bin/ffmpeg', '-re'],
        state: ProcessState.RUNNING,
        pid: 4321,
      });

      const restored = ManagedProcess.fromJSON(entry.toJSON());

      expect(restored.toJSON()).toEqual(entry.toJSON());
      expect(restored.getPid()).toBe(4321);
      expect(restored.spec?.extraArgs).toEqual(['-vf', 'scale=640:360']);
    });
  });
});
