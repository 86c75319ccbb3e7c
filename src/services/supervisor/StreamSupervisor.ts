import { createLogger } from '../../utils/logger';
import {
  AlreadyRunningError,
  NotFoundError,
  TerminationTimeoutError,
  ValidationError,
  isErrnoException,
} from '../../utils/errors';
import { validateStreamId } from '../../utils/pathSecurity';
import { StreamSpec } from '../../domain/stream/StreamSpec';
import { ManagedProcess, ManagedProcessRecord, ProcessState } from '../../domain/stream/ManagedProcess';
import { LaunchedProcess, ProcessLauncher } from '../../infrastructure/process/ProcessLauncher';
import {
  isProcessAlive,
  reclaimProcessGroup,
  signalProcessGroup,
  waitForExit,
} from '../../infrastructure/process/ProcessControl';
import { tailFile } from '../../infrastructure/storage/LogTail';
import { StreamRegistry, RestoreResult } from '../registry/StreamRegistry';

const logger = createLogger('StreamSupervisor');

export interface SupervisorOptions {
  /** How long a process gets to exit after SIGTERM */
  stopTimeoutMs: number;
  /** How long to wait for the process to disappear after SIGKILL */
  killTimeoutMs: number;
  pollIntervalMs: number;
  maxTailLines: number;
}

export interface StopOptions {
  /** Skip SIGTERM and kill straight away */
  force?: boolean;
}

export type StreamStatus = ManagedProcessRecord & { alive: boolean };

export type StopAllEntry = { id: string; pid?: number } | { id: string; error: string };

/**
 * StreamSupervisor - lifecycle control for managed transcoder processes
 *
 * starting -> running -> stopping -> stopped
 *                     \-> crashed (reaper)
 *          \-> failed (launch error, never registered)
 */
export class StreamSupervisor {
  constructor(
    private readonly registry: StreamRegistry,
    private readonly launcher: ProcessLauncher,
    private readonly options: SupervisorOptions
  ) {}

  /**
   * Whether the entry's OS process still exists. Prefers the child handle
   * when this supervisor spawned it.
   */
  public isAlive(entry: ManagedProcess): boolean {
    const pid = entry.getPid();
    if (pid === undefined) {
      return false;
    }
    if (entry.getChild()?.hasExited()) {
      return false;
    }
    return isProcessAlive(pid);
  }

  private snapshot(entry: ManagedProcess): StreamStatus {
    return {
      ...entry.toJSON(),
      alive: entry.isActive() && this.isAlive(entry),
    };
  }

  /**
   * Rebuild state from disk at boot
   */
  public restore(): Promise<RestoreResult> {
    return this.registry.restore(this.launcher.executable);
  }

  /**
   * Launch a transcoder for a stream. Rejected while the id has a live
   * process; a dead or finished entry is replaced by a fresh record.
   */
  public async start(spec: StreamSpec): Promise<StreamStatus> {
    validateStreamId(spec.id);

    return this.registry.withLock(spec.id, async () => {
      const existing = this.registry.get(spec.id);
      if (existing?.isActive()) {
        if (this.isAlive(existing)) {
          throw new AlreadyRunningError(spec.id, existing.getPid());
        }

        // Died without the reaper noticing yet
        const settled = existing.isRunning() ? ProcessState.CRASHED : ProcessState.STOPPED;
        await this.registry.update(spec.id, (entry) => entry.transitionTo(settled));
        logger.warn({ streamId: spec.id, state: settled }, 'Previous process for stream was already gone');
      }

      const entry = new ManagedProcess({
        id: spec.id,
        spec,
        logPath: this.registry.store.logFile(spec.id),
        argv: this.launcher.buildArgv(spec),
      });

      let launched: LaunchedProcess;
      try {
        launched = await this.launcher.launch(spec);
      } catch (error) {
        entry.markFailed(error instanceof Error ? error.message : String(error));
        logger.error({ streamId: spec.id, error }, 'Stream failed to start');
        throw error;
      }

      entry.markRunning(launched.child);

      try {
        await this.registry.insert(entry);
      } catch (error) {
        // Leave no unrecorded process behind
        logger.error({ streamId: spec.id, pid: launched.pid, error }, 'Failed to record started stream, killing it');
        signalProcessGroup(launched.pid, 'SIGKILL');
        throw error;
      }

      logger.info({ streamId: spec.id, pid: launched.pid, runId: entry.runId }, 'Stream started');
      return this.snapshot(entry);
    });
  }

  /**
   * Stop a stream: SIGTERM to the process group, SIGKILL once the grace
   * period runs out. Stopping a finished stream returns it unchanged.
   */
  public async stop(id: string, options: StopOptions = {}): Promise<StreamStatus> {
    validateStreamId(id);

    return this.registry.withLock(id, async () => {
      const entry = this.registry.get(id);
      if (!entry) {
        throw new NotFoundError(`Stream '${id}'`);
      }

      if (entry.isTerminal()) {
        return this.snapshot(entry);
      }

      const pid = entry.getPid();
      if (pid === undefined || !this.isAlive(entry)) {
        await this.registry.update(id, (current) => current.transitionTo(ProcessState.STOPPED));
        logger.info({ streamId: id }, 'Stream process already gone, marked stopped');
        return this.snapshot(entry);
      }

      if (entry.isRunning()) {
        await this.registry.update(id, (current) => current.transitionTo(ProcessState.STOPPING));
      }

      const alive = () => this.isAlive(entry);
      let exited = false;

      if (!options.force) {
        logger.info({ streamId: id, pid }, 'Sending SIGTERM to stream process group');
        signalProcessGroup(pid, 'SIGTERM');
        exited = await waitForExit(alive, this.options.stopTimeoutMs, this.options.pollIntervalMs);
      }

      if (!exited) {
        logger.warn({ streamId: id, pid, force: Boolean(options.force) }, 'Sending SIGKILL to stream process group');
        signalProcessGroup(pid, 'SIGKILL');
        exited = await waitForExit(alive, this.options.killTimeoutMs, this.options.pollIntervalMs);
      } else {
        reclaimProcessGroup(pid);
      }

      if (!exited) {
        const waitedMs = (options.force ? 0 : this.options.stopTimeoutMs) + this.options.killTimeoutMs;
        const error = new TerminationTimeoutError(id, pid, waitedMs);
        await this.registry.update(id, (current) => current.setError(error.message));
        logger.error({ streamId: id, pid, waitedMs }, 'Stream process survived SIGKILL, left in stopping state');
        throw error;
      }

      await this.registry.update(id, (current) => current.transitionTo(ProcessState.STOPPED));
      logger.info({ streamId: id, pid }, 'Stream stopped');
      return this.snapshot(entry);
    });
  }

  /**
   * Stop every running or stopping stream. One failure does not abort the rest.
   */
  public async stopAll(options: StopOptions = {}): Promise<StopAllEntry[]> {
    const active = this.registry.listAll().filter((entry) => entry.isActive());

    return Promise.all(
      active.map(async (entry): Promise<StopAllEntry> => {
        const pid = entry.getPid();
        try {
          await this.stop(entry.id, options);
          return { id: entry.id, pid };
        } catch (error) {
          logger.error({ streamId: entry.id, error }, 'Failed to stop stream');
          return { id: entry.id, error: error instanceof Error ? error.message : String(error) };
        }
      })
    );
  }

  /**
   * Current record with a fresh liveness check
   */
  public status(id: string): StreamStatus {
    validateStreamId(id);
    const entry = this.registry.get(id);
    if (!entry) {
      throw new NotFoundError(`Stream '${id}'`);
    }
    return this.snapshot(entry);
  }

  /**
   * Every stream, ordered by id
   */
  public listAll(): StreamStatus[] {
    return this.registry.listAll().map((entry) => this.snapshot(entry));
  }

  /**
   * Last `lines` lines of the stream's log. Works for any id that still has
   * a log file, registered or not.
   */
  public async tailLog(id: string, lines: number): Promise<string[]> {
    validateStreamId(id);
    if (!Number.isInteger(lines) || lines < 1 || lines > this.options.maxTailLines) {
      throw new ValidationError(`lines must be an integer between 1 and ${this.options.maxTailLines}`);
    }

    try {
      return await tailFile(this.registry.store.logFile(id), lines);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new NotFoundError(`Log for stream '${id}'`);
      }
      throw error;
    }
  }
}
