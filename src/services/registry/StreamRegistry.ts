import path from 'path';
import { KeyedMutex } from '../../utils/AsyncMutex';
import { AlreadyRunningError } from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import { StreamStore } from '../../infrastructure/storage/StreamStore';
import { ManagedProcess, ProcessState } from '../../domain/stream/ManagedProcess';
import { isProcessAlive, readCommandLine } from '../../infrastructure/process/ProcessControl';

const logger = createLogger('StreamRegistry');

/**
 * Terminal state for a record whose process is known to be gone
 */
function settledState(recorded: ProcessState): ProcessState {
  switch (recorded) {
    case ProcessState.RUNNING:
      return ProcessState.CRASHED;
    case ProcessState.STOPPING:
      return ProcessState.STOPPED;
    case ProcessState.STARTING:
      return ProcessState.FAILED;
    default:
      return recorded;
  }
}

export interface RemoveOptions {
  /** Also delete the stream's log file */
  removeLog?: boolean;
}

export interface RestoreResult {
  running: string[];
  crashed: string[];
  stopped: string[];
}

/**
 * StreamRegistry - the single source of truth for which streams exist and
 * whether they are running.
 *
 * Mutating calls are meant to run inside withLock(id) so that two operations
 * on the same stream never interleave. Every mutation is written through to
 * the StreamStore (pid file + record) before it becomes visible.
 */
export class StreamRegistry {
  private readonly entries = new Map<string, ManagedProcess>();
  private readonly locks = new KeyedMutex();

  constructor(public readonly store: StreamStore) {}

  /**
   * Run fn while holding the stream's lock. Other ids are not blocked.
   */
  public withLock<T>(id: string, fn: () => Promise<T>): Promise<T> {
    return this.locks.runExclusive(id, fn);
  }

  public get(id: string): ManagedProcess | undefined {
    return this.entries.get(id);
  }

  public has(id: string): boolean {
    return this.entries.has(id);
  }

  /**
   * Add an entry. Fails over a running entry; anything else is replaced.
   */
  public async insert(entry: ManagedProcess): Promise<void> {
    const existing = this.entries.get(entry.id);
    if (existing?.isRunning()) {
      throw new AlreadyRunningError(entry.id, existing.getPid());
    }

    await this.persist(entry);
    this.entries.set(entry.id, entry);

    if (existing) {
      logger.debug({ streamId: entry.id, previousState: existing.getState() }, 'Replaced previous stream entry');
    }
  }

  /**
   * Apply a mutation to an existing entry and write the result through.
   * If the mutation throws or the write fails, the entry is left as it was.
   */
  public async update(id: string, mutate: (entry: ManagedProcess) => void): Promise<ManagedProcess | undefined> {
    const entry = this.entries.get(id);
    if (!entry) {
      return undefined;
    }

    const checkpoint = entry.checkpoint();
    try {
      mutate(entry);
      await this.persist(entry);
    } catch (error) {
      entry.restore(checkpoint);
      await this.writePidFile(entry).catch((pidError: unknown) => {
        logger.error({ streamId: id, error: pidError }, 'Failed to restore pid file after a rejected update');
      });
      throw error;
    }
    return entry;
  }

  /**
   * Drop an entry together with its pid file and record
   */
  public async remove(id: string, options: RemoveOptions = {}): Promise<ManagedProcess | undefined> {
    const entry = this.entries.get(id);

    await this.store.removePid(id);
    await this.store.removeRecord(id);
    if (options.removeLog) {
      await this.store.removeLog(id);
    }

    this.entries.delete(id);
    return entry;
  }

  /**
   * All entries ordered by id
   */
  public listAll(): ManagedProcess[] {
    return [...this.entries.keys()].sort().flatMap((id) => {
      const entry = this.entries.get(id);
      return entry ? [entry] : [];
    });
  }

  public get size(): number {
    return this.entries.size;
  }

  private async persist(entry: ManagedProcess): Promise<void> {
    await this.writePidFile(entry);
    await this.store.writeRecord(entry.toJSON());
  }

  private async writePidFile(entry: ManagedProcess): Promise<void> {
    const pid = entry.getPid();
    if (pid !== undefined && entry.isActive()) {
      await this.store.writePid(entry.id, pid);
    } else {
      await this.store.removePid(entry.id);
    }
  }

  /**
   * Rebuild the registry from disk after a supervisor restart.
   *
   * A pid file whose process is alive (and, where /proc is readable, still
   * runs `executable`) becomes a running entry; any other pid file means the
   * process died unobserved and the entry is marked crashed.
   */
  public async restore(executable: string): Promise<RestoreResult> {
    const result: RestoreResult = { running: [], crashed: [], stopped: [] };
    const executableName = path.basename(executable);

    for (const id of await this.store.listIds()) {
      await this.withLock(id, async () => {
        const record = await this.store.readRecord(id);
        const pidFile = await this.store.readPid(id);

        if (pidFile.kind === 'invalid') {
          logger.warn({ streamId: id }, 'Removing invalid pid file');
          await this.store.removePid(id);
        }

        const base = {
          id,
          spec: record?.spec,
          logPath: record?.logPath ?? this.store.logFile(id),
          argv: record?.argv,
          runId: record?.runId,
          startedAt: record ? new Date(record.startedAt) : undefined,
          stoppedAt: record?.stoppedAt ? new Date(record.stoppedAt) : undefined,
          exitCode: record?.exitCode,
          exitSignal: record?.exitSignal,
          lastError: record?.lastError,
        };

        if (pidFile.kind === 'pid') {
          const alive = isProcessAlive(pidFile.pid) && (await this.isOwnedBy(pidFile.pid, executableName));
          const recordedStopping = record?.state === ProcessState.STOPPING;
          const entry = new ManagedProcess({
            ...base,
            state: recordedStopping ? ProcessState.STOPPING : ProcessState.RUNNING,
            pid: pidFile.pid,
          });

          if (alive) {
            this.entries.set(id, entry);
            await this.persist(entry);
            result.running.push(id);
            return;
          }

          entry.transitionTo(recordedStopping ? ProcessState.STOPPED : ProcessState.CRASHED);
          this.entries.set(id, entry);
          await this.persist(entry);
          (recordedStopping ? result.stopped : result.crashed).push(id);
          return;
        }

        if (!record) {
          return;
        }

        // No pid file: whatever ran is gone
        const state = settledState(record.state);
        const entry = new ManagedProcess({ ...base, state });
        this.entries.set(id, entry);
        if (state !== record.state) {
          await this.persist(entry);
        }
        (state === ProcessState.STOPPED ? result.stopped : result.crashed).push(id);
      });
    }

    logger.info(
      { running: result.running.length, crashed: result.crashed.length, stopped: result.stopped.length },
      'Stream registry restored'
    );
    return result;
  }

  /**
   * PID-reuse guard: a live PID only counts as ours when its command line
   * mentions the transcoder. Without /proc the PID is trusted.
   */
  private async isOwnedBy(pid: number, executableName: string): Promise<boolean> {
    const commandLine = await readCommandLine(pid);
    if (commandLine === null) {
      return true;
    }
    return commandLine.includes(executableName);
  }
}
