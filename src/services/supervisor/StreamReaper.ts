import { createLogger } from '../../utils/logger';
import { validateStreamId } from '../../utils/pathSecurity';
import { ProcessState } from '../../domain/stream/ManagedProcess';
import { reclaimProcessGroup } from '../../infrastructure/process/ProcessControl';
import { StreamRegistry } from '../registry/StreamRegistry';
import { StreamSupervisor } from './StreamSupervisor';

const logger = createLogger('StreamReaper');

export interface ReaperOptions {
  intervalMs?: number; // Sweep interval in ms (0 to disable)
}

export interface SweepResult {
  crashed: string[];
  stopped: string[];
}

export interface CleanupOptions {
  /** Streams to remove; 'all' (the default) targets every finished stream */
  ids?: string[] | 'all';
  /** Force-stop every live stream before removing */
  killAllManaged?: boolean;
  /** Delete log files too */
  removeLogs?: boolean;
}

export interface CleanupResult {
  swept: SweepResult;
  killed: Array<{ id: string; pid?: number }>;
  failed: Array<{ id: string; error: string }>;
  removed: string[];
  skipped: Array<{ id: string; reason: 'running' | 'not_found' }>;
}

/**
 * StreamReaper - reconcile the registry with what the OS actually runs
 */
export class StreamReaper {
  private readonly intervalMs: number;
  private sweepTimer?: NodeJS.Timeout;
  private inFlight?: Promise<SweepResult>;

  constructor(
    private readonly registry: StreamRegistry,
    private readonly supervisor: StreamSupervisor,
    options: ReaperOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? 10000;
  }

  /**
   * Start the periodic sweep
   */
  public start(): void {
    if (this.intervalMs <= 0) {
      logger.info('Periodic sweep disabled');
      return;
    }
    if (this.sweepTimer) {
      return;
    }

    this.sweepTimer = setInterval(() => {
      this.sweep().catch((error) => {
        logger.error({ error }, 'Periodic sweep failed');
      });
    }, this.intervalMs);
    this.sweepTimer.unref();

    logger.info({ intervalMs: this.intervalMs }, 'Periodic sweep started');
  }

  public stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
      logger.info('Periodic sweep stopped');
    }
  }

  public isScheduled(): boolean {
    return this.sweepTimer !== undefined;
  }

  /**
   * Mark running streams whose process died as crashed, and stopping
   * streams whose process is gone as stopped. Concurrent callers share one
   * pass.
   */
  public sweep(): Promise<SweepResult> {
    if (!this.inFlight) {
      this.inFlight = this.runSweep().finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  private async runSweep(): Promise<SweepResult> {
    const result: SweepResult = { crashed: [], stopped: [] };

    // Check liveness without the lock, reconcile under it
    const suspects = this.registry
      .listAll()
      .filter((entry) => entry.isActive() && !this.supervisor.isAlive(entry))
      .map((entry) => entry.id);

    for (const id of suspects) {
      await this.registry.withLock(id, async () => {
        const entry = this.registry.get(id);
        if (!entry || !entry.isActive() || this.supervisor.isAlive(entry)) {
          return;
        }

        const pid = entry.getPid();
        const next = entry.isRunning() ? ProcessState.CRASHED : ProcessState.STOPPED;
        await this.registry.update(id, (current) => current.transitionTo(next));

        // Helpers the leader forked may outlive it
        if (pid !== undefined) {
          reclaimProcessGroup(pid);
        }

        if (next === ProcessState.CRASHED) {
          const record = entry.toJSON();
          logger.warn(
            { streamId: id, pid, exitCode: record.exitCode, exitSignal: record.exitSignal },
            'Stream process died unexpectedly'
          );
          result.crashed.push(id);
        } else {
          logger.info({ streamId: id, pid }, 'Stopping stream has exited');
          result.stopped.push(id);
        }
      });
    }

    return result;
  }

  /**
   * Remove finished streams from the registry and disk, optionally killing
   * everything still running first.
   */
  public async cleanup(options: CleanupOptions = {}): Promise<CleanupResult> {
    const targets = options.ids === undefined || options.ids === 'all' ? 'all' : options.ids.map(validateStreamId);

    const swept = await this.sweep();
    const result: CleanupResult = { swept, killed: [], failed: [], removed: [], skipped: [] };

    if (options.killAllManaged) {
      for (const entry of this.registry.listAll()) {
        if (!entry.isActive()) {
          continue;
        }
        const pid = entry.getPid();
        try {
          await this.supervisor.stop(entry.id, { force: true });
          result.killed.push({ id: entry.id, pid });
        } catch (error) {
          logger.error({ streamId: entry.id, error }, 'Failed to kill stream during cleanup');
          result.failed.push({ id: entry.id, error: error instanceof Error ? error.message : String(error) });
        }
      }
    }

    const ids = targets === 'all' ? this.registry.listAll().map((entry) => entry.id) : targets;

    for (const id of ids) {
      await this.registry.withLock(id, async () => {
        const entry = this.registry.get(id);
        if (!entry) {
          result.skipped.push({ id, reason: 'not_found' });
          return;
        }
        if (!entry.isTerminal()) {
          result.skipped.push({ id, reason: 'running' });
          return;
        }
        await this.registry.remove(id, { removeLog: options.removeLogs });
        result.removed.push(id);
      });
    }

    logger.info(
      {
        crashed: swept.crashed.length,
        killed: result.killed.length,
        removed: result.removed.length,
        skipped: result.skipped.length,
      },
      'Cleanup finished'
    );
    return result;
  }
}
