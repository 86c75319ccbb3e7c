import { spawn, ChildProcess } from 'child_process';
import fs from 'fs/promises';
import { constants as fsConstants } from 'fs';
import { createLogger } from '../../utils/logger';
import { ExecutableNotFoundError, SpawnFailedError, isErrnoException } from '../../utils/errors';
import { StreamSpec } from '../../domain/stream/StreamSpec';
import { ChildHandle } from '../../domain/stream/ManagedProcess';
import { StreamStore } from '../storage/StreamStore';
import { EncodingSettings, buildTranscodeArgs } from '../ffmpeg/TranscodeCommand';
import { signalProcessGroup } from './ProcessControl';

const logger = createLogger('ProcessLauncher');

export interface LauncherOptions {
  /** Path of the transcoder binary */
  executable: string;
  encoding: EncodingSettings;
}

export interface LaunchedProcess {
  child: ChildHandle;
  pid: number;
  logPath: string;
  argv: string[];
}

/**
 * Exit codes are set once the child has been reaped, so an exited handle
 * never points at a zombie.
 */
class SpawnedChild implements ChildHandle {
  constructor(private readonly child: ChildProcess, public readonly pid: number) {}

  hasExited(): boolean {
    return this.child.exitCode !== null || this.child.signalCode !== null;
  }

  get exitCode(): number | null {
    return this.child.exitCode;
  }

  get signalCode(): NodeJS.Signals | null {
    return this.child.signalCode;
  }
}

/**
 * ProcessLauncher - starts one detached transcoder per stream
 */
export class ProcessLauncher {
  constructor(
    private readonly store: StreamStore,
    private readonly options: LauncherOptions
  ) {}

  public get executable(): string {
    return this.options.executable;
  }

  /**
   * Full command line for a spec: executable followed by its arguments
   */
  public buildArgv(spec: StreamSpec): string[] {
    return [this.options.executable, ...buildTranscodeArgs(spec, this.options.encoding)];
  }

  /**
   * Start the transcoder for a stream.
   *
   * The child gets its own session (and so its own process group) so that
   * group signals also reach helper processes it forks, and it keeps running
   * if the supervisor goes away. Output goes to a fresh per-stream log that
   * replaces the previous run's log only once the process exists.
   * On failure no process and no open descriptor are left behind, and the
   * previous log is untouched.
   */
  public async launch(spec: StreamSpec): Promise<LaunchedProcess> {
    await this.assertExecutable();

    const argv = this.buildArgv(spec);
    const logPath = this.store.logFile(spec.id);
    const pendingLogPath = `${logPath}.starting`;
    await fs.mkdir(this.store.logsDir, { recursive: true });

    const logHandle = await fs.open(pendingLogPath, 'w');
    const child = await this.spawnDetached(argv, logHandle.fd).catch(async (error: unknown) => {
      await logHandle.close();
      await fs.rm(pendingLogPath, { force: true });
      logger.error({ streamId: spec.id, error }, 'Failed to spawn transcoder');
      throw error;
    });

    child.on('error', (error) => {
      logger.warn({ streamId: spec.id, pid: child.pid, error }, 'Transcoder process error');
    });
    child.once('exit', (exitCode, signal) => {
      logger.info({ streamId: spec.id, pid: child.pid, exitCode, signal }, 'Transcoder exited');
    });

    // The child holds its own copy of the descriptor
    await logHandle.close();

    const pid = child.pid;
    if (pid === undefined) {
      await fs.rm(pendingLogPath, { force: true });
      throw new SpawnFailedError(`Transcoder for stream '${spec.id}' started without a PID`);
    }

    // The open descriptor follows the file across the rename
    try {
      await fs.rename(pendingLogPath, logPath);
    } catch (error) {
      logger.error({ streamId: spec.id, pid, error }, 'Failed to install stream log, killing transcoder');
      signalProcessGroup(pid, 'SIGKILL');
      await fs.rm(pendingLogPath, { force: true });
      throw error;
    }

    child.unref();
    logger.info({ streamId: spec.id, pid, logPath }, 'Transcoder started');

    return {
      child: new SpawnedChild(child, pid),
      pid,
      logPath,
      argv,
    };
  }

  private async assertExecutable(): Promise<void> {
    try {
      const stats = await fs.stat(this.options.executable);
      if (!stats.isFile()) {
        throw new ExecutableNotFoundError(this.options.executable);
      }
      await fs.access(this.options.executable, fsConstants.X_OK);
    } catch (error) {
      if (error instanceof ExecutableNotFoundError) {
        throw error;
      }
      logger.error({ executable: this.options.executable, error }, 'Transcoder binary is missing or not executable');
      throw new ExecutableNotFoundError(this.options.executable);
    }
  }

  /**
   * Resolve once the OS confirms the process exists
   */
  private spawnDetached(argv: string[], logFd: number): Promise<ChildProcess> {
    const [command, ...args] = argv;

    return new Promise<ChildProcess>((resolve, reject) => {
      let child: ChildProcess;
      try {
        child = spawn(command, args, {
          detached: true,
          stdio: ['ignore', logFd, logFd],
        });
      } catch (error) {
        reject(toSpawnFailed(error));
        return;
      }

      const onSpawn = () => {
        child.off('error', onError);
        resolve(child);
      };
      const onError = (error: Error) => {
        child.off('spawn', onSpawn);
        reject(toSpawnFailed(error));
      };

      child.once('spawn', onSpawn);
      child.once('error', onError);
    });
  }
}

function toSpawnFailed(error: unknown): SpawnFailedError {
  if (isErrnoException(error)) {
    return new SpawnFailedError(`Failed to start transcoder: ${error.message}`, error.code);
  }
  return new SpawnFailedError(`Failed to start transcoder: ${String(error)}`);
}
