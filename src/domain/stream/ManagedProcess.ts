import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { StreamSpec, streamSpecSchema } from './StreamSpec';

export enum ProcessState {
  STARTING = 'starting',
  RUNNING = 'running',
  STOPPING = 'stopping',
  STOPPED = 'stopped',
  CRASHED = 'crashed',
  FAILED = 'failed',
}

const TERMINAL_STATES: ReadonlySet<ProcessState> = new Set([
  ProcessState.STOPPED,
  ProcessState.CRASHED,
  ProcessState.FAILED,
]);

/**
 * What the supervisor knows about the OS child it spawned in this process.
 * Absent for entries rediscovered from disk after a restart.
 */
export interface ChildHandle {
  readonly pid: number;
  hasExited(): boolean;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
}

export interface ManagedProcessInit {
  id: string;
  spec?: StreamSpec;
  logPath: string;
  argv?: readonly string[];
  runId?: string;
  state?: ProcessState;
  pid?: number;
  startedAt?: Date;
  stoppedAt?: Date;
  exitCode?: number;
  exitSignal?: string;
  lastError?: string;
}

/**
 * Persisted form, also the JSON shape returned to API callers
 */
export const managedProcessRecordSchema = z.object({
  id: z.string(),
  runId: z.string(),
  spec: streamSpecSchema.optional(),
  state: z.nativeEnum(ProcessState),
  pid: z.number().int().positive().optional(),
  logPath: z.string(),
  argv: z.array(z.string()).default([]),
  startedAt: z.string(),
  stoppedAt: z.string().optional(),
  exitCode: z.number().int().optional(),
  exitSignal: z.string().optional(),
  lastError: z.string().optional(),
});

export type ManagedProcessRecord = z.infer<typeof managedProcessRecordSchema>;

/**
 * Mutable part of a ManagedProcess, captured so a change that could not be
 * saved can be undone
 */
export interface ManagedProcessCheckpoint {
  readonly state: ProcessState;
  readonly pid?: number;
  readonly stoppedAt?: Date;
  readonly exitCode?: number;
  readonly exitSignal?: string;
  readonly lastError?: string;
  readonly child?: ChildHandle;
}

/**
 * One stream's live or recent transcoder process.
 * Owned by the registry; every mutation happens under the stream's lock.
 */
export class ManagedProcess {
  public readonly id: string;
  public readonly runId: string;
  public readonly spec?: StreamSpec;
  public readonly logPath: string;
  public readonly argv: readonly string[];
  public readonly startedAt: Date;
  private state: ProcessState;
  private pid?: number;
  private stoppedAt?: Date;
  private exitCode?: number;
  private exitSignal?: string;
  private lastError?: string;
  private child?: ChildHandle;

  constructor(init: ManagedProcessInit) {
    this.id = init.id;
    this.runId = init.runId || uuidv4();
    this.spec = init.spec;
    this.logPath = init.logPath;
    this.argv = init.argv ?? [];
    this.state = init.state || ProcessState.STARTING;
    this.pid = init.pid;
    this.startedAt = init.startedAt || new Date();
    this.stoppedAt = init.stoppedAt;
    this.exitCode = init.exitCode;
    this.exitSignal = init.exitSignal;
    this.lastError = init.lastError;
  }

  // State machine methods
  public canTransitionTo(newState: ProcessState): boolean {
    const validTransitions: Record<ProcessState, ProcessState[]> = {
      [ProcessState.STARTING]: [ProcessState.RUNNING, ProcessState.FAILED],
      [ProcessState.RUNNING]: [ProcessState.STOPPING, ProcessState.STOPPED, ProcessState.CRASHED],
      [ProcessState.STOPPING]: [ProcessState.STOPPED, ProcessState.CRASHED],
      [ProcessState.STOPPED]: [],
      [ProcessState.CRASHED]: [],
      [ProcessState.FAILED]: [],
    };

    return validTransitions[this.state].includes(newState);
  }

  public transitionTo(newState: ProcessState): void {
    if (!this.canTransitionTo(newState)) {
      throw new Error(`Invalid state transition: ${this.state} -> ${newState} for stream ${this.id}`);
    }
    this.state = newState;

    if (TERMINAL_STATES.has(newState)) {
      this.captureExit();
      this.pid = undefined;
      this.child = undefined;
      this.stoppedAt = new Date();
    }
  }

  /**
   * Attach the spawned child; moves starting -> running
   */
  public markRunning(child: ChildHandle): void {
    this.transitionTo(ProcessState.RUNNING);
    this.child = child;
    this.pid = child.pid;
  }

  public markFailed(error: string): void {
    this.lastError = error;
    this.transitionTo(ProcessState.FAILED);
  }

  public setError(error: string): void {
    this.lastError = error;
  }

  public checkpoint(): ManagedProcessCheckpoint {
    return {
      state: this.state,
      pid: this.pid,
      stoppedAt: this.stoppedAt,
      exitCode: this.exitCode,
      exitSignal: this.exitSignal,
      lastError: this.lastError,
      child: this.child,
    };
  }

  public restore(checkpoint: ManagedProcessCheckpoint): void {
    this.state = checkpoint.state;
    this.pid = checkpoint.pid;
    this.stoppedAt = checkpoint.stoppedAt;
    this.exitCode = checkpoint.exitCode;
    this.exitSignal = checkpoint.exitSignal;
    this.lastError = checkpoint.lastError;
    this.child = checkpoint.child;
  }

  // Getters
  public getState(): ProcessState {
    return this.state;
  }

  public getPid(): number | undefined {
    return this.pid;
  }

  public getChild(): ChildHandle | undefined {
    return this.child;
  }

  public isRunning(): boolean {
    return this.state === ProcessState.RUNNING;
  }

  /**
   * Running or stopping: a process may still exist
   */
  public isActive(): boolean {
    return this.state === ProcessState.RUNNING || this.state === ProcessState.STOPPING;
  }

  public isTerminal(): boolean {
    return TERMINAL_STATES.has(this.state);
  }

  private captureExit(): void {
    if (this.child?.hasExited()) {
      this.exitCode = this.child.exitCode ?? undefined;
      this.exitSignal = this.child.signalCode ?? undefined;
    }
  }

  // Serialization
  public toJSON(): ManagedProcessRecord {
    return {
      id: this.id,
      runId: this.runId,
      spec: this.spec
        ? {
            ...this.spec,
            extraArgs: this.spec.extraArgs ? [...this.spec.extraArgs] : undefined,
          }
        : undefined,
      state: this.state,
      pid: this.pid,
      logPath: this.logPath,
      argv: [...this.argv],
      startedAt: this.startedAt.toISOString(),
      stoppedAt: this.stoppedAt?.toISOString(),
      exitCode: this.exitCode,
      exitSignal: this.exitSignal,
      lastError: this.lastError,
    };
  }

  public static fromJSON(data: ManagedProcessRecord): ManagedProcess {
    return new ManagedProcess({
      id: data.id,
      runId: data.runId,
      spec: data.spec,
      logPath: data.logPath,
      argv: data.argv,
      state: data.state,
      pid: data.pid,
      startedAt: new Date(data.startedAt),
      stoppedAt: data.stoppedAt ? new Date(data.stoppedAt) : undefined,
      exitCode: data.exitCode,
      exitSignal: data.exitSignal,
      lastError: data.lastError,
    });
  }
}
