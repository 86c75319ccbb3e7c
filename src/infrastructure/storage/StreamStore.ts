import fs from 'fs/promises';
import path from 'path';
import { createLogger } from '../../utils/logger';
import { isErrnoException } from '../../utils/errors';
import { validateStreamId, validatePathWithinBase } from '../../utils/pathSecurity';
import { ManagedProcessRecord, managedProcessRecordSchema } from '../../domain/stream/ManagedProcess';

const logger = createLogger('StreamStore');

/**
 * Result of reading a pid file
 */
export type PidFileContent =
  | { kind: 'missing' }
  | { kind: 'invalid' }
  | { kind: 'pid'; pid: number };

/**
 * StreamStore - on-disk arena for managed streams
 *
 * Layout under the base directory:
 *   pids/<id>.pid   numeric PID as plain text, only while a process is believed alive
 *   logs/<id>.log   merged stdout/stderr of the child
 *   meta/<id>.json  the ManagedProcess record, written atomically
 *
 * Every path is derived from a validated stream id.
 */
export class StreamStore {
  public readonly pidsDir: string;
  public readonly logsDir: string;
  public readonly metaDir: string;

  constructor(public readonly baseDir: string) {
    this.pidsDir = path.join(baseDir, 'pids');
    this.logsDir = path.join(baseDir, 'logs');
    this.metaDir = path.join(baseDir, 'meta');
  }

  /**
   * Create the directory layout if it doesn't exist
   */
  public async ensureLayout(): Promise<void> {
    for (const dir of [this.pidsDir, this.logsDir, this.metaDir]) {
      await fs.mkdir(dir, { recursive: true });
    }
  }

  public pidFile(id: string): string {
    return validatePathWithinBase(this.pidsDir, `${validateStreamId(id)}.pid`);
  }

  public logFile(id: string): string {
    return validatePathWithinBase(this.logsDir, `${validateStreamId(id)}.log`);
  }

  public metaFile(id: string): string {
    return validatePathWithinBase(this.metaDir, `${validateStreamId(id)}.json`);
  }

  public async writePid(id: string, pid: number): Promise<void> {
    await fs.mkdir(this.pidsDir, { recursive: true });
    await fs.writeFile(this.pidFile(id), String(pid), 'utf8');
  }

  public async readPid(id: string): Promise<PidFileContent> {
    let content: string;
    try {
      content = await fs.readFile(this.pidFile(id), 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return { kind: 'missing' };
      }
      throw error;
    }

    const trimmed = content.trim();
    const pid = Number(trimmed);
    if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(pid) || pid <= 0) {
      return { kind: 'invalid' };
    }
    return { kind: 'pid', pid };
  }

  public async removePid(id: string): Promise<void> {
    await fs.rm(this.pidFile(id), { force: true });
  }

  /**
   * Save a stream record (atomic write)
   */
  public async writeRecord(record: ManagedProcessRecord): Promise<void> {
    const target = this.metaFile(record.id);
    const tempPath = `${target}.tmp`;

    await fs.mkdir(this.metaDir, { recursive: true });
    await fs.writeFile(tempPath, JSON.stringify(record, null, 2), 'utf8');
    await fs.rename(tempPath, target);
  }

  /**
   * Load a stream record; null when absent or unreadable
   */
  public async readRecord(id: string): Promise<ManagedProcessRecord | null> {
    let content: string;
    try {
      content = await fs.readFile(this.metaFile(id), 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      logger.warn({ id, error }, 'Stream record is not valid JSON, ignoring it');
      return null;
    }

    const parsed = managedProcessRecordSchema.safeParse(data);
    if (!parsed.success || parsed.data.id !== id) {
      logger.warn({ id, issues: parsed.success ? undefined : parsed.error.issues }, 'Stream record is malformed, ignoring it');
      return null;
    }
    return parsed.data;
  }

  public async removeRecord(id: string): Promise<void> {
    await fs.rm(this.metaFile(id), { force: true });
  }

  public async removeLog(id: string): Promise<void> {
    await fs.rm(this.logFile(id), { force: true });
  }

  public async logExists(id: string): Promise<boolean> {
    try {
      await fs.access(this.logFile(id));
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Stream ids with a pid file or a record, sorted. Names that are not
   * valid stream ids are skipped.
   */
  public async listIds(): Promise<string[]> {
    const ids = new Set<string>();
    const sources: Array<[string, string]> = [
      [this.pidsDir, '.pid'],
      [this.metaDir, '.json'],
    ];

    for (const [dir, extension] of sources) {
      let entries: string[];
      try {
        entries = await fs.readdir(dir);
      } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
          continue;
        }
        throw error;
      }

      for (const entry of entries) {
        if (!entry.endsWith(extension)) {
          continue;
        }
        const id = entry.slice(0, -extension.length);
        try {
          validateStreamId(id);
          ids.add(id);
        } catch {
          logger.warn({ file: path.join(dir, entry) }, 'Ignoring file with an invalid stream id');
        }
      }
    }

    return [...ids].sort();
  }
}
