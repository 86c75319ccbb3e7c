import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { NotFoundError, SpawnFailedError, isErrnoException } from '../errors';

describe('isErrnoException', () => {
  it('should accept a filesystem error', async () => {
    const error: unknown = await fs.readFile(path.join(os.tmpdir(), 'streamctl-missing', 'none.log')).catch((e: unknown) => e);

    expect(isErrnoException(error)).toBe(true);
    expect(error).toMatchObject({ code: 'ENOENT' });
  });

  it.each([
    ['NotFoundError', new NotFoundError("Stream 's1'")],
    ['SpawnFailedError', new SpawnFailedError('Failed to start transcoder', 'ENOENT')],
  ])('should reject %s', (_name, error) => {
    expect(isErrnoException(error)).toBe(false);
  });

  it('should reject errors without a string code', () => {
    expect(isErrnoException(new Error('plain'))).toBe(false);
    expect(isErrnoException(Object.assign(new Error('numeric'), { code: 42 }))).toBe(false);
    expect(isErrnoException({ code: 'ENOENT' })).toBe(false);
  });
});
