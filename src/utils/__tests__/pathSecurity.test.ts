import path from 'path';
import { sanitizeErrorMessage, validatePathWithinBase, validateStreamId } from '../pathSecurity';
import { InvalidSpecError } from '../errors';

describe('pathSecurity', () => {
  describe('validateStreamId', () => {
    it.each(['s1', 'News_Channel-2', 'a.b.c', '9lives'])('should accept %s', (id) => {
      expect(validateStreamId(id)).toBe(id);
    });

    it.each(['', '..', '../x', 'x/..', 'a\\b', 'nul\0byte', '-flag', '_x', 'ünïcode'])('should reject %p', (id) => {
      expect(() => validateStreamId(id)).toThrow(InvalidSpecError);
    });
  });

  describe('validatePathWithinBase', () => {
    it('should resolve paths inside the base', () => {
      expect(validatePathWithinBase('/srv/streams', 'logs/s1.log')).toBe(path.resolve('/srv/streams/logs/s1.log'));
    });

    it('should reject escapes and sibling prefixes', () => {
      expect(() => validatePathWithinBase('/srv/streams', '../etc/passwd')).toThrow(InvalidSpecError);
      expect(() => validatePathWithinBase('/srv/streams', '/srv/streams-other/x')).toThrow(InvalidSpecError);
    });
  });

  describe('sanitizeErrorMessage', () => {
    it('should redact base paths and other absolute paths', () => {
      const message = sanitizeErrorMessage('cannot open /var/streamctl/logs/s1.log or /usr/bin/ffmpeg', ['/var/streamctl']);

      expect(message).toBe('cannot open [REDACTED_PATH][PATH] or [PATH]');
    });

    it('should leave plain messages alone', () => {
      expect(sanitizeErrorMessage("Stream 's1' not found")).toBe("Stream 's1' not found");
    });
  });
});
