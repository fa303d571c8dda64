import { humanSize, maskSecret } from './format';

describe('format', () => {
  describe('humanSize', () => {
    it('should print bytes below one kilobyte as-is', () => {
      expect(humanSize(0)).toBe('0 B');
      expect(humanSize(1023)).toBe('1023 B');
    });

    it('should truncate to one decimal', () => {
      expect(humanSize(1536)).toBe('1.5 KB');
      expect(humanSize(1024 * 1024 * 2 + 1024 * 1023)).toBe('2.9 MB');
      expect(humanSize(1024 * 1024 * 1024 * 3)).toBe('3.0 GB');
    });
  });

  describe('maskSecret', () => {
    it('should keep the first eight characters', () => {
      expect(maskSecret('test-secret-value')).toBe('test-sec...');
    });

    it('should report a missing secret', () => {
      expect(maskSecret(undefined)).toBe('<not set>');
      expect(maskSecret('')).toBe('<not set>');
    });
  });
});
