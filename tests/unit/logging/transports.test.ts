import { describe, it, expect } from '@jest/globals';
import { formatLine, formatTimestamp } from '../../../src/logging/transports.js';

describe('transports', () => {
  const date = new Date(2026, 9, 18, 14, 30, 15, 42);

  it('should format timestamps with comma-separated milliseconds', () => {
    expect(formatTimestamp(date)).toBe('2026-10-18 14:30:15,042');
    expect(formatTimestamp(new Date(2026, 0, 2, 3, 4, 5, 6))).toBe('2026-01-02 03:04:05,006');
  });

  it('should pad the level and tag the component', () => {
    expect(formatLine('info', 'Copied 3 disk image(s)', 'tree-assembler', date)).toBe(
      'INFO  2026-10-18 14:30:15,042 [tree-assembler] Copied 3 disk image(s)'
    );
  });

  it('should omit a missing component', () => {
    expect(formatLine('warn', 'Sync declined', undefined, date)).toBe('WARN  2026-10-18 14:30:15,042 Sync declined');
  });

  it('should append the stack on its own lines', () => {
    expect(formatLine('error', 'failed', 'publish', date, 'Error: boom\n    at x')).toBe(
      'ERROR 2026-10-18 14:30:15,042 [publish] failed\nError: boom\n    at x'
    );
  });
});
