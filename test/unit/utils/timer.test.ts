import { describe, it, expect } from 'vitest';
import { formatDuration } from '../../../src/utils/timer.js';

describe('formatDuration', () => {
  it('should format each magnitude', () => {
    expect(formatDuration(850)).toBe('850ms');
    expect(formatDuration(4_200)).toBe('4.2s');
    expect(formatDuration(725_000)).toBe('12m 5s');
    expect(formatDuration(12_000_000)).toBe('3h 20m');
  });
});
