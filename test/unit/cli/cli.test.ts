import { describe, it, expect } from 'vitest';
import { formatTimestamp } from '../../../src/cli/context.js';
import { parsePort } from '../../../src/cli/commands/serve.js';
import { createCLI } from '../../../src/cli/index.js';

describe('CLI', () => {
  it('should register every command', () => {
    const program = createCLI();

    expect(program.name()).toBe('uplift');
    expect(program.commands.map(c => c.name())).toEqual([
      'init', 'serve', 'run', 'agents', 'approvals', 'memory', 'kill',
    ]);
  });

  it('should register the approval subcommands', () => {
    const approvals = createCLI().commands.find(c => c.name() === 'approvals');

    expect(approvals?.commands.map(c => c.name())).toEqual([
      'list', 'request', 'approve', 'deny', 'status', 'history',
    ]);
  });

  it('should accept --foreground on serve', () => {
    const serve = createCLI().commands.find(c => c.name() === 'serve');

    expect(serve?.options.map(o => o.long)).toContain('--foreground');
  });

  it('should parse ports', () => {
    expect(parsePort('7420')).toBe(7420);
    expect(parsePort('0')).toBe(0);
    expect(() => parsePort('70000')).toThrow('Invalid port: 70000');
    expect(() => parsePort('http')).toThrow('Invalid port: http');
  });

  it('should format timestamps in UTC', () => {
    expect(formatTimestamp(Date.UTC(2024, 2, 5, 14, 7, 9))).toBe('2024-03-05 14:07:09');
    expect(formatTimestamp(null)).toBe('-');
  });
});
