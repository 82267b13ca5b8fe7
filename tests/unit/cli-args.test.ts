import { describe, expect, it } from 'vitest';
import { parseArgs, UsageError } from '../../src/cli/args.js';

describe('parseArgs', () => {
  it('defaults to the run command', () => {
    expect(parseArgs([])).toEqual({ command: 'run' });
  });

  it('reads the command and its options', () => {
    expect(parseArgs(['run', '--plan', 'plans/spring.json', '-a', 'work'])).toEqual({
      command: 'run',
      planPath: 'plans/spring.json',
      account: 'work',
    });
    expect(parseArgs(['auth', '--account', 'personal'])).toEqual({
      command: 'auth',
      account: 'personal',
    });
  });

  it('accepts options before the command', () => {
    expect(parseArgs(['-p', 'my.json', 'run'])).toEqual({ command: 'run', planPath: 'my.json' });
  });

  it('stops at --help', () => {
    expect(parseArgs(['run', '--help', '--bogus'])).toEqual({ command: 'help' });
    expect(parseArgs(['-h'])).toEqual({ command: 'help' });
  });

  it('requires a value after --plan', () => {
    expect(() => parseArgs(['--plan'])).toThrow(new UsageError('--plan requires a value'));
    expect(() => parseArgs(['--plan', '--account', 'work'])).toThrow('--plan requires a value');
  });

  it('rejects unknown options and commands', () => {
    expect(() => parseArgs(['--verbose'])).toThrow('Unknown option: --verbose');
    expect(() => parseArgs(['sync'])).toThrow('Unknown command: sync');
    expect(() => parseArgs(['run', 'extra', 'args'])).toThrow('Unexpected arguments: extra args');
  });

  it('throws UsageError instances', () => {
    expect(() => parseArgs(['sync'])).toThrow(UsageError);
  });
});
