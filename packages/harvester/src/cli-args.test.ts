import { describe, it, expect } from 'vitest';
import { parseArgs } from './cli-args.js';

describe('parseArgs', () => {
  it('asks for help without arguments or with a help flag', () => {
    expect(parseArgs([]).command).toBe('help');
    expect(parseArgs(['help']).command).toBe('help');
    expect(parseArgs(['--help']).command).toBe('help');
    expect(parseArgs(['-h']).command).toBe('help');
    expect(parseArgs(['https://x/ldes', '--help']).command).toBe('help');
  });

  it('takes a bare URL as the entry point', () => {
    expect(parseArgs(['https://x/ldes'])).toEqual({
      command: 'harvest',
      positionals: ['https://x/ldes'],
      options: {},
    });
  });

  it('collects valued options around the URL', () => {
    expect(
      parseArgs(['--cacheDir', './out', 'https://x/ldes', '--logLevel=debug']),
    ).toEqual({
      command: 'harvest',
      positionals: ['https://x/ldes'],
      options: { cacheDir: './out', logLevel: 'debug' },
    });
  });

  it('does not let --no-resume swallow the URL', () => {
    expect(parseArgs(['--no-resume', 'https://x/ldes'])).toEqual({
      command: 'harvest',
      positionals: ['https://x/ldes'],
      options: { 'no-resume': 'true' },
    });
  });

  it('keeps extra positionals for the caller to reject', () => {
    expect(parseArgs(['https://x/ldes', 'https://x/other']).positionals).toEqual([
      'https://x/ldes',
      'https://x/other',
    ]);
  });

  it('treats a trailing flag without value as true', () => {
    expect(parseArgs(['https://x/ldes', '--cache-dir']).options).toEqual({
      'cache-dir': 'true',
    });
  });
});
